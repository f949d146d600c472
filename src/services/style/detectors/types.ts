import type { StyleFinding } from '../../../types/analysis.types';

export type StyleDetector = (text: string) => StyleFinding[];

/** Unicode-aware equivalents of `\w` and `\b` for the detector patterns. */
export const WORD_CHAR = '[\\p{L}\\p{N}_]';
export const WORD_START = '(?<![\\p{L}\\p{N}_])';
export const WORD_END = '(?![\\p{L}\\p{N}_])';

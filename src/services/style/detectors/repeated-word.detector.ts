import type { StyleFinding } from '../../../types/analysis.types';
import { WORD_CHAR, WORD_START, WORD_END } from './types';

/** Doubled on purpose often enough that flagging them is noise. */
export const INTENTIONAL_REPEATS: ReadonlySet<string> = new Set(['very', 'far', 'long', 'many']);

const REPEATED_WORD = new RegExp(`${WORD_START}(${WORD_CHAR}+)\\s+\\1${WORD_END}`, 'giu');

export function detectRepeatedWords(text: string): StyleFinding[] {
  const findings: StyleFinding[] = [];

  for (const match of text.matchAll(REPEATED_WORD)) {
    const word = match[1] ?? '';
    if (INTENTIONAL_REPEATS.has(word.toLowerCase())) continue;

    findings.push({
      message: `Possible unintentional word repetition: '${match[0]}'`,
      category: 'repetition',
      offset: match.index ?? 0,
      length: match[0].length,
      original: match[0],
      suggestion: word,
    });
  }

  return findings;
}

/**
 * Passive voice detection.
 * Flags a be-verb followed by a past-participle-looking word. Surface pattern
 * only: adjectives such as "is excited" are flagged too.
 */

import type { StyleFinding } from '../../../types/analysis.types';
import irregularParticiples from '../../../data/irregular-participles.json';
import { WORD_CHAR, WORD_START, WORD_END } from './types';

const BE_VERB = '(?:am|is|are|was|were|be|been|being)';

// Participles ending in -ed or -en stay out of the list; the suffix patterns catch them.
const IRREGULAR: readonly string[] = irregularParticiples;

export const PASSIVE_VOICE_PATTERNS: readonly RegExp[] = [
  new RegExp(`${WORD_START}${BE_VERB}\\s+${WORD_CHAR}+ed${WORD_END}`, 'giu'),
  new RegExp(`${WORD_START}${BE_VERB}\\s+${WORD_CHAR}+en${WORD_END}`, 'giu'),
  new RegExp(`${WORD_START}${BE_VERB}\\s+(?:${IRREGULAR.join('|')})${WORD_END}`, 'giu'),
];

export function detectPassiveVoice(text: string): StyleFinding[] {
  const findings: StyleFinding[] = [];

  for (const pattern of PASSIVE_VOICE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      findings.push({
        message: 'Consider using active voice for more direct writing',
        category: 'passive_voice',
        offset: index,
        length: match[0].length,
        original: match[0],
        suggestion: 'Consider rewriting in active voice',
      });
    }
  }

  return findings;
}

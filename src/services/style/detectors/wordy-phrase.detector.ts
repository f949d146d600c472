import type { StyleFinding } from '../../../types/analysis.types';
import { WORD_START, WORD_END } from './types';

interface WordyPhrase {
  pattern: RegExp;
  replacement: string;
}

const wordy = (phrase: string, replacement: string): WordyPhrase => ({
  pattern: new RegExp(`${WORD_START}${phrase}${WORD_END}`, 'giu'),
  replacement,
});

export const WORDY_PHRASES: readonly WordyPhrase[] = [
  wordy('at this point in time', 'now'),
  wordy('due to the fact that', 'because'),
  wordy('in order to', 'to'),
  wordy('for the purpose of', 'to'),
  wordy('in the event that', 'if'),
  wordy('with regard to', 'about'),
  wordy('in spite of the fact that', 'although'),
  wordy('a number of', 'many'),
  wordy('prior to', 'before'),
];

/** Wordy phrases with a shorter equivalent, reported phrase by phrase. */
export function detectWordyPhrases(text: string): StyleFinding[] {
  const findings: StyleFinding[] = [];

  for (const { pattern, replacement } of WORDY_PHRASES) {
    for (const match of text.matchAll(pattern)) {
      findings.push({
        message: `Consider simplifying to '${replacement}'`,
        category: 'wordiness',
        offset: match.index ?? 0,
        length: match[0].length,
        original: match[0],
        suggestion: replacement,
      });
    }
  }

  return findings;
}

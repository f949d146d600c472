/**
 * Long sentence detection.
 * Sentences over MAX_SENTENCE_WORDS whitespace-delimited words are flagged at
 * the span the tokenizer located them at.
 */

import type { StyleFinding } from '../../../types/analysis.types';
import { compromiseTokenizer, countWords, type Tokenizer } from '../../text/tokenizer';

export const MAX_SENTENCE_WORDS = 30;
const PREVIEW_LENGTH = 50;

/** First PREVIEW_LENGTH characters plus an ellipsis; never splits a surrogate pair. */
export function previewSentence(sentence: string): string {
  const chars = Array.from(sentence);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}...` : sentence;
}

export function detectLongSentences(text: string, tokenizer: Tokenizer = compromiseTokenizer): StyleFinding[] {
  const findings: StyleFinding[] = [];

  for (const sentence of tokenizer.splitSentences(text)) {
    const wordCount = countWords(sentence.text);
    if (wordCount <= MAX_SENTENCE_WORDS) continue;

    findings.push({
      message: `This sentence has ${wordCount} words. Consider breaking it into shorter sentences for better readability.`,
      category: 'sentence_length',
      offset: sentence.start,
      length: sentence.text.length,
      original: previewSentence(sentence.text),
      suggestion: 'Break into shorter sentences',
    });
  }

  return findings;
}

/**
 * Sentence and word tokenization.
 *
 * Sentence boundaries come from compromise; each sentence is then located in
 * the original text so callers get offsets, not just strings.
 */

import nlp from 'compromise';

export interface SentenceSpan {
  text: string;
  start: number;
  end: number;
}

export interface Tokenizer {
  splitSentences(text: string): SentenceSpan[];
}

/** Number of whitespace-delimited tokens. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Locate each sentence in `text`, searching from the end of the previous one.
 * A sentence the tokenizer normalized beyond recognition keeps the cursor position.
 */
export function locateSentences(text: string, sentences: string[]): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let cursor = 0;

  for (const sentence of sentences) {
    const found = text.indexOf(sentence, cursor);
    const start = found >= 0 ? found : Math.min(cursor, text.length);
    const end = Math.min(start + sentence.length, text.length);

    spans.push({ text: sentence, start, end });
    cursor = end;
  }

  return spans;
}

function extractSentenceTexts(text: string): string[] {
  const out: unknown = nlp(text).sentences().out('array');
  if (!Array.isArray(out)) return [];

  return out
    .filter((sentence): sentence is string => typeof sentence === 'string')
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export const compromiseTokenizer: Tokenizer = {
  splitSentences(text: string): SentenceSpan[] {
    if (text.trim().length === 0) return [];
    return locateSentences(text, extractSentenceTexts(text));
  },
};

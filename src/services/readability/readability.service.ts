/**
 * Readability Service
 *
 * Standard readability indices over words, sentences and syllables.
 * Syllables come from `syllable`; the difficult-word count excludes the
 * Dale-Chall list of familiar words.
 */

import { syllable } from 'syllable';
import { daleChall } from 'dale-chall';
import type { ReadabilityMetrics } from '../../types/analysis.types';
import { compromiseTokenizer, type Tokenizer } from '../text/tokenizer';

export interface ReadabilityCapability {
  compute(text: string): ReadabilityMetrics;
}

const MS_PER_CHARACTER = 14.69;

const EASY_WORDS: ReadonlySet<string> = new Set(daleChall.map((word) => word.toLowerCase()));

const EMPTY_METRICS: ReadabilityMetrics = {
  fleschReadingEase: 0,
  fleschKincaidGrade: 0,
  gunningFog: 0,
  smogIndex: 0,
  automatedReadabilityIndex: 0,
  colemanLiauIndex: 0,
  difficultWords: 0,
  readingTimeMinutes: 0,
};

/** Whitespace tokens with punctuation removed; tokens left without a letter or digit are dropped. */
export function extractWords(text: string): string[] {
  return text
    .replace(/[^\p{L}\p{N}\s'’-]/gu, '')
    .split(/\s+/)
    .filter((word) => /[\p{L}\p{N}]/u.test(word));
}

/** Estimated reading time from the non-whitespace character count. */
export function readingTimeMinutes(text: string): number {
  const characters = Array.from(text.replace(/\s/g, '')).length;
  return (characters * MS_PER_CHARACTER) / 1000 / 60;
}

export class ReadabilityService implements ReadabilityCapability {
  constructor(private readonly tokenizer: Tokenizer = compromiseTokenizer) {}

  compute(text: string): ReadabilityMetrics {
    const words = extractWords(text);
    if (words.length === 0) return { ...EMPTY_METRICS };

    const wordCount = words.length;
    const sentenceCount = Math.max(1, this.tokenizer.splitSentences(text).length);
    const syllableCounts = words.map((word) => syllable(word));
    const syllables = syllableCounts.reduce((sum, count) => sum + count, 0);
    const polysyllables = syllableCounts.filter((count) => count >= 3).length;
    const letters = words.join('').replace(/[^\p{L}\p{N}]/gu, '').length;

    const wordsPerSentence = wordCount / sentenceCount;
    const syllablesPerWord = syllables / wordCount;
    const lettersPer100Words = (letters / wordCount) * 100;
    const sentencesPer100Words = (sentenceCount / wordCount) * 100;

    return {
      fleschReadingEase: 206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord,
      fleschKincaidGrade: 0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59,
      gunningFog: 0.4 * (wordsPerSentence + (polysyllables / wordCount) * 100),
      // SMOG is undefined below three sentences
      smogIndex: sentenceCount >= 3 ? 1.043 * Math.sqrt(polysyllables * (30 / sentenceCount)) + 3.1291 : 0,
      automatedReadabilityIndex: 4.71 * (letters / wordCount) + 0.5 * wordsPerSentence - 21.43,
      colemanLiauIndex: 0.0588 * lettersPer100Words - 0.296 * sentencesPer100Words - 15.8,
      difficultWords: this.countDifficultWords(words),
      readingTimeMinutes: readingTimeMinutes(text),
    };
  }

  private countDifficultWords(words: string[]): number {
    const difficult = new Set<string>();
    for (const word of words) {
      const normalized = word.toLowerCase();
      if (!EASY_WORDS.has(normalized) && syllable(normalized) >= 2) {
        difficult.add(normalized);
      }
    }
    return difficult.size;
  }
}

export const readabilityService = new ReadabilityService();

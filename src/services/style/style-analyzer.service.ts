/**
 * Style Analyzer
 *
 * Runs the pattern detectors over the full text and concatenates their
 * findings in a fixed order: passive voice, wordiness, sentence length,
 * repetition. Findings are not sorted or merged; spans may overlap.
 */

import type { StyleFinding } from '../../types/analysis.types';
import { compromiseTokenizer, type Tokenizer } from '../text/tokenizer';
import {
  detectPassiveVoice,
  detectWordyPhrases,
  detectLongSentences,
  detectRepeatedWords,
} from './detectors';

export class StyleAnalyzer {
  constructor(private readonly tokenizer: Tokenizer = compromiseTokenizer) {}

  analyze(text: string): StyleFinding[] {
    return [
      ...detectPassiveVoice(text),
      ...detectWordyPhrases(text),
      ...detectLongSentences(text, this.tokenizer),
      ...detectRepeatedWords(text),
    ];
  }
}

export const styleAnalyzer = new StyleAnalyzer();

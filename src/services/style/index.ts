/**
 * Style Services Index
 *
 * Exports the style analyzer and its individual detectors
 */

export { StyleAnalyzer, styleAnalyzer } from './style-analyzer.service';

export {
  detectPassiveVoice,
  detectWordyPhrases,
  detectLongSentences,
  detectRepeatedWords,
  previewSentence,
  WORDY_PHRASES,
  MAX_SENTENCE_WORDS,
  INTENTIONAL_REPEATS,
} from './detectors';
export type { StyleDetector } from './detectors';

export { detectPassiveVoice, PASSIVE_VOICE_PATTERNS } from './passive-voice.detector';
export { detectWordyPhrases, WORDY_PHRASES } from './wordy-phrase.detector';
export { detectLongSentences, previewSentence, MAX_SENTENCE_WORDS } from './sentence-length.detector';
export { detectRepeatedWords, INTENTIONAL_REPEATS } from './repeated-word.detector';
export type { StyleDetector } from './types';

/**
 * Analysis Type Definitions
 *
 * Value records produced by a single analysis run. Offsets are string indices
 * into the original text.
 */

export type GrammarSeverity = 'error' | 'warning';

export interface GrammarFinding {
  readonly message: string;
  readonly ruleId: string;
  readonly category: string;
  readonly offset: number;
  readonly length: number;
  /** Up to 20 characters either side of the flagged span. */
  readonly context: string;
  readonly suggestions: readonly string[];
  readonly severity: GrammarSeverity;
}

export const STYLE_CATEGORIES = ['passive_voice', 'wordiness', 'sentence_length', 'repetition'] as const;

export type StyleCategory = (typeof STYLE_CATEGORIES)[number];

export interface StyleFinding {
  readonly message: string;
  readonly category: StyleCategory;
  readonly offset: number;
  readonly length: number;
  readonly original: string;
  readonly suggestion: string;
}

export interface ReadabilityMetrics {
  readonly fleschReadingEase: number;
  readonly fleschKincaidGrade: number;
  readonly gunningFog: number;
  readonly smogIndex: number;
  readonly automatedReadabilityIndex: number;
  readonly colemanLiauIndex: number;
  readonly difficultWords: number;
  readonly readingTimeMinutes: number;
}

export interface AnalysisResult {
  readonly originalText: string;
  readonly grammarIssues: readonly GrammarFinding[];
  readonly styleSuggestions: readonly StyleFinding[];
  readonly readability: ReadabilityMetrics;
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly characterCount: number;
  /** Overall quality, 0-100. */
  readonly score: number;
}

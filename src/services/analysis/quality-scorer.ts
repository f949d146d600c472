/**
 * Quality Scorer
 *
 * Deterministic 0-100 score. Starting from 100:
 *   - 2.0 per error-severity grammar finding, 0.5 per warning
 *   - 0.3 per style finding, whatever its category
 *   - 5.0 when Flesch Reading Ease < 30, 2.0 when > 90
 * then clamped to [0, 100]. Constants and order are part of the contract.
 */

import type { GrammarFinding, ReadabilityMetrics, StyleFinding } from '../../types/analysis.types';

export const SCORE_WEIGHTS = {
  base: 100,
  grammarError: 2.0,
  grammarWarning: 0.5,
  styleFinding: 0.3,
  tooDifficult: 5.0,
  tooSimple: 2.0,
} as const;

export const READING_EASE_BOUNDS = { difficult: 30, simple: 90 } as const;

export function calculateQualityScore(
  grammarIssues: readonly Pick<GrammarFinding, 'severity'>[],
  styleSuggestions: readonly StyleFinding[],
  readability: Pick<ReadabilityMetrics, 'fleschReadingEase'>
): number {
  let score: number = SCORE_WEIGHTS.base;

  for (const issue of grammarIssues) {
    score -= issue.severity === 'error' ? SCORE_WEIGHTS.grammarError : SCORE_WEIGHTS.grammarWarning;
  }

  score -= styleSuggestions.length * SCORE_WEIGHTS.styleFinding;

  if (readability.fleschReadingEase < READING_EASE_BOUNDS.difficult) {
    score -= SCORE_WEIGHTS.tooDifficult;
  } else if (readability.fleschReadingEase > READING_EASE_BOUNDS.simple) {
    score -= SCORE_WEIGHTS.tooSimple;
  }

  return Math.max(0, Math.min(100, score));
}

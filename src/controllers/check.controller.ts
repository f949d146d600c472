/**
 * Check Controller
 *
 * Handles analysis API requests:
 * - Analyze text (optionally with an auto-corrected rewrite)
 * - Correct text
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger';
import type { WritingAnalyzer } from '../services/analysis/writing-analyzer.service';
import type { AnalysisResult } from '../types/analysis.types';
import type { CheckTextBody, CorrectTextBody } from '../schemas/check.schemas';

/** Wire shape of an analysis; field names follow the public snake_case API. */
export interface CheckResponse {
  original_text: string;
  corrected_text: string | null;
  grammar_issues: Array<{
    message: string;
    rule_id: string;
    category: string;
    offset: number;
    length: number;
    context: string;
    suggestions: string[];
    severity: string;
  }>;
  style_suggestions: Array<{
    message: string;
    category: string;
    offset: number;
    length: number;
    original: string;
    suggestion: string;
  }>;
  readability: {
    flesch_reading_ease: number;
    flesch_kincaid_grade: number;
    gunning_fog: number;
    smog_index: number;
    automated_readability_index: number;
    coleman_liau_index: number;
    difficult_words: number;
    reading_time_minutes: number;
  };
  word_count: number;
  sentence_count: number;
  character_count: number;
  score: number;
}

export function toCheckResponse(result: AnalysisResult, correctedText: string | null = null): CheckResponse {
  const { readability } = result;

  return {
    original_text: result.originalText,
    corrected_text: correctedText,
    grammar_issues: result.grammarIssues.map((issue) => ({
      message: issue.message,
      rule_id: issue.ruleId,
      category: issue.category,
      offset: issue.offset,
      length: issue.length,
      context: issue.context,
      suggestions: [...issue.suggestions],
      severity: issue.severity,
    })),
    style_suggestions: result.styleSuggestions.map((suggestion) => ({
      message: suggestion.message,
      category: suggestion.category,
      offset: suggestion.offset,
      length: suggestion.length,
      original: suggestion.original,
      suggestion: suggestion.suggestion,
    })),
    readability: {
      flesch_reading_ease: readability.fleschReadingEase,
      flesch_kincaid_grade: readability.fleschKincaidGrade,
      gunning_fog: readability.gunningFog,
      smog_index: readability.smogIndex,
      automated_readability_index: readability.automatedReadabilityIndex,
      coleman_liau_index: readability.colemanLiauIndex,
      difficult_words: readability.difficultWords,
      reading_time_minutes: readability.readingTimeMinutes,
    },
    word_count: result.wordCount,
    sentence_count: result.sentenceCount,
    character_count: result.characterCount,
    score: result.score,
  };
}

export class CheckController {
  constructor(private readonly analyzer: WritingAnalyzer) {}

  /**
   * Analyze text
   * POST /api/check
   */
  async check(req: Request, res: Response, next: NextFunction) {
    try {
      const body: CheckTextBody = req.body;

      const result = await this.analyzer.analyze(body.text);
      const correctedText = body.auto_correct ? await this.analyzer.correctText(body.text) : null;

      logger.info(
        `[CheckController] Analyzed ${result.wordCount} words: score=${result.score.toFixed(1)}, ` +
          `grammar=${result.grammarIssues.length}, style=${result.styleSuggestions.length}`
      );

      return res.status(200).json({
        success: true,
        data: toCheckResponse(result, correctedText),
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Correct text
   * POST /api/correct
   */
  async correct(req: Request, res: Response, next: NextFunction) {
    try {
      const body: CorrectTextBody = req.body;
      const correctedText = await this.analyzer.correctText(body.text);

      return res.status(200).json({
        success: true,
        data: {
          original_text: body.text,
          corrected_text: correctedText,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

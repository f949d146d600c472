/**
 * Writing Analyzer
 *
 * Combines grammar findings, style findings, readability metrics and basic
 * counts into one AnalysisResult, and forwards correction requests to the
 * grammar capability. The grammar capability is injected and owned by the
 * caller; the analyzer never closes it.
 */

import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import type {
  AnalysisResult,
  GrammarFinding,
  GrammarSeverity,
  ReadabilityMetrics,
} from '../../types/analysis.types';
import { toGrammarServiceError, type GrammarCapability, type GrammarMatch } from '../grammar';
import { readabilityService, type ReadabilityCapability } from '../readability/readability.service';
import { styleAnalyzer, type StyleAnalyzer } from '../style';
import { compromiseTokenizer, countWords, type Tokenizer } from '../text/tokenizer';
import { calculateQualityScore } from './quality-scorer';

const CONTEXT_WINDOW = 20;
const MAX_SUGGESTIONS = 3;
const ERROR_CATEGORIES: ReadonlySet<string> = new Set(['GRAMMAR', 'TYPOS']);

export interface WritingAnalyzerDeps {
  grammar: GrammarCapability;
  readability?: ReadabilityCapability;
  style?: StyleAnalyzer;
  tokenizer?: Tokenizer;
}

export function severityForCategory(category: string): GrammarSeverity {
  return ERROR_CATEGORIES.has(category) ? 'error' : 'warning';
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/** Widen [start, end) so neither edge splits a surrogate pair. */
function codePointBounds(text: string, start: number, end: number): [number, number] {
  const splitsPair = (index: number): boolean =>
    index > 0 &&
    index < text.length &&
    isHighSurrogate(text.charCodeAt(index - 1)) &&
    isLowSurrogate(text.charCodeAt(index));

  const from = splitsPair(start) ? start - 1 : start;
  const to = splitsPair(end) ? end + 1 : end;
  return [from, to];
}

export function toGrammarFinding(text: string, match: GrammarMatch): GrammarFinding {
  const [start, end] = codePointBounds(
    text,
    Math.max(0, match.offset - CONTEXT_WINDOW),
    Math.min(text.length, match.offset + match.errorLength + CONTEXT_WINDOW)
  );

  return {
    message: match.message,
    ruleId: match.ruleId,
    category: match.category,
    offset: match.offset,
    length: match.errorLength,
    context: text.slice(start, end),
    suggestions: match.replacements.slice(0, MAX_SUGGESTIONS),
    severity: severityForCategory(match.category),
  };
}

export class WritingAnalyzer {
  private readonly grammar: GrammarCapability;
  private readonly readability: ReadabilityCapability;
  private readonly style: StyleAnalyzer;
  private readonly tokenizer: Tokenizer;

  constructor(deps: WritingAnalyzerDeps) {
    this.grammar = deps.grammar;
    this.readability = deps.readability ?? readabilityService;
    this.style = deps.style ?? styleAnalyzer;
    this.tokenizer = deps.tokenizer ?? compromiseTokenizer;
  }

  async analyze(text: string): Promise<AnalysisResult> {
    const started = Date.now();

    const matches = await this.checkGrammar(text);
    const grammarIssues = matches.map((match) => toGrammarFinding(text, match));
    const styleSuggestions = this.style.analyze(text);
    const readability = this.computeReadability(text);

    const result: AnalysisResult = {
      originalText: text,
      grammarIssues,
      styleSuggestions,
      readability,
      wordCount: countWords(text),
      sentenceCount: this.tokenizer.splitSentences(text).length,
      characterCount: Array.from(text).length,
      score: calculateQualityScore(grammarIssues, styleSuggestions, readability),
    };

    logger.debug(
      `[WritingAnalyzer] ${grammarIssues.length} grammar, ${styleSuggestions.length} style, ` +
        `score=${result.score.toFixed(1)} in ${Date.now() - started}ms`
    );

    return result;
  }

  async correctText(text: string): Promise<string> {
    const matches = await this.checkGrammar(text);
    return this.grammar.correct(text, matches);
  }

  private async checkGrammar(text: string): Promise<GrammarMatch[]> {
    try {
      return await this.grammar.check(text);
    } catch (error) {
      throw toGrammarServiceError(error);
    }
  }

  private computeReadability(text: string): ReadabilityMetrics {
    try {
      return this.readability.compute(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw AppError.internal(`Readability computation failed: ${message}`, ErrorCodes.READABILITY_ERROR);
    }
  }
}

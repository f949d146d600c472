import chalk from 'chalk';
import type { AnalysisResult } from '../types/analysis.types';

export const SEPARATOR = '='.repeat(80);

export type ScoreColorizer = (score: number) => string;

/** Green from 90, yellow from 75, red below. */
export const colorScore: ScoreColorizer = (score) => {
  const label = score.toFixed(1);
  if (score >= 90) return chalk.green(label);
  if (score >= 75) return chalk.yellow(label);
  return chalk.red(label);
};

export interface ReportOptions {
  verbose?: boolean;
  colorize?: ScoreColorizer;
}

function section(title: string): string[] {
  return [SEPARATOR, title, SEPARATOR];
}

export function formatAnalysisReport(result: AnalysisResult, options: ReportOptions = {}): string[] {
  const { verbose = false, colorize = colorScore } = options;
  const lines: string[] = [];

  lines.push(
    ...section('ANALYSIS SUMMARY'),
    `Quality Score: ${colorize(result.score)}/100`,
    `Word Count: ${result.wordCount}`,
    `Sentence Count: ${result.sentenceCount}`,
    `Character Count: ${result.characterCount}`,
    `Grammar Issues: ${result.grammarIssues.length}`,
    `Style Suggestions: ${result.styleSuggestions.length}`
  );

  if (result.grammarIssues.length > 0) {
    lines.push(...section('GRAMMAR ISSUES'));
    result.grammarIssues.forEach((issue, index) => {
      const marker = issue.severity === 'error' ? '❌' : '⚠️';
      lines.push('', `${marker} Issue ${index + 1}: ${issue.message}`);
      lines.push(`   Category: ${issue.category}`);
      lines.push(`   Context: ...${issue.context}...`);
      if (issue.suggestions.length > 0) {
        lines.push(`   Suggestions: ${issue.suggestions.join(', ')}`);
      }
      if (verbose) {
        lines.push(`   Rule ID: ${issue.ruleId}`);
        lines.push(`   Position: ${issue.offset} (length ${issue.length})`);
      }
    });
  }

  if (result.styleSuggestions.length > 0) {
    lines.push(...section('STYLE SUGGESTIONS'));
    result.styleSuggestions.forEach((suggestion, index) => {
      lines.push('', `💡 Suggestion ${index + 1}: ${suggestion.message}`);
      lines.push(`   Category: ${suggestion.category}`);
      lines.push(`   Original: ${suggestion.original}`);
      lines.push(`   Suggestion: ${suggestion.suggestion}`);
      if (verbose) {
        lines.push(`   Position: ${suggestion.offset} (length ${suggestion.length})`);
      }
    });
  }

  const { readability } = result;
  lines.push(
    ...section('READABILITY METRICS'),
    `Flesch Reading Ease: ${readability.fleschReadingEase.toFixed(1)}`,
    `Flesch-Kincaid Grade: ${readability.fleschKincaidGrade.toFixed(1)}`,
    `Gunning Fog Index: ${readability.gunningFog.toFixed(1)}`,
    `SMOG Index: ${readability.smogIndex.toFixed(1)}`,
    `Difficult Words: ${readability.difficultWords}`,
    `Reading Time: ${readability.readingTimeMinutes.toFixed(1)} minutes`
  );

  return lines;
}

export function formatClosingLine(result: AnalysisResult): string {
  if (result.grammarIssues.length === 0 && result.styleSuggestions.length === 0) {
    return '✅ Excellent! No issues found.';
  }
  return `Found ${result.grammarIssues.length} grammar issues and ${result.styleSuggestions.length} style suggestions.`;
}

import type { GrammarCapability, GrammarMatch } from '../../src/services/grammar/grammar-capability';
import { applyCorrections } from '../../src/services/grammar/apply-corrections';
import type { ReadabilityCapability } from '../../src/services/readability/readability.service';
import type { ReadabilityMetrics } from '../../src/types/analysis.types';

export function grammarMatch(overrides: Partial<GrammarMatch> = {}): GrammarMatch {
  return {
    offset: 0,
    errorLength: 1,
    message: 'Possible grammar error',
    ruleId: 'TEST_RULE',
    category: 'GRAMMAR',
    replacements: [],
    ...overrides,
  };
}

/** Flags every "don't" as a subject-verb agreement error. */
export function agreementMatches(text: string): GrammarMatch[] {
  const matches: GrammarMatch[] = [];
  for (const match of text.matchAll(/don't/g)) {
    matches.push(
      grammarMatch({
        offset: match.index ?? 0,
        errorLength: match[0].length,
        message: 'The verb form does not agree with the subject.',
        ruleId: 'HE_VERB_AGR',
        category: 'GRAMMAR',
        replacements: ["doesn't", 'does not', 'did not', 'do not'],
      })
    );
  }
  return matches;
}

export class FakeGrammarCapability implements GrammarCapability {
  readonly checked: string[] = [];
  closeCount = 0;

  constructor(
    private readonly respond: (text: string) => GrammarMatch[] | Promise<GrammarMatch[]> = agreementMatches
  ) {}

  async check(text: string): Promise<GrammarMatch[]> {
    this.checked.push(text);
    return this.respond(text);
  }

  correct(text: string, matches: readonly GrammarMatch[]): string {
    return applyCorrections(text, matches);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

export function fixedReadability(overrides: Partial<ReadabilityMetrics> = {}): ReadabilityCapability {
  const metrics: ReadabilityMetrics = {
    fleschReadingEase: 65,
    fleschKincaidGrade: 8,
    gunningFog: 10,
    smogIndex: 9,
    automatedReadabilityIndex: 8,
    colemanLiauIndex: 9,
    difficultWords: 0,
    readingTimeMinutes: 0.1,
    ...overrides,
  };
  return { compute: () => metrics };
}

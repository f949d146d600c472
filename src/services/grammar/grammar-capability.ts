/**
 * Grammar Capability
 *
 * Contract for the rule-based grammar checker the analyzer delegates to.
 * Implementations may hold a long-lived connection and must be released with
 * close() exactly once.
 */

export interface GrammarMatch {
  offset: number;
  errorLength: number;
  message: string;
  ruleId: string;
  /** Coarse category id, e.g. GRAMMAR, TYPOS, STYLE. */
  category: string;
  replacements: string[];
}

export interface GrammarCapability {
  check(text: string): Promise<GrammarMatch[]>;
  correct(text: string, matches: readonly GrammarMatch[]): string;
  close(): Promise<void>;
}

/**
 * Run `work` against the capability and release it afterwards, whether or not
 * `work` succeeded.
 */
export async function withGrammarCapability<T>(
  capability: GrammarCapability,
  work: (grammar: GrammarCapability) => Promise<T>
): Promise<T> {
  try {
    return await work(capability);
  } finally {
    await capability.close();
  }
}

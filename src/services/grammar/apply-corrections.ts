import type { GrammarMatch } from './grammar-capability';

/**
 * Rewrite `text` using the first replacement of each match.
 *
 * Matches are applied in offset order. Matches without replacements, matches
 * overlapping an edit already applied, and matches running past the end of the
 * text are skipped.
 */
export function applyCorrections(text: string, matches: readonly GrammarMatch[]): string {
  const applicable = matches
    .filter((match) => match.replacements.length > 0)
    .sort((a, b) => a.offset - b.offset);

  let corrected = '';
  let cursor = 0;

  for (const match of applicable) {
    const end = match.offset + match.errorLength;
    if (match.offset < cursor || end > text.length) continue;

    corrected += text.slice(cursor, match.offset) + match.replacements[0];
    cursor = end;
  }

  return corrected + text.slice(cursor);
}

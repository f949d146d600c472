export { LanguageToolClient, parseCheckResponse, toGrammarMatch } from './languagetool.client';
export { applyCorrections } from './apply-corrections';
export { toGrammarServiceError } from './grammar-errors';
export { withGrammarCapability } from './grammar-capability';
export type { GrammarCapability, GrammarMatch } from './grammar-capability';

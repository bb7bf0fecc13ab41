/**
 * Retrieval system exports.
 */

// Relevance retrieval
export { RelevanceRetriever } from './relevance-retriever.js';
export type { RelevanceRetrieverDeps } from './relevance-retriever.js';

// Scoring
export {
  MAX_SCORE,
  boostScore,
  resolvePromotionLevel,
  toRetrievedDocument,
  compareByScore,
} from './scoring.js';

// Context assembler
export { ContextAssembler } from './context-assembler.js';
export type { ContextAssemblerDeps } from './context-assembler.js';
export type { ContextSource, ContextEntry, RAGContext } from './types.js';

// Formatting
export {
  ENTRY_SEPARATOR,
  formatContext,
  formatEntry,
  formatHeader,
  trimToCharBudget,
} from './context-format.js';
export type { FormattedContext } from './context-format.js';

export { createKnowledgeEngine } from './knowledge-engine.js';
export type {
  KnowledgeEngine,
  KnowledgeEngineOptions,
  IndexDocumentInput,
  IndexDocumentResult,
  DeleteDocumentResult,
} from './knowledge-engine.js';

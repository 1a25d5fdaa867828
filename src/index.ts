export * from './core/retrieval';
export {
  RetrievalConfigSchema,
  defaultRetrievalConfig,
  loadRetrievalConfig,
  mergeRetrievalConfig,
} from './core/config';
export type { RetrievalConfig, RetrievalConfigOverrides } from './core/config';
export { InvalidInputError, UpstreamError, UpstreamTimeoutError } from './core/errors';
export { createLogger, retrievalLogger } from './core/log';
export type { Logger, RetrievalKind } from './core/log';
export { HashEmbeddingService, hashEmbedding } from './core/embedding';
export { LanceVectorSearch } from './core/lancedb';
export { OllamaCompletionService, OllamaEmbeddingService } from './core/ollama';
export { createCollaborators } from './core/services';

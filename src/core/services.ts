import type { RetrievalConfig } from './config';
import { HashEmbeddingService } from './embedding';
import { LanceVectorSearch } from './lancedb';
import { OllamaCompletionService, OllamaEmbeddingService } from './ollama';
import type { RouterCollaborators } from './retrieval/router';

export interface CollaboratorChoices {
  /** Skip the completion service: heuristic classification, no HyDE. */
  offline?: boolean;
}

export function createCollaborators(config: RetrievalConfig, choices: CollaboratorChoices = {}): RouterCollaborators {
  const p = config.providers;
  const embedding =
    p.embedding === 'hash'
      ? new HashEmbeddingService({ dim: p.hashDim })
      : new OllamaEmbeddingService({ baseUrl: p.ollamaBaseUrl, model: p.embeddingModel });
  const vectorSearch = new LanceVectorSearch({ dbDir: p.dbDir, table: p.table });
  if (choices.offline) return { embedding, vectorSearch };
  return {
    completion: new OllamaCompletionService({ baseUrl: p.ollamaBaseUrl, model: p.llmModel }),
    embedding,
    vectorSearch,
  };
}

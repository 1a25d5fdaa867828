import { handleBatch } from './handlers/batchHandlers';
import { handleAnalyze, handleRetrieve } from './handlers/retrievalHandlers';
import { AnalyzeSchema, BatchSchema, RetrieveSchema } from './schemas/retrievalSchemas';
import { defineHandler, type RegisteredHandler } from './types';

export const cliHandlers: Record<string, RegisteredHandler> = {
  analyze: defineHandler({ schema: AnalyzeSchema, handler: (input) => handleAnalyze(input) }),
  retrieve: defineHandler({ schema: RetrieveSchema, handler: (input) => handleRetrieve(input) }),
  batch: defineHandler({ schema: BatchSchema, handler: (input) => handleBatch(input) }),
};

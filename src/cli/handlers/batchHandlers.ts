import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { InvalidInputError, errorMessage } from '../../core/errors';
import { createLogger } from '../../core/log';
import { RetrievalRouter, RetrievalScopeSchema, RetrieveOptionsSchema } from '../../core/retrieval/router';
import { UsageStats } from '../../core/retrieval/stats';
import type { RetrievalScope, RetrieveOptions } from '../../core/retrieval/types';
import { defaultDeps, resolveConfig, retrieveOptionsFromFlags, scopeFromFlags, type HandlerDeps } from '../helpers';
import type { BatchInput } from '../schemas/retrievalSchemas';
import { ErrorHints, ErrorReasons, error, isCLIError, success, type CLIError, type CLIResult } from '../types';

const BatchEntrySchema = z.union([
  z.string().transform((question) => ({ question })),
  z.object({
    question: z.string(),
    scope: RetrievalScopeSchema.optional(),
    options: RetrieveOptionsSchema.partial().optional(),
  }),
]);

export type BatchEntry = z.infer<typeof BatchEntrySchema>;

/**
 * `.json` files hold an array of entries; anything else is one question per
 * line, skipping blank lines and `#` comments.
 */
export function parseBatchText(text: string, format: 'json' | 'lines'): BatchEntry[] {
  if (format === 'json') {
    const raw: unknown = JSON.parse(text);
    return z.array(BatchEntrySchema).parse(raw);
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((question) => ({ question }));
}

export async function readBatchFile(file: string): Promise<BatchEntry[]> {
  const text = await fs.readFile(file, 'utf-8');
  return parseBatchText(text, path.extname(file).toLowerCase() === '.json' ? 'json' : 'lines');
}

export async function handleBatch(input: BatchInput, deps: HandlerDeps = defaultDeps): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'batch' });
  const config = await resolveConfig(input, deps);
  if (isCLIError(config)) return config;

  const file = path.resolve(input.file);
  let entries: BatchEntry[];
  try {
    entries = await readBatchFile(file);
  } catch (e) {
    return error(ErrorReasons.BATCH_FILE_INVALID, { message: errorMessage(e), file, hint: ErrorHints.BATCH_FILE_INVALID });
  }

  const stats = new UsageStats();
  const router = new RetrievalRouter(deps.createCollaborators(config, { offline: input.offline }), { config, stats });
  const baseScope = scopeFromFlags(input);
  const baseOptions = retrieveOptionsFromFlags(input);

  const results: Array<Record<string, unknown>> = [];
  for (const entry of entries) {
    const scope: RetrievalScope = 'scope' in entry && entry.scope ? entry.scope : baseScope;
    const options: RetrieveOptions = { ...baseOptions, ...('options' in entry ? entry.options : {}) };
    try {
      const result = await router.retrieve(entry.question, scope, options);
      results.push({
        question: entry.question,
        ok: true,
        strategyUsed: result.strategyUsed,
        chunks: result.chunks.length,
        topChunkIds: result.chunks.slice(0, 5).map((c) => c.id),
        hydeUsed: result.hyde.used,
        fallbackTriggered: result.hyde.fallbackTriggered,
      });
    } catch (e) {
      if (!(e instanceof InvalidInputError)) {
        log.error('batch_entry', { ok: false, err: errorMessage(e) });
      }
      const reason = e instanceof InvalidInputError ? ErrorReasons.INVALID_INPUT : ErrorReasons.RETRIEVAL_FAILED;
      results.push({ question: entry.question, ok: false, reason, message: errorMessage(e) });
    }
  }

  const snapshot = stats.snapshot();
  if (input.statsOut) {
    await fs.outputJSON(path.resolve(input.statsOut), snapshot, { spaces: 2 });
  }
  const failed = results.filter((r) => r.ok === false).length;
  return success({
    file,
    total: results.length,
    succeeded: results.length - failed,
    failed,
    results,
    stats: snapshot,
    ...(input.statsOut ? { statsOut: path.resolve(input.statsOut) } : {}),
  });
}

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const positiveMs = z.coerce.number().int().positive();
const nonNegative = z.coerce.number().nonnegative();

const BoostSchema = z
  .object({
    single: z.number().positive(),
    double: z.number().positive(),
    multiple: z.number().positive(),
  })
  .refine((b) => b.single <= b.double && b.double <= b.multiple, {
    message: 'boosts must be non-decreasing: single <= double <= multiple',
  });

export const RetrievalConfigSchema = z.object({
  topK: z.object({
    initial: positiveInt,
    final: positiveInt,
  }),
  analyzer: z.object({
    maxSubQueries: positiveInt,
    maxTokens: positiveInt,
    temperature: nonNegative,
  }),
  multihop: z.object({
    maxConcurrency: positiveInt,
    boosts: BoostSchema,
  }),
  hyde: z.object({
    rrfK: positiveInt,
    hydeWeight: z.number().gt(0).lt(1),
    hydeMinK: positiveInt,
    originalMinK: positiveInt,
    maxTokens: positiveInt,
    temperature: nonNegative,
    inputTokenPrice: nonNegative,
    outputTokenPrice: nonNegative,
  }),
  fallback: z.object({
    enabled: z.boolean(),
    threshold: nonNegative,
    minImprovement: z.number().min(1),
    overrideSkipRules: z.boolean(),
  }),
  timeouts: z.object({
    completionMs: positiveMs,
    embeddingMs: positiveMs,
    searchMs: positiveMs,
  }),
  providers: z.object({
    ollamaBaseUrl: z.string().url(),
    llmModel: z.string().min(1),
    embedding: z.enum(['ollama', 'hash']),
    embeddingModel: z.string().min(1),
    hashDim: positiveInt,
    dbDir: z.string().min(1),
    table: z.string().min(1),
  }),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

export type RetrievalConfigOverrides = {
  [K in keyof RetrievalConfig]?: Partial<RetrievalConfig[K]>;
};

export const DEFAULT_CONFIG_FILE = '.adaptive-rag.json';

export function defaultRetrievalConfig(): RetrievalConfig {
  return {
    topK: { initial: 20, final: 30 },
    analyzer: { maxSubQueries: 5, maxTokens: 400, temperature: 0.1 },
    multihop: {
      maxConcurrency: 4,
      boosts: { single: 1.0, double: 1.3, multiple: 1.5 },
    },
    hyde: {
      rrfK: 60,
      hydeWeight: 0.7,
      hydeMinK: 10,
      originalMinK: 5,
      maxTokens: 150,
      temperature: 0.3,
      // USD per token
      inputTokenPrice: 0.15 / 1_000_000,
      outputTokenPrice: 0.6 / 1_000_000,
    },
    fallback: {
      enabled: true,
      threshold: 0.3,
      minImprovement: 1.2,
      overrideSkipRules: true,
    },
    timeouts: { completionMs: 20_000, embeddingMs: 10_000, searchMs: 10_000 },
    providers: {
      ollamaBaseUrl: 'http://localhost:11434',
      llmModel: 'llama3.2',
      embedding: 'ollama',
      embeddingModel: 'nomic-embed-text',
      hashDim: 256,
      dbDir: path.join('.adaptive-rag', 'lancedb'),
      table: 'chunks',
    },
  };
}

/** Shallow per-section merge, then validation. Throws ZodError on invalid values. */
export function mergeRetrievalConfig(...layers: Array<RetrievalConfigOverrides | undefined>): RetrievalConfig {
  const merged = defaultRetrievalConfig();
  for (const layer of layers) {
    if (!layer) continue;
    merged.topK = { ...merged.topK, ...layer.topK };
    merged.analyzer = { ...merged.analyzer, ...layer.analyzer };
    merged.multihop = { ...merged.multihop, ...layer.multihop };
    merged.hyde = { ...merged.hyde, ...layer.hyde };
    merged.fallback = { ...merged.fallback, ...layer.fallback };
    merged.timeouts = { ...merged.timeouts, ...layer.timeouts };
    merged.providers = { ...merged.providers, ...layer.providers };
  }
  return RetrievalConfigSchema.parse(merged);
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RetrievalConfigOverrides {
  const providers: Partial<RetrievalConfig['providers']> = {};
  if (env.OLLAMA_BASE_URL) providers.ollamaBaseUrl = env.OLLAMA_BASE_URL;
  if (env.ADAPTIVE_RAG_LLM_MODEL) providers.llmModel = env.ADAPTIVE_RAG_LLM_MODEL;
  if (env.ADAPTIVE_RAG_EMBEDDING_MODEL) providers.embeddingModel = env.ADAPTIVE_RAG_EMBEDDING_MODEL;
  const embedding = env.ADAPTIVE_RAG_EMBEDDING_PROVIDER;
  if (embedding === 'ollama' || embedding === 'hash') providers.embedding = embedding;
  if (env.ADAPTIVE_RAG_DB_DIR) providers.dbDir = env.ADAPTIVE_RAG_DB_DIR;
  if (env.ADAPTIVE_RAG_TABLE) providers.table = env.ADAPTIVE_RAG_TABLE;
  return Object.keys(providers).length > 0 ? { providers } : {};
}

const shape = RetrievalConfigSchema.shape;

const OverridesFileSchema = z
  .object({
    topK: shape.topK.partial(),
    analyzer: shape.analyzer.partial(),
    multihop: shape.multihop.partial(),
    hyde: shape.hyde.partial(),
    fallback: shape.fallback.partial(),
    timeouts: shape.timeouts.partial(),
    providers: shape.providers.partial(),
  })
  .partial()
  .strict();

/**
 * Read a JSON overrides file. A missing default file is not an error; a
 * missing explicit file is.
 */
export async function readConfigFile(filePath: string | undefined, cwd: string = process.cwd()): Promise<RetrievalConfigOverrides> {
  const explicit = typeof filePath === 'string' && filePath.length > 0;
  const resolved = path.resolve(cwd, explicit ? filePath : DEFAULT_CONFIG_FILE);
  if (!(await fs.pathExists(resolved))) {
    if (explicit) throw new Error(`Config file not found: ${resolved}`);
    return {};
  }
  const raw: unknown = await fs.readJSON(resolved);
  return OverridesFileSchema.parse(raw);
}

export async function loadRetrievalConfig(options: {
  file?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RetrievalConfigOverrides;
} = {}): Promise<RetrievalConfig> {
  const fromFile = await readConfigFile(options.file, options.cwd);
  return mergeRetrievalConfig(fromFile, configFromEnv(options.env), options.overrides);
}

import { z } from 'zod';

const optionalText = z.string().trim().min(1).optional();

/** Comma-separated list flag, e.g. `--documents agreement-03-2021,decree-1082`. */
const commaList = z
  .string()
  .optional()
  .transform((raw) =>
    raw === undefined
      ? undefined
      : raw
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
  );

export const ProviderOptionsSchema = z.object({
  config: optionalText,
  offline: z.boolean().default(false),
  embedding: z.enum(['ollama', 'hash']).optional(),
  db: optionalText,
  table: optionalText,
});

export const ScopeOptionsSchema = z.object({
  documents: commaList,
  area: optionalText,
  chapter: optionalText,
  title: optionalText,
  article: optionalText,
  section: optionalText,
  annex: optionalText,
});

export const AnalyzeSchema = ProviderOptionsSchema.merge(ScopeOptionsSchema).extend({
  question: z.string().trim().min(1, 'Question is required'),
});

export const RetrieveOptionsFlagsSchema = z.object({
  topkInitial: z.coerce.number().int().positive().optional(),
  topkFinal: z.coerce.number().int().positive().optional(),
  multihop: z.boolean().default(true),
  hyde: z.boolean().default(true),
  docType: optionalText,
  withText: z.boolean().default(false),
});

export const RetrieveSchema = ProviderOptionsSchema.merge(ScopeOptionsSchema)
  .merge(RetrieveOptionsFlagsSchema)
  .extend({
    question: z.string().trim().min(1, 'Question is required'),
  });

export const BatchSchema = ProviderOptionsSchema.merge(ScopeOptionsSchema)
  .merge(RetrieveOptionsFlagsSchema)
  .extend({
    file: z.string().trim().min(1, 'Batch file is required'),
    statsOut: optionalText,
  });

export type ProviderOptions = z.infer<typeof ProviderOptionsSchema>;
export type ScopeOptions = z.infer<typeof ScopeOptionsSchema>;
export type RetrieveFlags = z.infer<typeof RetrieveOptionsFlagsSchema>;
export type AnalyzeInput = z.infer<typeof AnalyzeSchema>;
export type RetrieveInput = z.infer<typeof RetrieveSchema>;
export type BatchInput = z.infer<typeof BatchSchema>;

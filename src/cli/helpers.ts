import { z } from 'zod';
import { loadRetrievalConfig, type RetrievalConfig, type RetrievalConfigOverrides } from '../core/config';
import { errorMessage } from '../core/errors';
import { createCollaborators, type CollaboratorChoices } from '../core/services';
import type { RouterCollaborators } from '../core/retrieval/router';
import type { RetrievalScope, RetrieveOptions, StructuralFilters } from '../core/retrieval/types';
import type { ProviderOptions, RetrieveFlags, ScopeOptions } from './schemas/retrievalSchemas';
import { ErrorHints, ErrorReasons, error, type CLIError } from './types';

/** Seams the handlers use to reach the outside world; tests swap them for fakes. */
export interface HandlerDeps {
  loadConfig(options: { file?: string; overrides: RetrievalConfigOverrides }): Promise<RetrievalConfig>;
  createCollaborators(config: RetrievalConfig, choices: CollaboratorChoices): RouterCollaborators;
}

export const defaultDeps: HandlerDeps = {
  loadConfig: (options) => loadRetrievalConfig(options),
  createCollaborators,
};

/** Flags win over env, env over the config file. */
export function overridesFromFlags(input: ProviderOptions & Partial<RetrieveFlags>): RetrievalConfigOverrides {
  const overrides: RetrievalConfigOverrides = {};
  const topK: Partial<RetrievalConfig['topK']> = {};
  if (input.topkInitial !== undefined) topK.initial = input.topkInitial;
  if (input.topkFinal !== undefined) topK.final = input.topkFinal;
  if (Object.keys(topK).length > 0) overrides.topK = topK;

  const providers: Partial<RetrievalConfig['providers']> = {};
  if (input.embedding) providers.embedding = input.embedding;
  if (input.db) providers.dbDir = input.db;
  if (input.table) providers.table = input.table;
  if (Object.keys(providers).length > 0) overrides.providers = providers;
  return overrides;
}

export async function resolveConfig(
  input: ProviderOptions & Partial<RetrieveFlags>,
  deps: HandlerDeps
): Promise<RetrievalConfig | CLIError> {
  try {
    return await deps.loadConfig({ file: input.config, overrides: overridesFromFlags(input) });
  } catch (e) {
    const issues =
      e instanceof z.ZodError ? e.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) : undefined;
    return error(ErrorReasons.CONFIG_INVALID, {
      message: errorMessage(e),
      ...(issues ? { issues } : {}),
      hint: ErrorHints.CONFIG_INVALID,
    });
  }
}

export function scopeFromFlags(input: ScopeOptions): RetrievalScope {
  const filters: StructuralFilters = {};
  if (input.chapter) filters.chapter = input.chapter;
  if (input.title) filters.title = input.title;
  if (input.article) filters.article = input.article;
  if (input.section) filters.section = input.section;
  if (input.annex) filters.annex = input.annex;
  const scope: RetrievalScope = {};
  if (input.documents && input.documents.length > 0) scope.documentIds = input.documents;
  if (input.area) scope.area = input.area;
  if (Object.keys(filters).length > 0) scope.filters = filters;
  return scope;
}

export function retrieveOptionsFromFlags(input: RetrieveFlags): RetrieveOptions {
  return {
    enableMultihop: input.multihop,
    enableHyde: input.hyde,
    ...(input.topkInitial !== undefined ? { topKInitial: input.topkInitial } : {}),
    ...(input.topkFinal !== undefined ? { topKFinal: input.topkFinal } : {}),
    ...(input.docType ? { docTypeHint: input.docType } : {}),
  };
}

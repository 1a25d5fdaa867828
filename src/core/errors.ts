export interface InputIssue {
  path: string;
  message: string;
}

/** Rejected before any collaborator is called. */
export class InvalidInputError extends Error {
  readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super(message);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

export type UpstreamService = 'completion' | 'embedding' | 'vector_search';

/**
 * A completion, embedding or vector-search call failed. Retrieval code catches
 * these where a fallback exists; they never leave the router.
 */
export class UpstreamError extends Error {
  readonly service: UpstreamService;

  constructor(service: UpstreamService, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamError';
    this.service = service;
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  readonly timeoutMs: number;

  constructor(service: UpstreamService, timeoutMs: number) {
    super(service, `${service} call timed out after ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

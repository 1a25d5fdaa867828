import { z } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result for successful operations.
 *
 * Agent-readable output: `ok`, `command`, `timestamp`, `duration_ms` plus
 * command-specific fields.
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error.
 *
 * - reason: machine-readable error code
 * - message: human-readable description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/** A handler with the schema that validates its raw Commander input. */
export interface HandlerRegistration<TInput> {
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: CLIHandler<TInput>;
}

export interface RegisteredHandler {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(registration: HandlerRegistration<TInput>): RegisteredHandler {
  return {
    run: (rawInput) => registration.handler(registration.schema.parse(rawInput)),
  };
}

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

/**
 * Execute a CLI handler with validation and error handling.
 *
 * @example
 * ```typescript
 * .action(async (question, options) => {
 *   await executeHandler('retrieve', { question, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(
      JSON.stringify(
        {
          ok: false,
          reason: 'unknown_command',
          command: commandKey,
          timestamp,
          hint: 'Run "adaptive-rag --help" to see available commands',
        },
        null,
        2
      )
    );
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    const out = { ...result, command: commandKey, timestamp, duration_ms };

    if (result.ok) {
      console.log(JSON.stringify(out, null, 2));
      process.exit(0);
    } else {
      process.stderr.write(JSON.stringify(out, null, 2) + '\n');
      process.exit(2);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }));
      console.error(
        JSON.stringify(
          {
            ok: false,
            reason: ErrorReasons.VALIDATION_ERROR,
            message: 'Invalid command arguments',
            command: commandKey,
            timestamp,
            duration_ms,
            errors,
            hint: ErrorHints.VALIDATION_ERROR,
          },
          null,
          2
        )
      );
      process.exit(1);
      return;
    }

    const errorDetails = e instanceof Error ? { name: e.name, message: e.message, stack: e.stack } : { message: String(e) };
    log.error(commandKey, { ok: false, err: errorDetails });

    console.error(
      JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.INTERNAL_ERROR,
          message: e instanceof Error ? e.message : String(e),
          command: commandKey,
          timestamp,
          duration_ms,
          hint: 'An unexpected error occurred. Check logs for details.',
        },
        null,
        2
      )
    );
    process.exit(1);
  }
}

export function success(data: Record<string, unknown>): CLIResult {
  return { ok: true, ...data };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return { ok: false, reason, ...details };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  INVALID_INPUT: 'invalid_input',
  CONFIG_INVALID: 'config_invalid',
  RETRIEVAL_FAILED: 'retrieval_failed',
  BATCH_FILE_INVALID: 'batch_file_invalid',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  CONFIG_INVALID: 'Check the JSON config file and the ADAPTIVE_RAG_* environment variables',
  INVALID_INPUT: 'The question must be non-empty and scope filters must be non-empty strings',
  RETRIEVAL_FAILED: 'Check that Ollama is reachable and the LanceDB table exists (or use --embedding hash --offline)',
  BATCH_FILE_INVALID: 'Use one question per line, or a JSON array of questions or {question, scope, options} objects',
  VALIDATION_ERROR: 'Check command syntax with --help',
} as const;

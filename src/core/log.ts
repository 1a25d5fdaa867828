export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Engine parts that log under `component: 'retrieval'`. */
export type RetrievalKind = 'router' | 'analyzer' | 'multihop' | 'hyde';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** `null` means silent. Unset or unknown values fall back to info. */
export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const value = String(raw ?? '').trim().toLowerCase();
  if (value === 'silent' || value === 'off' || value === 'none' || value === '0') return null;
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return 'info';
}

export interface SerializedError {
  name?: string;
  message?: string;
  /** Collaborator that failed, for upstream errors. */
  service?: string;
  cause?: string;
  stack?: string;
}

export function serializeError(e: unknown): SerializedError | undefined {
  if (!e) return undefined;
  if (!(e instanceof Error)) return { message: String(e) };
  const out: SerializedError = { name: e.name, message: e.message };
  if ('service' in e && typeof e.service === 'string') out.service = e.service;
  if (e.cause !== undefined) out.cause = e.cause instanceof Error ? e.cause.message : String(e.cause);
  out.stack = e.stack;
  return out;
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
}

export function createLogger(baseFields: Record<string, unknown> = {}): Logger {
  const configured = parseLogLevel(process.env.ADAPTIVE_RAG_LOG_LEVEL ?? process.env.LOG_LEVEL);
  const threshold = configured ? levelOrder[configured] : Infinity;

  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>) => {
    if (levelOrder[level] < threshold) return;
    const rec = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseFields,
      ...(fields ?? {}),
    };
    process.stderr.write(JSON.stringify(rec) + '\n');
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };
}

export function retrievalLogger(kind: RetrievalKind): Logger {
  return createLogger({ component: 'retrieval', kind });
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Threshold named by a level setting. `silent`, `off`, `none` and `0`
 * disable logging (null); unset or unknown values mean `info`.
 */
export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const value = String(raw ?? '').trim().toLowerCase();
  if (value === 'silent' || value === 'off' || value === 'none' || value === '0') return null;
  return isLogLevel(value) ? value : 'info';
}

export function serializeError(e: unknown): { name?: string; message?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };
  return { message: String(e) };
}

export function formatAddress(address: number): string {
  return `0x${address.toString(16)}`;
}

/** Anything that takes whole lines; `process.stderr` by default. */
export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  /** Overrides `XREF_LOG_LEVEL` / `LOG_LEVEL`; null disables logging. */
  level?: LogLevel | null;
  sink?: LogSink;
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

/**
 * JSON-lines logger: `{ ts, level, msg, ...baseFields, ...fields }`, one
 * record per line. Children share the parent's level and sink.
 */
export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): Logger {
  const level =
    options.level !== undefined ? options.level : parseLogLevel(process.env.XREF_LOG_LEVEL ?? process.env.LOG_LEVEL);
  const sink = options.sink ?? process.stderr;
  const threshold = level ? levelOrder[level] : Infinity;

  const write = (recordLevel: LogLevel, msg: string, fields?: LogFields) => {
    if (levelOrder[recordLevel] < threshold) return;
    const rec = {
      ts: new Date().toISOString(),
      level: recordLevel,
      msg,
      ...baseFields,
      ...(fields ?? {}),
    };
    sink.write(JSON.stringify(rec) + '\n');
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, { level, sink }),
  };
}

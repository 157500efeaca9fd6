export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = Record<LogLevel, (payload: string) => void>;

export type LoggerOptions = {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
};

const consoleSink: LogSink = {
  debug: (payload) => console.debug(payload),
  info: (payload) => console.info(payload),
  warn: (payload) => console.warn(payload),
  error: (payload) => console.error(payload),
};

const RESERVED_KEYS = new Set(['ts', 'level', 'logger', 'message']);
// TLS material for the remote VM endpoint travels through the same config objects that get logged.
const REDACT_KEY_RE = /^(ca|cert|key)$|(authorization|token|password|secret|privatekey)/i;
const MAX_STRING = 2000;
const MAX_DEPTH = 3;
const MAX_KEYS = 100;

/**
 * Structured JSON-lines logger. One record per call, written through the sink for its level.
 */
export class LoggerService {
  private readonly scope: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope ?? 'TestContainer';
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? consoleSink;
  }

  child(scope: string): LoggerService {
    return new LoggerService({ scope: `${this.scope}:${scope}`, level: this.level, sink: this.sink });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('debug', message, optionalParams);
  }

  info(message: string, ...optionalParams: unknown[]) {
    this.log('info', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('warn', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('error', message, optionalParams);
  }

  private log(level: LogLevel, message: string, optionalParams: unknown[]) {
    if (!this.isEnabled(level)) return;
    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      logger: this.scope,
      message,
    };

    if (optionalParams.length > 0) {
      const context = optionalParams.map((p) => toSafe(p, 0, new WeakSet<object>()));
      const [first] = context;
      if (context.length === 1 && isPlainRecord(first) && !Object.keys(first).some((k) => RESERVED_KEYS.has(k))) {
        Object.assign(record, first);
      } else {
        record.context = context;
      }
    }

    let payload: string;
    try {
      payload = JSON.stringify(record);
    } catch (err) {
      payload = JSON.stringify({ ...record, context: [{ __serialization_error__: String(err) }] });
    }
    this.sink[level](payload);
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function truncate(s: string): string {
  if (s.length <= MAX_STRING) return s;
  return s.slice(0, MAX_STRING) + `…(+${s.length - MAX_STRING} chars)`;
}

function toSafe(v: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (v instanceof Error) {
    const safe: Record<string, unknown> = {
      name: v.name,
      message: truncate(v.message),
      stack: v.stack ? truncate(v.stack) : undefined,
    };
    if ('code' in v && typeof v.code === 'string') safe.code = v.code;
    if (v.cause !== undefined) {
      safe.cause = depth + 1 >= MAX_DEPTH ? '[Truncated]' : toSafe(v.cause, depth + 1, seen);
    }
    return safe;
  }
  if (v && typeof v === 'object') {
    if (seen.has(v)) return '[Circular]';
    seen.add(v);
    if (depth >= MAX_DEPTH) return '[Truncated]';
    if (Array.isArray(v)) return v.slice(0, MAX_KEYS).map((x) => toSafe(x, depth + 1, seen));
    const out: Record<string, unknown> = {};
    const entries = Object.entries(v);
    for (const [k, val] of entries.slice(0, MAX_KEYS)) {
      out[k] = REDACT_KEY_RE.test(k) ? '[REDACTED]' : toSafe(val, depth + 1, seen);
    }
    if (entries.length > MAX_KEYS) out['__truncated__'] = `[+${entries.length - MAX_KEYS} keys omitted]`;
    return out;
  }
  if (typeof v === 'bigint') return v.toString();
  if (typeof v === 'string') return truncate(v);
  return v;
}

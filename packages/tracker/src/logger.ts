export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function describeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

/**
 * Diagnostics logger for the tracker itself (flush notices, step tracing).
 * Writes to stderr so stdout stays free for the pipeline's own output.
 */
export class Logger {
  constructor(
    private readonly options: {
      level?: LogLevel;
      format?: LogFormat;
    } = {}
  ) {}

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
    };
    for (const [key, value] of Object.entries(extra ?? {})) {
      record[key] = describeValue(value);
    }

    if ((this.options.format ?? 'text') === 'json') {
      process.stderr.write(`${JSON.stringify(record)}\n`);
      return;
    }

    const fields = Object.entries(extra ?? {})
      .map(([key]) => ` ${key}=${String(record[key])}`)
      .join('');
    process.stderr.write(`[${record.ts}] ${level.toUpperCase()} ${msg}${fields}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

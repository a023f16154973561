/**
 * Structured logger
 *
 * Writes one line per entry to stderr so stdout stays free for report output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

type LogEntry = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Line sink (default: process.stderr) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: { [L in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SECRET_KEY_PATTERN = /^(password|pass|token|accessToken|apiKey|secret|authorization)$/i;

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export function redactSecrets(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') {
    return value.replace(/\bBearer\s+([A-Za-z0-9._-]{8,})\b/g, 'Bearer [REDACTED]');
  }
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (isPlainObject(value)) {
    return redactFields(value);
  }
  return String(value);
}

function redactFields(fields: { [key: string]: unknown }): { [key: string]: unknown } {
  const out: { [key: string]: unknown } = {};
  for (const [k, v] of Object.entries(fields)) {
    if (k === 'ts' || k === 'level' || k === 'msg') continue;
    out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : redactSecrets(v);
  }
  return out;
}

function formatExtra(extra: { [key: string]: unknown }): string {
  const parts = Object.entries(extra).map(([key, value]) => {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    return `${key}=${rendered}`;
  });
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class Logger {
  constructor(
    protected readonly options: LoggerOptions = {},
    private readonly fields: { [key: string]: unknown } = {}
  ) {}

  get level(): LogLevel {
    return this.options.level ?? 'info';
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Logger that adds `fields` to every entry
   */
  child(fields: { [key: string]: unknown }): Logger {
    return new Logger(this.options, { ...this.fields, ...fields });
  }

  log(
    level: Exclude<LogLevel, 'silent'>,
    msg: string,
    extra?: { [key: string]: unknown }
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const context = redactFields({ ...this.fields, ...(extra ?? {}) });

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    const line =
      (this.options.format ?? 'text') === 'json'
        ? JSON.stringify(entry)
        : `[${entry.ts}] ${level.toUpperCase()} ${msg}${formatExtra(context)}`;

    const write = this.options.write ?? ((text: string) => process.stderr.write(`${text}\n`));
    write(line);
  }

  debug(msg: string, extra?: { [key: string]: unknown }): void {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: { [key: string]: unknown }): void {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: { [key: string]: unknown }): void {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: { [key: string]: unknown }): void {
    this.log('error', msg, extra);
  }
}

/** Logger that drops everything */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'silent' });
}

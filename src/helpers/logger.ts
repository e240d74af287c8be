export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

type EmittingLevel = Exclude<LogLevel, LogLevel.SILENT>;
type Meta = Record<string, unknown>;

const LEVEL_NAMES: Record<EmittingLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

/** Meta keys whose values never reach the log: session cookies, tokens, keys. */
const SECRET_KEY = /cookie|token|secret|password|apikey|api_key|randsk|sekey/i;

export const REDACTED = '[redacted]';

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return LogLevel.INFO;
  }
}

/** Copy of `meta` with secret-looking keys masked, nested objects included. */
export function redactMeta(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (SECRET_KEY.test(key)) {
      out[key] = REDACTED;
    } else if (isPlainObject(value)) {
      out[key] = redactMeta(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function isPlainObject(value: unknown): value is Meta {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON-lines logger: one object per line with timestamp, level, context,
 * message and meta. ERROR goes to stderr, the rest to stdout. Children share
 * the parent's level and carry its bindings into every entry.
 */
export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly context: string,
    level?: LogLevel,
    private readonly bindings: Meta = {},
  ) {
    this.minLevel = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, meta?: Meta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: Meta): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  child(context: string, bindings: Meta = {}): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel, { ...this.bindings, ...bindings });
  }

  private write(level: EmittingLevel, message: string, meta?: Meta): void {
    if (level < this.minLevel) return;

    const merged = { ...this.bindings, ...meta };
    const entry: Meta = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      context: this.context,
      message,
    };
    if (Object.keys(merged).length > 0) {
      entry.meta = redactMeta(merged);
    }

    const line = `${JSON.stringify(entry)}\n`;
    if (level === LogLevel.ERROR) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }
}

/** Error message for log meta, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const logger = new Logger('terabox-extractor');

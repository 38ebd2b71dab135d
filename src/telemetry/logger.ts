/**
 * Structured Logging
 *
 * Operator-visible diagnostics channel. Also the fallback sink for audit
 * writes that could not reach the datastore. Never receives plaintext PII.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  sink?: (record: LogRecord) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const COLOURS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m'
};

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly context: Record<string, unknown>;
  private readonly sink: (record: LogRecord) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.sink = options.sink ?? ((record) => this.write(record));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.emit('error', message, context, error);
  }

  /**
   * Derive a logger that stamps every record with extra context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      sink: this.sink
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const record: LogRecord = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context }
    };

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      record.error = { name: error.name, message: error.message, code };
    } else if (error !== undefined) {
      record.error = { name: 'NonError', message: String(error) };
    }

    this.sink(record);
  }

  private write(record: LogRecord): void {
    const stream = record.level === 'error' || record.level === 'warn' ? process.stderr : process.stdout;

    if (this.format === 'json') {
      stream.write(JSON.stringify(record) + '\n');
      return;
    }

    const reset = '\x1b[0m';
    const dim = '\x1b[2m';
    let line = `${dim}${record.timestamp}${reset} ${COLOURS[record.level]}${record.level.toUpperCase().padEnd(5)}${reset} ${record.message}`;
    if (Object.keys(record.context).length > 0) {
      line += ` ${dim}${JSON.stringify(record.context)}${reset}`;
    }
    if (record.error) {
      line += ` ${COLOURS.error}${record.error.name}: ${record.error.message}${reset}`;
    }
    stream.write(line + '\n');
  }
}

/**
 * Logger that drops everything. Used where no diagnostics are wanted
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', sink: () => undefined });
}

/**
 * Structured logging infrastructure.
 *
 * Everything is written to stderr by default: when the language server runs
 * over stdio, stdout belongs to the protocol. The server swaps in a sink that
 * forwards to the client's log.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Receives formatted lines; `level` is never 'silent'. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

const stderrSink: LogSink = (_level, line) => {
  console.error(line);
};

/**
 * Leveled logger with optional prefix and pluggable output.
 */
class Logger {
  private level: LogLevel | null = null;
  private prefix: string = '';
  private sink: LogSink | null = null;

  /** Children inherit level and sink from their parent unless they set their own. */
  constructor(private readonly parent?: Logger) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  /**
   * Redirect output. Passing nothing restores stderr.
   */
  setSink(sink?: LogSink): void {
    this.sink = sink ?? null;
  }

  private write(level: Exclude<LogLevel, 'silent'>, line: string): void {
    const sink = this.resolveSink();
    sink(level, line);
  }

  private resolveSink(): LogSink {
    return this.sink ?? this.parent?.resolveSink() ?? stderrSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write('debug', chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      this.write('debug', chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write('info', chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      this.write('info', chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      this.write('warn', chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.write('error', chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        this.write('error', chalk.red(error.stack || error.message));
      } else {
        this.write('error', chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };

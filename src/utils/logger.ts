/**
 * Structured logging infrastructure.
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

/**
 * Simple structured logger for the CLI and the tool server.
 * Children read the level of their root, so `setLevel` on the
 * singleton also quiets every child created from it.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private parent?: Logger;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    const formatted = this.formatMessage(message);
    console.error(chalk.gray(`[DEBUG] ${formatted}`));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    const formatted = this.formatMessage(message);
    console.error(chalk.blue(`[INFO] ${formatted}`));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    const formatted = this.formatMessage(message);
    console.warn(chalk.yellow(`[WARN] ${formatted}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const formatted = this.formatMessage(message);
    console.error(chalk.red(`[ERROR] ${formatted}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

// Re-export for convenience
export { Logger };

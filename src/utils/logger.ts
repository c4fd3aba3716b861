/**
 * Leveled console logging for the compiler and CLI.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type OutputLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  tag: string;
  color: (text: string) => string;
  print: (line: string) => void;
}

const STYLES: Record<OutputLevel, LevelStyle> = {
  debug: { tag: '[DEBUG]', color: (text) => chalk.gray(text), print: (line) => console.log(line) },
  info: { tag: '[INFO]', color: (text) => chalk.blue(text), print: (line) => console.log(line) },
  warn: { tag: '[WARN]', color: (text) => chalk.yellow(text), print: (line) => console.warn(line) },
  error: { tag: '[ERROR]', color: (text) => chalk.red(text), print: (line) => console.error(line) },
};

/**
 * Console logger with a level threshold. Structured data is printed as
 * indented JSON on the line after the message.
 */
class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: OutputLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.write('error', message);
      if (this.isEnabled('error')) {
        console.error(chalk.red(error.stack || error.message));
      }
      return;
    }
    this.write('error', message, error);
  }

  /** Check-marked line at info level. */
  success(message: string): void {
    if (this.isEnabled('info')) console.log(chalk.green(`✓ ${message}`));
  }

  /** Cross-marked line at info level. */
  fail(message: string): void {
    if (this.isEnabled('info')) console.log(chalk.red(`✗ ${message}`));
  }

  private write(level: OutputLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { tag, color, print } = STYLES[level];
    print(color(`${tag} ${message}`));
    if (data) {
      print(color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };

/**
 * Leveled console logging for the surveyor CLI.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  tag: string;
  color(text: string): string;
  write(line: string): void;
}

const STYLES: Record<MessageLevel, LevelStyle> = {
  debug: { tag: 'DEBUG', color: (text) => chalk.gray(text), write: (line) => console.log(line) },
  info: { tag: 'INFO', color: (text) => chalk.blue(text), write: (line) => console.log(line) },
  warn: { tag: 'WARN', color: (text) => chalk.yellow(text), write: (line) => console.warn(line) },
  error: { tag: 'ERROR', color: (text) => chalk.red(text), write: (line) => console.error(line) },
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  /** Skipped packages and files. Goes to stderr. */
  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: MessageLevel, message: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const style = STYLES[level];
    style.write(style.color(`[${style.tag}] ${message}`));
  }
}

export const logger = new Logger();

export { Logger };

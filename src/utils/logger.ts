import chalk from 'chalk';
import { LogLevelName } from '../types';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel | LogLevelName): void {
    this.logLevel = typeof level === 'string' ? LEVELS_BY_NAME[level] : level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(chalk.gray(`${chalk.dim('●')} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(`${chalk.blue('ℹ')} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.warn(`${chalk.yellow('⚠')} ${chalk.yellow(message)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.error(`${chalk.red('✖')} ${chalk.red(message)}`, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    console.log(`${chalk.green('✔')} ${chalk.green(message)}`, ...args);
  }

  header(title: string, char = '='): void {
    console.log(chalk.bold.cyan(`\n${title}`));
    console.log(chalk.dim(char.repeat(title.length)));
  }

  section(title: string): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(chalk.bold(`\n▶ ${title}`));
    }
  }

  item(message: string, icon = '•'): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(`  ${chalk.dim(icon)} ${message}`);
    }
  }

  stats(stats: Record<string, number | string>): void {
    console.log();
    const maxKeyLength = Math.max(...Object.keys(stats).map(k => k.length));
    for (const [key, value] of Object.entries(stats)) {
      console.log(`  ${chalk.dim(key.padEnd(maxKeyLength))} : ${chalk.bold(value)}`);
    }
  }
}

export const logger = Logger.getInstance();

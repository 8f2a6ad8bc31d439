/**
 * Librus Logger - leveled, colored logging for the scraper
 * Writes to stderr so stdout carries only command output
 */

import chalk from 'chalk';
import { ConfigError } from './errors.js';

export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARNING = 30,
  ERROR = 40,
  CRITICAL = 50,
}

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARNING]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.CRITICAL]: chalk.bgRed.white,
};

function isLogLevelName(name: string): name is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(name);
}

/**
 * Map a case-insensitive level name ("info", "WARNING") to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel {
  const upper = name.trim().toUpperCase();
  if (!isLogLevelName(upper)) {
    throw new ConfigError(`Invalid log level: ${name}`);
  }
  return LogLevel[upper];
}

class Logger {
  private minLevel: LogLevel = LogLevel.ERROR;

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 19); // HH:MM:SS
  }

  private log(level: LogLevel, component: string, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const style = LEVEL_STYLES[level];
    const prefix = `${chalk.dim(this.formatTime())} ${style(LogLevel[level].padEnd(8))}`;
    console.error(`${prefix} ${chalk.cyan(`[${component}]`)} ${message}`);

    if (data !== undefined && this.minLevel === LogLevel.DEBUG) {
      console.error(chalk.dim(`  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}`));
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARNING, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  critical(component: string, message: string, data?: unknown) {
    this.log(LogLevel.CRITICAL, component, message, data);
  }

  /**
   * Log an error with its stack when debugging
   */
  exception(component: string, message: string, err: unknown) {
    const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    this.error(component, `${message} ${detail}`);
    if (err instanceof Error && err.stack) {
      this.debug(component, err.stack);
    }
  }
}

// Singleton instance
export const logger = new Logger();

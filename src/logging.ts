/**
 * Logging
 *
 * Two sinks: coloured, human-readable lines on stderr, and one JSON object
 * per line in a daily file under <home>/logs.
 */

import chalk from 'chalk';
import dayjs from 'dayjs';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogLevel } from './config.js';
import { errorMessage } from './errors.js';

type Fields = Record<string, string | number | boolean | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface LoggerOptions {
  consoleLevel?: LogLevel;
  fileLevel?: LogLevel;
  logDir?: string;
}

export class Logger {
  private readonly consoleLevel: LogLevel;
  private readonly fileLevel: LogLevel;
  private readonly logDir?: string;

  constructor(options: LoggerOptions = {}) {
    this.consoleLevel = options.consoleLevel ?? 'warn';
    this.fileLevel = options.fileLevel ?? 'info';
    this.logDir = options.logDir;
  }

  debug(message: string, fields?: Fields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: Fields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: Fields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: Fields): void {
    this.log('error', message, fields);
  }

  logFilePath(date: Date = new Date()): string | undefined {
    if (!this.logDir) return undefined;
    return path.join(this.logDir, `shellmind-${dayjs(date).format('YYYY-MM-DD')}.log`);
  }

  /**
   * Append to the log file only, for messages the caller already shows on screen.
   */
  writeFile(level: LogLevel, message: string, fields: Fields = {}): void {
    const now = new Date();
    const file = this.logFilePath(now);
    if (!file || LEVEL_ORDER[level] < LEVEL_ORDER[this.fileLevel]) return;

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.appendFileSync(file, `${formatJsonLine(level, message, fields, now)}\n`, 'utf-8');
    } catch (err) {
      process.stderr.write(chalk.gray(`log write failed: ${errorMessage(err)}\n`));
    }
  }

  private log(level: LogLevel, message: string, fields: Fields = {}): void {
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.consoleLevel]) {
      process.stderr.write(`${formatConsoleLine(level, message, fields)}\n`);
    }
    this.writeFile(level, message, fields);
  }
}

export function formatConsoleLine(level: LogLevel, message: string, fields: Fields = {}): string {
  const extras = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
  const tag = LEVEL_COLOR[level](level.toUpperCase().padEnd(5));
  return extras ? `${tag} ${message} ${chalk.gray(extras)}` : `${tag} ${message}`;
}

export function formatJsonLine(
  level: LogLevel,
  message: string,
  fields: Fields,
  timestamp: Date
): string {
  return JSON.stringify({ timestamp: timestamp.toISOString(), level, message, ...fields });
}

/**
 * Process-wide logger. The CLI points it at the configured log directory.
 */
export let logger = new Logger();

export function initLogging(options: LoggerOptions): Logger {
  logger = new Logger(options);
  return logger;
}

export function logCommandRecorded(command: string, exitCode: number, durationMs: number): void {
  logger.info('Command recorded', { command, exitCode, durationMs });
}

export function logSearch(query: string, resultCount: number, durationMs: number): void {
  logger.info('Search performed', { query, resultCount, durationMs });
}

export function logDatabaseOperation(operation: string, success: boolean, durationMs: number): void {
  if (success) {
    logger.debug('Database operation completed', { operation, durationMs });
  } else {
    logger.error('Database operation failed', { operation, durationMs });
  }
}

export function logGarbageCollection(deletedCount: number, durationMs: number): void {
  logger.info('Garbage collection completed', { deletedCount, durationMs });
}

/**
 * Helpers shared by the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { type Config, loadConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import { CommandStore } from '../storage/database.js';
import type { OutputFormat } from '../types.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'plain'];

/**
 * Parse a duration such as 30m, 2h or 7d into milliseconds. Bare numbers are hours.
 */
export function parseTimeDuration(duration: string): number {
  const match = duration.match(/^(\d+)(s|m|h|d)?$/);
  if (!match) {
    throw new ValidationError(`Invalid duration: ${duration}`, 'duration');
  }

  const value = Number.parseInt(match[1], 10);
  const unit = match[2] || 'h';

  switch (unit) {
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    case 'm':
      return value * 60 * 1000;
    case 's':
      return value * 1000;
    default:
      return value * 60 * 60 * 1000;
  }
}

export function sinceDuration(duration: string | undefined, now: Date = new Date()): Date | undefined {
  if (duration === undefined) return undefined;
  return new Date(now.getTime() - parseTimeDuration(duration));
}

/**
 * Commander argument parser for integers.
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Must be a number between 0 and 1.');
  }
  return parsed;
}

/**
 * Open the configured store for the duration of `fn`.
 */
export async function withStore<T>(
  fn: (store: CommandStore, config: Config) => T | Promise<T>
): Promise<T> {
  const config = loadConfig();
  const store = new CommandStore(config.databasePath);
  try {
    return await fn(store, config);
  } finally {
    store.close();
  }
}

/**
 * Shared helpers for comparing commands and computing scores.
 */

import type { ShellCommand } from '../types.js';
import { ERROR_FIX_RELATIONS } from './constants.js';

/**
 * Normalize a base command name for equality checks
 */
export function normalizeCommand(name: string): string {
  return name.toLowerCase();
}

export function commandKey(command: ShellCommand): string {
  return normalizeCommand(command.parsedCommand);
}

const SUBCOMMAND = /^[a-z][a-z0-9_-]*$/;

/**
 * Base command plus its subcommand when the first argument looks like one:
 * `git commit -m wip` -> `git commit`, `vim main.c` -> `vim`.
 */
export function commandSignature(command: ShellCommand): string {
  const base = commandKey(command);
  const first = command.arguments[0]?.toLowerCase();
  return first !== undefined && SUBCOMMAND.test(first) ? `${base} ${first}` : base;
}

/**
 * Join normalized names into a map key. NUL cannot appear in a recorded command.
 */
export function sequenceKey(
  commands: readonly ShellCommand[],
  keyOf: (command: ShellCommand) => string = commandKey
): string {
  return commands.map(keyOf).join('\0');
}

/**
 * A failed command and a later success are related when they share a base
 * command or match a known error -> fix pair.
 */
export function areRelatedCommands(failed: ShellCommand, fixed: ShellCommand): boolean {
  if (commandKey(failed) === commandKey(fixed)) {
    return true;
  }

  const failedText = failed.raw.toLowerCase();
  const fixedText = fixed.raw.toLowerCase();
  return ERROR_FIX_RELATIONS.some(
    ([error, fix]) => failedText.includes(error) && fixedText.includes(fix)
  );
}

/**
 * numerator / denominator, or null when the denominator is not positive
 */
export function ratio(numerator: number, denominator: number): number | null {
  if (!(denominator > 0)) return null;
  return numerator / denominator;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population variance
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
}

/**
 * Shorten long paths for display: /home/me/src/app -> .../app
 */
export function shortenPath(path: string): string {
  const parts = path.split('/');
  if (parts.length > 3) {
    return `.../${parts[parts.length - 1]}`;
  }
  return path;
}

export function representativeCommands(commands: readonly ShellCommand[], limit: number): string[] {
  return commands.slice(0, limit).map((c) => c.raw);
}

/**
 * Garbage Collection
 *
 * Enforces retention and history size limits, then prunes old log files.
 */

import dayjs from 'dayjs';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { logGarbageCollection, logger } from './logging.js';
import type { CommandStore } from './storage/database.js';

export const LOG_RETENTION_DAYS = 7;

const LOG_FILE = /^shellmind-(\d{4}-\d{2}-\d{2})\.log$/;

export interface GcOptions {
  retentionDays?: number;
  maxHistorySize: number;
  logDir?: string;
  now?: Date;
}

export interface GcResult {
  deletedByAge: number;
  deletedBySize: number;
  deletedLogs: number;
  vacuumed: boolean;
}

export function collectGarbage(store: CommandStore, options: GcOptions): GcResult {
  const started = Date.now();
  const now = dayjs(options.now ?? new Date());

  let deletedByAge = 0;
  if (options.retentionDays !== undefined) {
    deletedByAge = store.deleteBefore(now.subtract(options.retentionDays, 'day').toDate());
  }

  const excess = store.count() - options.maxHistorySize;
  const deletedBySize = excess > 0 ? store.deleteOldest(excess) : 0;

  const vacuumed = deletedByAge + deletedBySize > 0;
  if (vacuumed) {
    store.vacuum();
  }

  const deletedLogs = options.logDir ? pruneLogs(options.logDir, now.toDate()) : 0;

  logGarbageCollection(deletedByAge + deletedBySize, Date.now() - started);
  return { deletedByAge, deletedBySize, deletedLogs, vacuumed };
}

/**
 * Delete daily log files dated more than LOG_RETENTION_DAYS before `now`.
 */
export function pruneLogs(logDir: string, now: Date): number {
  if (!fs.existsSync(logDir)) return 0;

  const cutoff = dayjs(now).startOf('day').subtract(LOG_RETENTION_DAYS, 'day');
  let deleted = 0;

  for (const name of fs.readdirSync(logDir)) {
    const match = name.match(LOG_FILE);
    if (!match) continue;

    if (dayjs(match[1]).isBefore(cutoff)) {
      fs.unlinkSync(path.join(logDir, name));
      deleted++;
      logger.debug('Deleted old log file', { file: name });
    }
  }

  return deleted;
}

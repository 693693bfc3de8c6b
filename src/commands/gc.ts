/**
 * GC Command
 */

import chalk from 'chalk';
import { collectGarbage } from '../gc.js';
import { withStore } from './shared.js';

interface GcCommandOptions {
  retentionDays?: number;
  maxHistory?: number;
}

export async function gcCommand(options: GcCommandOptions): Promise<void> {
  const result = await withStore((store, config) =>
    collectGarbage(store, {
      retentionDays: options.retentionDays ?? config.retentionDays,
      maxHistorySize: options.maxHistory ?? config.maxHistorySize,
      logDir: config.logDir,
    })
  );

  const deleted = result.deletedByAge + result.deletedBySize;
  console.log(
    deleted > 0
      ? chalk.green(`Deleted ${deleted} commands (${result.deletedByAge} expired, ${result.deletedBySize} over the size limit).`)
      : 'No commands to delete.'
  );
  if (result.deletedLogs > 0) {
    console.log(`Removed ${result.deletedLogs} old log files.`);
  }
}

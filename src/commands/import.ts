/**
 * Import Command
 *
 * Loads existing shell history into the store.
 */

import chalk from 'chalk';
import { type HistoryShell, ShellHistoryCollector } from '../collectors/shell.js';
import { logger } from '../logging.js';
import type { CommandStore } from '../storage/database.js';
import { sinceDuration, withStore } from './shared.js';

export interface ImportOptions {
  file?: string;
  shell?: HistoryShell;
  since?: string;
}

export async function importHistory(store: CommandStore, options: ImportOptions): Promise<number> {
  const collector = new ShellHistoryCollector({ historyPath: options.file, shell: options.shell });
  if (!collector.isAvailable()) {
    logger.warn('No shell history file found', { file: options.file });
    return 0;
  }

  const commands = await collector.collect(sinceDuration(options.since));
  const saved = store.saveMany(commands);
  logger.info('History imported', { file: collector.file, count: saved });
  return saved;
}

export async function importCommand(options: ImportOptions): Promise<void> {
  const count = await withStore((store) => importHistory(store, options));
  console.log(count > 0 ? chalk.green(`Imported ${count} commands.`) : 'Nothing to import.');
}

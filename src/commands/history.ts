/**
 * History Command
 *
 * Shows the most recent commands, oldest first.
 */

import { renderCommands } from '../output.js';
import type { CommandStore } from '../storage/database.js';
import type { OutputFormat } from '../types.js';
import { withStore } from './shared.js';

export interface HistoryOptions {
  limit: number;
  session?: string;
  format: OutputFormat;
}

export function showHistory(store: CommandStore, options: HistoryOptions): string {
  const commands = options.session
    ? store.findBySession(options.session).slice(-options.limit)
    : store.recent(options.limit);

  if (commands.length === 0) {
    return options.format === 'json' ? '[]' : 'No commands recorded yet.';
  }
  return renderCommands(commands, options.format);
}

export async function historyCommand(options: HistoryOptions): Promise<void> {
  const output = await withStore((store) => showHistory(store, options));
  console.log(output);
}

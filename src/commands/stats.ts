/**
 * Stats Command
 *
 * Shows a quick overview of recorded activity.
 */

import { renderStats } from '../output.js';
import type { CommandStore } from '../storage/database.js';
import { sinceDuration, withStore } from './shared.js';

export interface StatsCommandOptions {
  since?: string;
  top: number;
  json?: boolean;
}

export function showStats(store: CommandStore, options: StatsCommandOptions): string {
  const stats = store.stats({ since: sinceDuration(options.since), top: options.top });

  if (options.json) {
    return JSON.stringify(stats, null, 2);
  }
  if (stats.totalCommands === 0) {
    return 'No commands recorded yet.';
  }

  const heading = options.since ? `Activity in the last ${options.since}:` : 'All recorded activity:';
  return `${heading}\n\n${renderStats(stats)}`;
}

export async function statsCommand(options: StatsCommandOptions): Promise<void> {
  const output = await withStore((store) => showStats(store, options));
  console.log(output);
}

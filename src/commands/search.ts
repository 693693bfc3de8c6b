/**
 * Search Command
 */

import * as path from 'node:path';
import { logSearch } from '../logging.js';
import { renderCommands } from '../output.js';
import type { CommandStore } from '../storage/database.js';
import type { OutputFormat } from '../types.js';
import { sinceDuration, withStore } from './shared.js';

export interface SearchCommandOptions {
  limit: number;
  directory?: string;
  since?: string;
  success?: boolean;
  format: OutputFormat;
}

export function runSearch(store: CommandStore, query: string, options: SearchCommandOptions): string {
  const started = Date.now();
  const results = store.search(query, {
    limit: options.limit,
    directory: options.directory ? path.resolve(options.directory) : undefined,
    since: sinceDuration(options.since),
    successOnly: options.success,
  });
  logSearch(query, results.length, Date.now() - started);

  if (results.length === 0) {
    return options.format === 'json' ? '[]' : `No commands matching "${query}".`;
  }
  return renderCommands(results, options.format);
}

export async function searchCommand(query: string, options: SearchCommandOptions): Promise<void> {
  const output = await withStore((store) => runSearch(store, query, options));
  console.log(output);
}

/**
 * Export Command
 *
 * Exports history and detected patterns as JSON, CSV or Markdown.
 */

import { type ExportFormat, exportData } from '../export.js';
import { findPatterns } from './patterns.js';
import { sinceDuration, withStore } from './shared.js';

interface ExportCommandOptions {
  format: ExportFormat;
  output?: string;
  limit?: number;
  since?: string;
  patterns: boolean;
}

export async function exportCommand(options: ExportCommandOptions): Promise<void> {
  const output = await withStore((store, config) => {
    const since = sinceDuration(options.since);
    const commands = since
      ? store.findByTimeRange(since, new Date())
      : store.recent(options.limit ?? config.maxHistorySize);
    const patterns = options.patterns ? (findPatterns(store, config, {}) ?? []) : [];

    return exportData(commands, patterns, { format: options.format, outputPath: options.output });
  });

  if (options.output) {
    console.log(`Exported to: ${output}`);
  } else {
    console.log(output);
  }
}

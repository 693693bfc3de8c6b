/**
 * Patterns Command
 *
 * Mines the most recent commands for recurring workflows.
 */

import type { Config } from '../config.js';
import { logger } from '../logging.js';
import { renderPatterns } from '../output.js';
import { MIN_COMMANDS_FOR_DETECTION } from '../patterns/constants.js';
import { PatternDetector } from '../patterns/detector.js';
import { type PatternTypeName, filterPatterns } from '../patterns/filter.js';
import type { CommandStore } from '../storage/database.js';
import type { DetectedPattern, OutputFormat } from '../types.js';
import { withStore } from './shared.js';

export interface PatternsOptions {
  confidence?: number;
  type?: PatternTypeName;
  format: OutputFormat;
  sample?: number;
}

/**
 * Detect and filter patterns over the configured sample of recent history.
 * Returns undefined when there are too few commands to analyse.
 */
export function findPatterns(
  store: CommandStore,
  config: Config,
  options: Omit<PatternsOptions, 'format'>
): DetectedPattern[] | undefined {
  const commands = store.recent(options.sample ?? config.patternSampleSize);
  if (commands.length < MIN_COMMANDS_FOR_DETECTION) {
    return undefined;
  }

  const started = Date.now();
  const patterns = new PatternDetector(commands).detectPatterns();
  logger.debug('Pattern detection finished', {
    commands: commands.length,
    patterns: patterns.length,
    durationMs: Date.now() - started,
  });

  return filterPatterns(patterns, {
    minConfidence: options.confidence ?? config.minConfidence,
    type: options.type,
  });
}

export function showPatterns(store: CommandStore, config: Config, options: PatternsOptions): string {
  const patterns = findPatterns(store, config, options);

  if (patterns === undefined) {
    return options.format === 'json'
      ? '[]'
      : `Not enough data to detect patterns (need at least ${MIN_COMMANDS_FOR_DETECTION} commands).`;
  }
  if (patterns.length === 0 && options.format !== 'json') {
    return 'No patterns found.';
  }
  return renderPatterns(patterns, options.format);
}

export async function patternsCommand(options: PatternsOptions): Promise<void> {
  const output = await withStore((store, config) => showPatterns(store, config, options));
  console.log(output);
}

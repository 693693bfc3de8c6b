/**
 * Context Command
 *
 * Prints a markdown summary of workflows for an AI assistant, or asks Claude
 * for automation ideas with --generate.
 */

import chalk from 'chalk';
import { buildContext } from '../context.js';
import { formatSuggestions, generateAutomations, isClaudeAvailable } from '../generate.js';
import { findPatterns } from './patterns.js';
import { withStore } from './shared.js';

interface ContextCommandOptions {
  recent: number;
  generate?: boolean;
}

export async function contextCommand(options: ContextCommandOptions): Promise<void> {
  const context = await withStore((store, config) => {
    const patterns = findPatterns(store, config, {}) ?? [];
    return buildContext(patterns, store.recent(options.recent), { maxRecent: options.recent });
  });

  if (!options.generate) {
    console.log(context);
    return;
  }

  if (!isClaudeAvailable()) {
    console.log(chalk.yellow('Set ANTHROPIC_API_KEY to generate suggestions. Context follows:\n'));
    console.log(context);
    return;
  }

  console.log('\nGenerating automation ideas with Claude...\n');
  const suggestions = await generateAutomations(context);
  console.log(formatSuggestions(suggestions));
}

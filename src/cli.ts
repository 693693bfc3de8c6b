#!/usr/bin/env node

/**
 * shellmind CLI
 *
 * Records shell commands and finds the workflows hiding in them.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';
import { contextCommand } from './commands/context.js';
import { exportCommand } from './commands/export.js';
import { gcCommand } from './commands/gc.js';
import { historyCommand } from './commands/history.js';
import { hookCommand } from './commands/hook.js';
import { importCommand } from './commands/import.js';
import { patternsCommand } from './commands/patterns.js';
import { recordCommandAction } from './commands/record.js';
import { searchCommand } from './commands/search.js';
import {
  OUTPUT_FORMATS,
  parseConfidence,
  parseInteger,
  parsePositiveInteger,
} from './commands/shared.js';
import { statsCommand } from './commands/stats.js';
import { loadConfig } from './config.js';
import { ShellmindError, errorMessage } from './errors.js';
import { EXPORT_FORMATS } from './export.js';
import { HOOK_SHELLS } from './hooks.js';
import { initLogging, logger } from './logging.js';
import { PATTERN_TYPE_NAMES, type PatternTypeName, isPatternTypeName } from './patterns/filter.js';

function parsePatternType(value: string): PatternTypeName {
  if (!isPatternTypeName(value)) {
    throw new InvalidArgumentError(`Use one of: ${Object.keys(PATTERN_TYPE_NAMES).join(', ')}.`);
  }
  return value;
}

const formatOption = () =>
  new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('table');

const program = new Command();

program
  .name('shellmind')
  .description('Record your shell history and discover your workflows')
  .version('0.1.0')
  .option('-v, --verbose', 'Print debug logging to stderr')
  .hook('preAction', (thisCommand) => {
    const config = loadConfig();
    const { verbose } = thisCommand.opts<{ verbose?: boolean }>();
    initLogging({
      consoleLevel: verbose ? 'debug' : 'warn',
      fileLevel: config.logLevel,
      logDir: config.logDir,
    });
  });

program
  .command('record')
  .description('Record a finished command (called by the shell hook)')
  .argument('<command>', 'Command line as typed')
  .requiredOption('-e, --exit-code <code>', 'Exit status', parseInteger)
  .option('-d, --duration <ms>', 'Run time in milliseconds', parseInteger, 0)
  .option('--directory <dir>', 'Working directory (default: current directory)')
  .option('--shell <name>', 'Shell name (default: from $SHELL)')
  .action(recordCommandAction);

program
  .command('history')
  .description('Show recently recorded commands')
  .option('-n, --limit <n>', 'Number of commands', parsePositiveInteger, 20)
  .option('-s, --session <id>', 'Only commands from one session')
  .addOption(formatOption())
  .action(historyCommand);

program
  .command('search')
  .description('Search recorded commands')
  .argument('<query>', 'Text to look for')
  .option('-n, --limit <n>', 'Maximum results', parsePositiveInteger, 50)
  .option('--directory <dir>', 'Only commands run in this directory')
  .option('--since <duration>', 'Only commands newer than this (e.g., 2h, 7d)')
  .option('--success', 'Only successful commands')
  .addOption(formatOption())
  .action(searchCommand);

program
  .command('stats')
  .description('Show usage statistics')
  .option('--since <duration>', 'Time window (e.g., 24h, 7d)')
  .option('--top <n>', 'Entries per ranking', parsePositiveInteger, 10)
  .option('--json', 'Print JSON')
  .action(statsCommand);

program
  .command('patterns')
  .description('Detect recurring workflows in recent history')
  .option('-c, --confidence <n>', 'Minimum confidence between 0 and 1', parseConfidence)
  .option(
    '-t, --type <type>',
    `Pattern type: ${Object.keys(PATTERN_TYPE_NAMES).join(', ')}`,
    parsePatternType
  )
  .option('--sample <n>', 'Number of recent commands to analyse', parsePositiveInteger)
  .addOption(formatOption())
  .action(patternsCommand);

program
  .command('export')
  .description('Export history and patterns')
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices(EXPORT_FORMATS).default('json')
  )
  .option('-o, --output <path>', 'Output file path')
  .option('-n, --limit <n>', 'Number of recent commands', parsePositiveInteger)
  .option('--since <duration>', 'Only commands newer than this (e.g., 7d)')
  .option('--no-patterns', 'Leave detected patterns out')
  .action(exportCommand);

program
  .command('import')
  .description('Import existing shell history')
  .option('--file <path>', 'History file (default: ~/.zsh_history or ~/.bash_history)')
  .addOption(new Option('--shell <shell>', 'History format').choices(HOOK_SHELLS))
  .option('--since <duration>', 'Only entries newer than this (e.g., 30d)')
  .action(importCommand);

program
  .command('hook')
  .description('Print the shell integration snippet')
  .addArgument(program.createArgument('<shell>', 'Shell to integrate with').choices(HOOK_SHELLS))
  .action(hookCommand);

program
  .command('gc')
  .description('Delete old commands and log files')
  .option('--retention-days <days>', 'Delete commands older than this', parsePositiveInteger)
  .option('--max-history <n>', 'Keep at most this many commands', parsePositiveInteger)
  .action(gcCommand);

program
  .command('context')
  .description('Summarise workflows for an AI assistant')
  .option('-n, --recent <n>', 'Recent commands to include', parsePositiveInteger, 20)
  .option('--generate', 'Ask Claude for automation suggestions')
  .action(contextCommand);

program.parseAsync().catch((err: unknown) => {
  logger.writeFile('error', 'Command failed', { error: errorMessage(err) });
  if (!(err instanceof ShellmindError)) {
    logger.debug(err instanceof Error && err.stack ? err.stack : String(err));
  }
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
});

/**
 * Console rendering for commands, patterns and statistics
 */

import chalk from 'chalk';
import dayjs from 'dayjs';
import { shortenPath } from './patterns/normalize.js';
import { serializePatterns } from './patterns/serialize.js';
import type { CommandStats, DetectedPattern, OutputFormat, PatternType, ShellCommand } from './types.js';

export interface CommandJson {
  id: string;
  raw: string;
  parsed_command: string;
  arguments: string[];
  working_directory: string;
  exit_code: number;
  duration_ms: number;
  timestamp: string;
  session_id: string;
  shell: string;
  user: string;
  hostname: string;
  terminal: string;
}

export function commandToJson(command: ShellCommand): CommandJson {
  return {
    id: command.id,
    raw: command.raw,
    parsed_command: command.parsedCommand,
    arguments: [...command.arguments],
    working_directory: command.workingDirectory,
    exit_code: command.exitCode,
    duration_ms: command.durationMs,
    timestamp: command.timestamp.toISOString(),
    session_id: command.sessionId,
    shell: command.environment.shell,
    user: command.environment.user,
    hostname: command.environment.hostname,
    terminal: command.environment.terminal,
  };
}

export function patternTypeLabel(type: PatternType): string {
  switch (type.kind) {
    case 'CommandSequence':
      return `Command Sequence (${type.length})`;
    case 'TimeBasedRoutine':
      return `Time Routine (${String(type.hour).padStart(2, '0')}:00 ±${type.varianceMinutes}m)`;
    case 'DirectorySpecific':
      return `Directory (${shortenPath(type.directory)})`;
    case 'ErrorRecovery':
      return 'Error Recovery';
    case 'BuildTest':
      return `Build/Test (${type.tool})`;
    case 'VersionControl':
      return `Version Control (${type.vcs})`;
    case 'FileManipulation':
      return 'File Manipulation';
    case 'SystemMaintenance':
      return 'System Maintenance';
    case 'DataProcessing':
      return 'Data Processing';
  }
}

export function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function truncate(text: string, width: number): string {
  const line = text.replace(/\s*\n\s*/g, ' ');
  return line.length > width ? `${line.slice(0, width - 3)}...` : line;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60_000)}m${Math.floor((ms % 60_000) / 1000)}s`;
}

export function renderPatterns(patterns: readonly DetectedPattern[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return serializePatterns(patterns);
    case 'plain':
      return patterns
        .map((p) => `${p.description} (${formatPercent(p.confidence)}, ${p.frequency}x)`)
        .join('\n');
    case 'table':
      return renderPatternTable(patterns);
  }
}

function renderPatternTable(patterns: readonly DetectedPattern[]): string {
  const lines: string[] = [];
  lines.push(
    chalk.bold(`${'Type'.padEnd(32)} ${'Confidence'.padEnd(10)} ${'Freq'.padEnd(5)} Description`)
  );

  for (const pattern of patterns) {
    const confidence = formatPercent(pattern.confidence).padEnd(10);
    const colored =
      pattern.confidence >= 0.7
        ? chalk.green(confidence)
        : pattern.confidence >= 0.5
          ? chalk.yellow(confidence)
          : chalk.gray(confidence);
    lines.push(
      `${patternTypeLabel(pattern.patternType).padEnd(32)} ${colored} ${String(pattern.frequency).padEnd(5)} ${pattern.description}`
    );
    for (const command of pattern.commands.slice(0, 3)) {
      lines.push(chalk.gray(`    $ ${truncate(command, 70)}`));
    }
  }

  return lines.join('\n');
}

export function renderCommands(commands: readonly ShellCommand[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(commands.map(commandToJson), null, 2);
    case 'plain':
      return commands.map((c) => c.raw).join('\n');
    case 'table':
      return commands
        .map((c) => {
          const status = c.exitCode === 0 ? chalk.green('✓') : chalk.red('✗');
          const time = dayjs(c.timestamp).format('YYYY-MM-DD HH:mm:ss');
          return `  ${chalk.gray(time)} ${status} ${truncate(c.raw, 80)}`;
        })
        .join('\n');
  }
}

export function renderStats(stats: CommandStats): string {
  const lines: string[] = [];

  lines.push(`Commands: ${stats.totalCommands}`);
  lines.push(`Success rate: ${formatPercent(stats.successRate)}`);
  lines.push(`Average duration: ${formatDuration(stats.averageDurationMs)}`);

  if (stats.topCommands.length > 0) {
    lines.push('');
    lines.push('Top commands:');
    const max = Math.max(...stats.topCommands.map((c) => c.count));
    for (const { command, count, successRate } of stats.topCommands) {
      lines.push(
        `  ${command.padEnd(15)} ${bar(count, max)} ${count} (${formatPercent(successRate)} ok)`
      );
    }
  }

  if (stats.commandsByHour.length > 0) {
    lines.push('');
    lines.push('By hour (UTC):');
    const max = Math.max(...stats.commandsByHour.map((h) => h.count));
    for (const { hour, count } of stats.commandsByHour) {
      lines.push(`  ${String(hour).padStart(2, '0')}:00 ${bar(count, max)} ${count}`);
    }
  }

  if (stats.topDirectories.length > 0) {
    lines.push('');
    lines.push('Top directories:');
    for (const { directory, count } of stats.topDirectories) {
      lines.push(`  ${String(count).padStart(5)}  ${directory}`);
    }
  }

  return lines.join('\n');
}

function bar(count: number, max: number): string {
  const width = max > 0 ? Math.max(1, Math.round((count / max) * 20)) : 0;
  return chalk.cyan('█'.repeat(width));
}

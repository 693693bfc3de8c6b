/**
 * Export Module
 *
 * Exports command history and detected patterns as JSON, CSV or Markdown.
 */

import dayjs from 'dayjs';
import * as fs from 'node:fs';
import { commandToJson, formatDuration, formatPercent, patternTypeLabel } from './output.js';
import { patternToJson } from './patterns/serialize.js';
import type { DetectedPattern, ShellCommand } from './types.js';

export const EXPORT_FORMATS = ['json', 'csv', 'markdown'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

const EXTENSIONS: Record<ExportFormat, string> = {
  json: '.json',
  csv: '.csv',
  markdown: '.md',
};

export interface ExportOptions {
  format: ExportFormat;
  outputPath?: string;
  exportedAt?: Date;
}

/**
 * Render history and patterns in the requested format. With an output path
 * the content is written there and the final path is returned instead.
 */
export function exportData(
  commands: readonly ShellCommand[],
  patterns: readonly DetectedPattern[],
  options: ExportOptions
): string {
  const exportedAt = options.exportedAt ?? new Date();
  const content = renderExport(commands, patterns, options.format, exportedAt);

  if (options.outputPath) {
    const extension = EXTENSIONS[options.format];
    const outputPath = options.outputPath.endsWith(extension)
      ? options.outputPath
      : `${options.outputPath}${extension}`;
    fs.writeFileSync(outputPath, content, 'utf-8');
    return outputPath;
  }

  return content;
}

function renderExport(
  commands: readonly ShellCommand[],
  patterns: readonly DetectedPattern[],
  format: ExportFormat,
  exportedAt: Date
): string {
  switch (format) {
    case 'json':
      return exportToJson(commands, patterns, exportedAt);
    case 'csv':
      return exportToCsv(commands);
    case 'markdown':
      return exportToMarkdown(commands, patterns, exportedAt);
  }
}

function exportToJson(
  commands: readonly ShellCommand[],
  patterns: readonly DetectedPattern[],
  exportedAt: Date
): string {
  const data = {
    exported_at: exportedAt.toISOString(),
    command_count: commands.length,
    commands: commands.map(commandToJson),
    patterns: patterns.map(patternToJson),
  };
  return JSON.stringify(data, null, 2);
}

const CSV_HEADER = [
  'timestamp',
  'command',
  'exit_code',
  'duration_ms',
  'working_directory',
  'session_id',
];

function exportToCsv(commands: readonly ShellCommand[]): string {
  const rows = commands.map((c) =>
    [
      c.timestamp.toISOString(),
      c.raw,
      String(c.exitCode),
      String(c.durationMs),
      c.workingDirectory,
      c.sessionId,
    ]
      .map(escapeCsv)
      .join(',')
  );
  return [CSV_HEADER.join(','), ...rows].join('\n');
}

/**
 * Quote a field when it holds a comma, quote or line break.
 */
export function escapeCsv(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

function exportToMarkdown(
  commands: readonly ShellCommand[],
  patterns: readonly DetectedPattern[],
  exportedAt: Date
): string {
  const lines: string[] = [];

  lines.push(`# Shellmind Export - ${dayjs(exportedAt).format('YYYY-MM-DD')}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  const failed = commands.filter((c) => c.exitCode !== 0).length;
  lines.push(`- **Commands:** ${commands.length} (${failed} failed)`);
  lines.push(`- **Patterns:** ${patterns.length}`);
  lines.push('');

  if (patterns.length > 0) {
    lines.push('## Patterns');
    lines.push('');
    for (const pattern of patterns) {
      lines.push(`### ${pattern.description}`);
      lines.push('');
      lines.push(`- **Type:** ${patternTypeLabel(pattern.patternType)}`);
      lines.push(`- **Confidence:** ${formatPercent(pattern.confidence)}`);
      lines.push(`- **Frequency:** ${pattern.frequency}`);
      if (pattern.commands.length > 0) {
        lines.push('');
        lines.push('```sh');
        lines.push(...pattern.commands);
        lines.push('```');
      }
      lines.push('');
    }
  }

  if (commands.length > 0) {
    lines.push('## Command History');
    lines.push('');
    lines.push('| Time | Command | Exit | Duration | Directory |');
    lines.push('| --- | --- | --- | --- | --- |');
    for (const c of commands) {
      lines.push(
        `| ${dayjs(c.timestamp).format('YYYY-MM-DD HH:mm:ss')} | \`${escapeMarkdownCell(c.raw)}\` | ${c.exitCode} | ${formatDuration(c.durationMs)} | ${escapeMarkdownCell(c.workingDirectory)} |`
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

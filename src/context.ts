/**
 * Assistant context
 *
 * Summarises detected workflows and recent activity as markdown that can be
 * pasted into an AI assistant or sent to Claude by `context --generate`.
 */

import dayjs from 'dayjs';
import { formatPercent, patternTypeLabel, truncate } from './output.js';
import type { DetectedPattern, ShellCommand } from './types.js';

export interface ContextOptions {
  maxPatterns?: number;
  maxRecent?: number;
}

export function buildContext(
  patterns: readonly DetectedPattern[],
  recent: readonly ShellCommand[],
  options: ContextOptions = {}
): string {
  const maxPatterns = options.maxPatterns ?? 10;
  const maxRecent = options.maxRecent ?? 20;
  const lines: string[] = [];

  lines.push('# Shell Workflow Context');
  lines.push('');

  lines.push('## Detected Workflows');
  lines.push('');
  if (patterns.length === 0) {
    lines.push('No recurring workflows detected yet.');
  } else {
    for (const pattern of patterns.slice(0, maxPatterns)) {
      lines.push(
        `- **${pattern.description}** (${patternTypeLabel(pattern.patternType)}, ${formatPercent(pattern.confidence)} confidence, seen ${pattern.frequency}x)`
      );
      if (pattern.commands.length > 0) {
        lines.push(`  - Commands: ${pattern.commands.map((c) => `\`${truncate(c, 60)}\``).join(' → ')}`);
      }
      if (pattern.metadata.directories.length > 0) {
        lines.push(`  - Directories: ${pattern.metadata.directories.join(', ')}`);
      }
    }
  }
  lines.push('');

  const shown = recent.slice(-maxRecent);
  lines.push('## Recent Commands');
  lines.push('');
  if (shown.length === 0) {
    lines.push('No commands recorded yet.');
  } else {
    for (const command of shown) {
      const status = command.exitCode === 0 ? 'ok' : `exit ${command.exitCode}`;
      lines.push(
        `- ${dayjs(command.timestamp).format('HH:mm')} \`${truncate(command.raw, 80)}\` (${status}) in ${command.workingDirectory}`
      );
    }
    const failed = shown.filter((c) => c.exitCode !== 0).length;
    lines.push('');
    lines.push(`${shown.length} recent commands, ${failed} failed.`);
  }

  return lines.join('\n');
}

/**
 * Aggregates statistics across the commands backing one pattern.
 */

import type { PatternMetadata, ShellCommand } from '../types.js';

export function aggregateMetadata(commands: readonly ShellCommand[]): PatternMetadata {
  if (commands.length === 0) {
    return {
      firstSeen: new Date(0),
      lastSeen: new Date(0),
      directories: [],
      successRate: 0,
      avgDurationMs: 0,
    };
  }

  let first = commands[0].timestamp.getTime();
  let last = first;
  let successful = 0;
  let totalDuration = 0;
  const directories = new Set<string>();

  for (const command of commands) {
    const time = command.timestamp.getTime();
    if (time < first) first = time;
    if (time > last) last = time;
    if (command.exitCode === 0) successful++;
    totalDuration += command.durationMs;
    directories.add(command.workingDirectory);
  }

  return {
    firstSeen: new Date(first),
    lastSeen: new Date(last),
    directories: [...directories],
    successRate: successful / commands.length,
    avgDurationMs: Math.floor(totalDuration / commands.length),
  };
}

/**
 * Directory Workflow Detector
 *
 * Looks for three-command runs that repeat within a single working directory.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import {
  DIRECTORY_MULTIPLIER,
  DIRECTORY_WINDOW,
  MIN_CONFIDENCE,
  MIN_DIRECTORY_COMMANDS,
} from './constants.js';
import { aggregateMetadata } from './metadata.js';
import { clampConfidence, ratio, sequenceKey, shortenPath } from './normalize.js';

export function detectDirectoryWorkflows(commands: readonly ShellCommand[]): DetectedPattern[] {
  const patterns: DetectedPattern[] = [];
  const byDirectory = new Map<string, ShellCommand[]>();

  for (const command of commands) {
    const list = byDirectory.get(command.workingDirectory);
    if (list) {
      list.push(command);
    } else {
      byDirectory.set(command.workingDirectory, [command]);
    }
  }

  for (const [directory, dirCommands] of byDirectory) {
    if (dirCommands.length < MIN_DIRECTORY_COMMANDS) continue;

    const sequences = new Map<string, { count: number; first: number }>();
    for (let start = 0; start + DIRECTORY_WINDOW <= dirCommands.length; start++) {
      const key = sequenceKey(dirCommands.slice(start, start + DIRECTORY_WINDOW));
      const entry = sequences.get(key);
      if (entry) {
        entry.count++;
      } else {
        sequences.set(key, { count: 1, first: start });
      }
    }

    for (const { count, first } of sequences.values()) {
      if (count < 2) continue;

      const share = ratio(count, dirCommands.length);
      if (share === null) continue;

      const confidence = clampConfidence(share * DIRECTORY_MULTIPLIER);
      if (confidence < MIN_CONFIDENCE) continue;

      patterns.push({
        patternType: { kind: 'DirectorySpecific', directory },
        description: `Common workflow in ${shortenPath(directory)}`,
        confidence,
        frequency: count,
        commands: dirCommands.slice(first, first + DIRECTORY_WINDOW).map((c) => c.raw),
        metadata: aggregateMetadata(dirCommands),
      });
    }
  }

  return patterns;
}

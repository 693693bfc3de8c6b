/**
 * Pattern Detector
 *
 * Runs every detector over one snapshot of the command log and ranks the
 * combined results by confidence.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import { MIN_COMMANDS_FOR_DETECTION } from './constants.js';
import { detectDirectoryWorkflows } from './directory.js';
import {
  detectBuildTestPatterns,
  detectFileManipulation,
  detectSystemMaintenance,
  detectVersionControlPatterns,
} from './domain.js';
import { detectErrorRecoveries } from './recovery.js';
import { detectCommandSequences } from './sequence.js';
import { detectTimeRoutines } from './temporal.js';

export type Detector = (commands: readonly ShellCommand[]) => DetectedPattern[];

export const DETECTORS: readonly Detector[] = [
  detectCommandSequences,
  detectTimeRoutines,
  detectDirectoryWorkflows,
  detectErrorRecoveries,
  detectBuildTestPatterns,
  detectVersionControlPatterns,
  detectFileManipulation,
  detectSystemMaintenance,
];

export class PatternDetector {
  private readonly commands: readonly ShellCommand[];

  /**
   * @param commands - log snapshot; copied and ordered oldest first
   */
  constructor(commands: readonly ShellCommand[]) {
    this.commands = [...commands].sort(
      (a, b) => a.timestamp.getTime() - b.timestamp.getTime()
    );
  }

  detectPatterns(): DetectedPattern[] {
    if (this.commands.length < MIN_COMMANDS_FOR_DETECTION) {
      return [];
    }

    return rankPatterns(DETECTORS.map((detect) => detect(this.commands)));
  }
}

/**
 * Merge detector outputs, highest confidence first. Ties keep detector order.
 */
export function rankPatterns(groups: readonly DetectedPattern[][]): DetectedPattern[] {
  return groups.flat().sort((a, b) => compareConfidence(b.confidence, a.confidence));
}

export function compareConfidence(a: number, b: number): number {
  if (Number.isNaN(a) || Number.isNaN(b) || a === b) return 0;
  return a < b ? -1 : 1;
}

export function detectPatterns(commands: readonly ShellCommand[]): DetectedPattern[] {
  return new PatternDetector(commands).detectPatterns();
}

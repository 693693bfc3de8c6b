/**
 * Error-Recovery Detector
 *
 * Collects every failed -> successful pair of neighbouring commands, groups
 * them by the base commands involved and reports groups that keep repeating.
 * Each (error, fix) pair is reported once, however many times it occurs.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import { MIN_CONFIDENCE, RECOVERY_MULTIPLIER } from './constants.js';
import { aggregateMetadata } from './metadata.js';
import { areRelatedCommands, clampConfidence, commandKey, ratio } from './normalize.js';

interface RecoveryInstance {
  failed: ShellCommand;
  fixed: ShellCommand;
}

export function detectErrorRecoveries(commands: readonly ShellCommand[]): DetectedPattern[] {
  const groups = new Map<string, RecoveryInstance[]>();

  for (let i = 1; i < commands.length; i++) {
    const failed = commands[i - 1];
    const fixed = commands[i];
    if (failed.exitCode === 0 || fixed.exitCode !== 0) continue;

    const key = `${commandKey(failed)}\0${commandKey(fixed)}`;
    const instances = groups.get(key);
    if (instances) {
      instances.push({ failed, fixed });
    } else {
      groups.set(key, [{ failed, fixed }]);
    }
  }

  const patterns: DetectedPattern[] = [];
  for (const instances of groups.values()) {
    if (instances.length < 2) continue;

    const seed = instances.find(({ failed, fixed }) => areRelatedCommands(failed, fixed));
    if (!seed) continue;

    const share = ratio(instances.length, commands.length);
    if (share === null) continue;

    const confidence = clampConfidence(share * RECOVERY_MULTIPLIER);
    if (confidence < MIN_CONFIDENCE) continue;

    patterns.push({
      patternType: {
        kind: 'ErrorRecovery',
        errorCommand: seed.failed.raw,
        fixCommand: seed.fixed.raw,
      },
      description: 'Error recovery pattern detected',
      confidence,
      frequency: instances.length,
      commands: [seed.failed.raw, seed.fixed.raw],
      metadata: aggregateMetadata(instances.flatMap(({ failed, fixed }) => [failed, fixed])),
    });
  }

  return patterns;
}

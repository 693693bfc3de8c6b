/**
 * Sequence Miner
 *
 * Finds contiguous runs of commands that repeat somewhere else in the log,
 * for every window length between MIN_SEQUENCE_LENGTH and MAX_SEQUENCE_LENGTH.
 * Windows are compared by command signature so that `git add` and
 * `git push` count as different steps.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import {
  MAX_SEQUENCE_LENGTH,
  MIN_CONFIDENCE,
  MIN_SEQUENCE_LENGTH,
  SEQUENCE_INTERVAL_BOOST,
  SEQUENCE_LENGTH_BOOST,
  SEQUENCE_REGULARITY_RATIO,
} from './constants.js';
import { aggregateMetadata } from './metadata.js';
import {
  clampConfidence,
  commandSignature,
  mean,
  ratio,
  sequenceKey,
  variance,
} from './normalize.js';

export function detectCommandSequences(commands: readonly ShellCommand[]): DetectedPattern[] {
  const patterns: DetectedPattern[] = [];

  for (let length = MIN_SEQUENCE_LENGTH; length <= MAX_SEQUENCE_LENGTH; length++) {
    if (commands.length < length) {
      continue;
    }

    const occurrences = new Map<string, number[]>();
    for (let start = 0; start + length <= commands.length; start++) {
      const key = sequenceKey(commands.slice(start, start + length), commandSignature);
      const starts = occurrences.get(key);
      if (starts) {
        starts.push(start);
      } else {
        occurrences.set(key, [start]);
      }
    }

    for (const starts of occurrences.values()) {
      if (starts.length < 2) continue;

      const confidence = sequenceConfidence(starts, length, commands.length);
      if (confidence < MIN_CONFIDENCE) continue;

      const contributing = starts.flatMap((start) => commands.slice(start, start + length));
      patterns.push({
        patternType: { kind: 'CommandSequence', length },
        description: `${length}-command workflow pattern`,
        confidence,
        frequency: starts.length,
        commands: commands.slice(starts[0], starts[0] + length).map((c) => c.raw),
        metadata: aggregateMetadata(contributing),
      });
    }
  }

  return patterns;
}

/**
 * Score a repeated sequence from the start indices of its occurrences.
 *
 * Longer sequences and sequences that recur at a steady rhythm score higher.
 */
export function sequenceConfidence(
  starts: readonly number[],
  length: number,
  totalCommands: number
): number {
  const base = ratio(starts.length, totalCommands - length + 1);
  if (base === null) return 0;

  return clampConfidence(base + lengthBoost(length) + intervalBoost(starts));
}

export function lengthBoost(length: number): number {
  return (length - 3) * SEQUENCE_LENGTH_BOOST;
}

export function intervalBoost(starts: readonly number[]): number {
  if (starts.length < 2) return 0;

  const gaps: number[] = [];
  for (let i = 1; i < starts.length; i++) {
    gaps.push(starts[i] - starts[i - 1]);
  }

  return variance(gaps) < mean(gaps) * SEQUENCE_REGULARITY_RATIO ? SEQUENCE_INTERVAL_BOOST : 0;
}

/**
 * Temporal Routine Detector
 *
 * Finds command types that keep coming back at the same hour of the day.
 * Hours are taken in UTC so results do not depend on the machine's timezone.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import {
  MAX_REPRESENTATIVE_COMMANDS,
  MIN_CONFIDENCE,
  MIN_HOURLY_BUCKET_SIZE,
  MIN_ROUTINE_COUNT,
  ROUTINE_MULTIPLIER,
} from './constants.js';
import { aggregateMetadata } from './metadata.js';
import { clampConfidence, commandKey, ratio, variance } from './normalize.js';

export function detectTimeRoutines(commands: readonly ShellCommand[]): DetectedPattern[] {
  const patterns: DetectedPattern[] = [];
  const buckets = new Map<number, ShellCommand[]>();

  for (const command of commands) {
    const hour = command.timestamp.getUTCHours();
    const bucket = buckets.get(hour);
    if (bucket) {
      bucket.push(command);
    } else {
      buckets.set(hour, [command]);
    }
  }

  const hours = [...buckets.keys()].sort((a, b) => a - b);
  for (const hour of hours) {
    const bucket = buckets.get(hour) ?? [];
    if (bucket.length < MIN_HOURLY_BUCKET_SIZE) continue;

    const counts = new Map<string, number>();
    for (const command of bucket) {
      const key = commandKey(command);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    for (const [type, count] of counts) {
      if (count < MIN_ROUTINE_COUNT) continue;

      const share = ratio(count, bucket.length);
      if (share === null) continue;

      const confidence = clampConfidence(share * ROUTINE_MULTIPLIER);
      if (confidence < MIN_CONFIDENCE) continue;

      patterns.push({
        patternType: {
          kind: 'TimeBasedRoutine',
          hour,
          varianceMinutes: minuteSpread(bucket),
        },
        description: `Daily routine around ${hour}:00`,
        confidence,
        frequency: count,
        commands: bucket
          .filter((c) => commandKey(c) === type)
          .slice(0, MAX_REPRESENTATIVE_COMMANDS)
          .map((c) => c.raw),
        metadata: aggregateMetadata(bucket),
      });
    }
  }

  return patterns;
}

/**
 * Standard deviation of minute-of-hour, truncated to whole minutes
 */
export function minuteSpread(commands: readonly ShellCommand[]): number {
  if (commands.length < 2) return 0;
  return Math.trunc(Math.sqrt(variance(commands.map((c) => c.timestamp.getUTCMinutes()))));
}

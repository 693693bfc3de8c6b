/**
 * Pattern filtering by type short name and confidence
 */

import type { DetectedPattern, PatternKind } from '../types.js';

export const PATTERN_TYPE_NAMES = {
  sequence: 'CommandSequence',
  time: 'TimeBasedRoutine',
  directory: 'DirectorySpecific',
  error: 'ErrorRecovery',
  build: 'BuildTest',
  vcs: 'VersionControl',
  file: 'FileManipulation',
  system: 'SystemMaintenance',
} as const satisfies Record<string, PatternKind>;

export type PatternTypeName = keyof typeof PATTERN_TYPE_NAMES;

export function isPatternTypeName(value: string): value is PatternTypeName {
  return Object.hasOwn(PATTERN_TYPE_NAMES, value);
}

export interface PatternFilter {
  minConfidence: number;
  type?: PatternTypeName;
}

export function filterPatterns(
  patterns: readonly DetectedPattern[],
  filter: PatternFilter
): DetectedPattern[] {
  const kind = filter.type ? PATTERN_TYPE_NAMES[filter.type] : undefined;
  return patterns.filter(
    (p) => p.confidence >= filter.minConfidence && (kind === undefined || p.patternType.kind === kind)
  );
}

/**
 * JSON form of detected patterns, shared by `patterns --format json`,
 * exports and anything that reads them back.
 */

import { z } from 'zod';
import type { DetectedPattern, PatternType } from '../types.js';

const PatternTypeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('CommandSequence'), length: z.number().int().positive() }),
  z.object({
    kind: z.literal('TimeBasedRoutine'),
    hour: z.number().int().min(0).max(23),
    variance_minutes: z.number().int().min(0),
  }),
  z.object({ kind: z.literal('DirectorySpecific'), directory: z.string() }),
  z.object({
    kind: z.literal('ErrorRecovery'),
    error_command: z.string(),
    fix_command: z.string(),
  }),
  z.object({ kind: z.literal('BuildTest'), tool: z.string() }),
  z.object({ kind: z.literal('VersionControl'), vcs: z.string() }),
  z.object({ kind: z.literal('FileManipulation') }),
  z.object({ kind: z.literal('SystemMaintenance') }),
  z.object({ kind: z.literal('DataProcessing') }),
]);

export const PatternJsonSchema = z.object({
  pattern_type: PatternTypeSchema,
  description: z.string(),
  confidence: z.number().min(0).max(1),
  frequency: z.number().int().min(0),
  commands: z.array(z.string()),
  metadata: z.object({
    first_seen: z.string().datetime(),
    last_seen: z.string().datetime(),
    directories: z.array(z.string()),
    success_rate: z.number().min(0).max(1),
    avg_duration_ms: z.number().min(0),
  }),
});

export type PatternJson = z.infer<typeof PatternJsonSchema>;
type PatternTypeJson = z.infer<typeof PatternTypeSchema>;

function patternTypeToJson(type: PatternType): PatternTypeJson {
  switch (type.kind) {
    case 'TimeBasedRoutine':
      return { kind: type.kind, hour: type.hour, variance_minutes: type.varianceMinutes };
    case 'ErrorRecovery':
      return {
        kind: type.kind,
        error_command: type.errorCommand,
        fix_command: type.fixCommand,
      };
    case 'CommandSequence':
    case 'DirectorySpecific':
    case 'BuildTest':
    case 'VersionControl':
    case 'FileManipulation':
    case 'SystemMaintenance':
    case 'DataProcessing':
      return { ...type };
  }
}

function patternTypeFromJson(json: PatternTypeJson): PatternType {
  switch (json.kind) {
    case 'TimeBasedRoutine':
      return { kind: json.kind, hour: json.hour, varianceMinutes: json.variance_minutes };
    case 'ErrorRecovery':
      return { kind: json.kind, errorCommand: json.error_command, fixCommand: json.fix_command };
    case 'CommandSequence':
    case 'DirectorySpecific':
    case 'BuildTest':
    case 'VersionControl':
    case 'FileManipulation':
    case 'SystemMaintenance':
    case 'DataProcessing':
      return { ...json };
  }
}

export function patternToJson(pattern: DetectedPattern): PatternJson {
  return {
    pattern_type: patternTypeToJson(pattern.patternType),
    description: pattern.description,
    confidence: pattern.confidence,
    frequency: pattern.frequency,
    commands: [...pattern.commands],
    metadata: {
      first_seen: pattern.metadata.firstSeen.toISOString(),
      last_seen: pattern.metadata.lastSeen.toISOString(),
      directories: [...pattern.metadata.directories],
      success_rate: pattern.metadata.successRate,
      avg_duration_ms: pattern.metadata.avgDurationMs,
    },
  };
}

export function patternFromJson(value: unknown): DetectedPattern {
  const json = PatternJsonSchema.parse(value);
  return {
    patternType: patternTypeFromJson(json.pattern_type),
    description: json.description,
    confidence: json.confidence,
    frequency: json.frequency,
    commands: json.commands,
    metadata: {
      firstSeen: new Date(json.metadata.first_seen),
      lastSeen: new Date(json.metadata.last_seen),
      directories: json.metadata.directories,
      successRate: json.metadata.success_rate,
      avgDurationMs: json.metadata.avg_duration_ms,
    },
  };
}

export function serializePatterns(patterns: readonly DetectedPattern[]): string {
  return JSON.stringify(patterns.map(patternToJson), null, 2);
}

export function parsePatterns(text: string): DetectedPattern[] {
  return z.array(z.unknown()).parse(JSON.parse(text)).map(patternFromJson);
}

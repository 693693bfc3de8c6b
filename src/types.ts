/**
 * Core types for shellmind
 */

export interface CommandEnvironment {
  shell: string;
  user: string;
  hostname: string;
  terminal: string;
}

/**
 * One recorded shell invocation. Records are immutable once stored.
 */
export interface ShellCommand {
  id: string;
  raw: string;
  parsedCommand: string;
  arguments: string[];
  workingDirectory: string;
  exitCode: number;
  durationMs: number;
  timestamp: Date;
  sessionId: string;
  environment: CommandEnvironment;
}

export type PatternType =
  | { kind: 'CommandSequence'; length: number }
  | { kind: 'TimeBasedRoutine'; hour: number; varianceMinutes: number }
  | { kind: 'DirectorySpecific'; directory: string }
  | { kind: 'ErrorRecovery'; errorCommand: string; fixCommand: string }
  | { kind: 'BuildTest'; tool: string }
  | { kind: 'VersionControl'; vcs: string }
  | { kind: 'FileManipulation' }
  | { kind: 'SystemMaintenance' }
  // Declared for a future awk/sed/jq detector; nothing emits it yet.
  | { kind: 'DataProcessing' };

export type PatternKind = PatternType['kind'];

export interface PatternMetadata {
  firstSeen: Date;
  lastSeen: Date;
  directories: string[];
  successRate: number;
  avgDurationMs: number;
}

export interface DetectedPattern {
  patternType: PatternType;
  description: string;
  confidence: number; // 0-1
  frequency: number;
  commands: string[];
  metadata: PatternMetadata;
}

export interface CommandStats {
  totalCommands: number;
  successRate: number;
  averageDurationMs: number;
  topCommands: Array<{ command: string; count: number; successRate: number }>;
  commandsByHour: Array<{ hour: number; count: number }>;
  topDirectories: Array<{ directory: string; count: number }>;
}

export type OutputFormat = 'table' | 'json' | 'plain';

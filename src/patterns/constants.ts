/**
 * Tunable heuristics for the pattern detectors.
 *
 * The multipliers are uncalibrated and exist to keep scores comparable
 * across detectors, not to produce probabilities.
 */

export const MIN_CONFIDENCE = 0.3;
export const MIN_COMMANDS_FOR_DETECTION = 3;
export const MAX_REPRESENTATIVE_COMMANDS = 10;

// Sequence miner
export const MIN_SEQUENCE_LENGTH = 4;
export const MAX_SEQUENCE_LENGTH = 10;
export const SEQUENCE_LENGTH_BOOST = 0.1;
export const SEQUENCE_INTERVAL_BOOST = 0.2;
export const SEQUENCE_REGULARITY_RATIO = 0.3;

// Temporal routines
export const MIN_HOURLY_BUCKET_SIZE = 3;
export const MIN_ROUTINE_COUNT = 3;
export const ROUTINE_MULTIPLIER = 0.8;

// Directory workflows
export const MIN_DIRECTORY_COMMANDS = 5;
export const DIRECTORY_WINDOW = 3;
export const DIRECTORY_MULTIPLIER = 1.2;

// Error recovery
export const RECOVERY_MULTIPLIER = 5.0;

// Domain heuristics
export const BUILD_TOOLS = ['cargo', 'npm', 'make', 'mvn', 'gradle', 'yarn', 'pip', 'go'] as const;
export const MIN_BUILD_TOOL_COUNT = 3;
export const BUILD_TEST_MULTIPLIER = 3.0;

export const VCS_TOOLS = ['git', 'svn', 'hg', 'fossil'] as const;
export const MIN_VCS_COUNT = 5;
export const VCS_SUBCOMMAND_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['status', 0.2],
  ['add', 0.3],
  ['commit', 0.3],
  ['push', 0.2],
]);

export const FILE_TOOLS = ['cp', 'mv', 'rm', 'mkdir', 'touch', 'chmod', 'chown', 'ln'] as const;
export const MIN_FILE_COMMANDS = 5;
export const FILE_MULTIPLIER = 2.0;

export const MAINTENANCE_TOOLS = [
  'apt',
  'yum',
  'brew',
  'systemctl',
  'service',
  'df',
  'du',
  'ps',
  'top',
] as const;
export const MIN_MAINTENANCE_COMMANDS = 3;
export const MAINTENANCE_MULTIPLIER = 3.0;

// Failed command -> command that usually fixes it, matched by substring
export const ERROR_FIX_RELATIONS: ReadonlyArray<readonly [string, string]> = [
  ['npm', 'npm install'],
  ['cargo', 'cargo build'],
  ['git', 'git checkout'],
  ['docker', 'docker start'],
  ['systemctl', 'systemctl start'],
];

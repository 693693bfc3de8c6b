/**
 * Domain Heuristic Detectors
 *
 * Fixed tool vocabularies for build/test loops, version control, file
 * management and system maintenance.
 */

import type { DetectedPattern, ShellCommand } from '../types.js';
import {
  BUILD_TEST_MULTIPLIER,
  BUILD_TOOLS,
  FILE_MULTIPLIER,
  FILE_TOOLS,
  MAINTENANCE_MULTIPLIER,
  MAINTENANCE_TOOLS,
  MAX_REPRESENTATIVE_COMMANDS,
  MIN_BUILD_TOOL_COUNT,
  MIN_CONFIDENCE,
  MIN_FILE_COMMANDS,
  MIN_MAINTENANCE_COMMANDS,
  MIN_VCS_COUNT,
  VCS_SUBCOMMAND_WEIGHTS,
  VCS_TOOLS,
} from './constants.js';
import { aggregateMetadata } from './metadata.js';
import { clampConfidence, commandKey, ratio, representativeCommands } from './normalize.js';

function usesTool(tools: readonly string[]) {
  return (command: ShellCommand) => tools.includes(commandKey(command));
}

function subcommand(command: ShellCommand): string | undefined {
  return command.arguments[0];
}

export function detectBuildTestPatterns(commands: readonly ShellCommand[]): DetectedPattern[] {
  const patterns: DetectedPattern[] = [];

  for (const tool of BUILD_TOOLS) {
    const toolCommands = commands.filter(usesTool([tool]));
    if (toolCommands.length < MIN_BUILD_TOOL_COUNT) continue;

    const subcommands = new Set(toolCommands.map(subcommand));
    const hasTest = subcommands.has('test');
    const hasBuild = subcommands.has('build') || subcommands.has('compile');
    if (!hasTest || !hasBuild) continue;

    const share = ratio(toolCommands.length, commands.length);
    if (share === null) continue;

    const confidence = clampConfidence(share * BUILD_TEST_MULTIPLIER);
    if (confidence < MIN_CONFIDENCE) continue;

    patterns.push({
      patternType: { kind: 'BuildTest', tool },
      description: `Build-test workflow using ${tool}`,
      confidence,
      frequency: toolCommands.length,
      commands: representativeCommands(toolCommands, MAX_REPRESENTATIVE_COMMANDS),
      metadata: aggregateMetadata(toolCommands),
    });
  }

  return patterns;
}

export function detectVersionControlPatterns(
  commands: readonly ShellCommand[]
): DetectedPattern[] {
  const patterns: DetectedPattern[] = [];

  for (const vcs of VCS_TOOLS) {
    const vcsCommands = commands.filter(usesTool([vcs]));
    if (vcsCommands.length < MIN_VCS_COUNT) continue;

    let workflowScore = 0;
    let hasAdd = false;
    let hasCommit = false;
    for (const command of vcsCommands) {
      const sub = subcommand(command);
      if (sub === undefined) continue;
      workflowScore += VCS_SUBCOMMAND_WEIGHTS.get(sub) ?? 0;
      if (sub === 'add') hasAdd = true;
      if (sub === 'commit') hasCommit = true;
    }
    if (!hasAdd || !hasCommit) continue;

    const confidence = clampConfidence(workflowScore * (vcsCommands.length / 10));
    if (confidence < MIN_CONFIDENCE) continue;

    patterns.push({
      patternType: { kind: 'VersionControl', vcs },
      description: `${vcs} workflow pattern`,
      confidence,
      frequency: vcsCommands.length,
      commands: representativeCommands(vcsCommands, MAX_REPRESENTATIVE_COMMANDS),
      metadata: aggregateMetadata(vcsCommands),
    });
  }

  return patterns;
}

export function detectFileManipulation(commands: readonly ShellCommand[]): DetectedPattern[] {
  const fileCommands = commands.filter(usesTool(FILE_TOOLS));
  if (fileCommands.length < MIN_FILE_COMMANDS) return [];

  const share = ratio(fileCommands.length, commands.length);
  if (share === null) return [];

  const confidence = clampConfidence(share * FILE_MULTIPLIER);
  if (confidence < MIN_CONFIDENCE) return [];

  return [
    {
      patternType: { kind: 'FileManipulation' },
      description: 'File and directory management pattern',
      confidence,
      frequency: fileCommands.length,
      commands: representativeCommands(fileCommands, MAX_REPRESENTATIVE_COMMANDS),
      metadata: aggregateMetadata(fileCommands),
    },
  ];
}

export function detectSystemMaintenance(commands: readonly ShellCommand[]): DetectedPattern[] {
  const maintenance = commands.filter(usesTool(MAINTENANCE_TOOLS));
  if (maintenance.length < MIN_MAINTENANCE_COMMANDS) return [];

  const share = ratio(maintenance.length, commands.length);
  if (share === null) return [];

  const confidence = clampConfidence(share * MAINTENANCE_MULTIPLIER);
  if (confidence < MIN_CONFIDENCE) return [];

  return [
    {
      patternType: { kind: 'SystemMaintenance' },
      description: 'System maintenance and monitoring',
      confidence,
      frequency: maintenance.length,
      commands: representativeCommands(maintenance, MAX_REPRESENTATIVE_COMMANDS),
      metadata: aggregateMetadata(maintenance),
    },
  ];
}

/**
 * Command Recorder
 *
 * Turns one finished shell invocation into a stored ShellCommand.
 */

import { randomUUID } from 'node:crypto';
import * as os from 'node:os';
import * as path from 'node:path';
import { ValidationError } from './errors.js';
import { logCommandRecorded } from './logging.js';
import type { CommandStore } from './storage/database.js';
import type { CommandEnvironment, ShellCommand } from './types.js';
import { validateCommand, validateDirectory, validateShell } from './validation.js';

export interface ParsedCommandLine {
  command: string;
  args: string[];
}

/**
 * Split a command line on whitespace into the base command and its arguments.
 * Quotes are not interpreted.
 */
export function parseCommandLine(raw: string): ParsedCommandLine {
  const [command = '', ...args] = raw.trim().split(/\s+/).filter(Boolean);
  return { command, args };
}

export interface RecordInput {
  command: string;
  exitCode: number;
  durationMs: number;
  directory?: string;
  shell?: string;
  timestamp?: Date;
}

export function currentSessionId(env: NodeJS.ProcessEnv = process.env): string {
  return env.SHELLMIND_SESSION_ID || `${Math.floor(Date.now() / 1000)}-${process.pid}`;
}

export function detectEnvironment(
  shell?: string,
  env: NodeJS.ProcessEnv = process.env
): CommandEnvironment {
  const shellName = shell ?? (env.SHELL ? path.basename(env.SHELL) : 'bash');
  return {
    shell: validateShell(shellName),
    user: env.USER || os.userInfo().username,
    hostname: os.hostname(),
    terminal: env.TERM || 'unknown',
  };
}

export function buildCommand(input: RecordInput, env: NodeJS.ProcessEnv = process.env): ShellCommand {
  const raw = validateCommand(input.command);
  const workingDirectory = validateDirectory(input.directory ?? process.cwd());

  if (!Number.isInteger(input.exitCode)) {
    throw new ValidationError(`Exit code must be an integer, got ${input.exitCode}`, 'exit_code');
  }
  if (!Number.isInteger(input.durationMs) || input.durationMs < 0) {
    throw new ValidationError(
      `Duration must be a non-negative integer, got ${input.durationMs}`,
      'duration'
    );
  }

  const { command, args } = parseCommandLine(raw);
  return {
    id: randomUUID(),
    raw,
    parsedCommand: command,
    arguments: args,
    workingDirectory,
    exitCode: input.exitCode,
    durationMs: input.durationMs,
    timestamp: input.timestamp ?? new Date(),
    sessionId: currentSessionId(env),
    environment: detectEnvironment(input.shell, env),
  };
}

export function recordCommand(
  store: CommandStore,
  input: RecordInput,
  env: NodeJS.ProcessEnv = process.env
): ShellCommand {
  const command = buildCommand(input, env);
  store.save(command);
  logCommandRecorded(command.raw, command.exitCode, command.durationMs);
  return command;
}

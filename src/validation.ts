/**
 * Input validation for recorded commands
 */

import * as path from 'node:path';
import { ValidationError } from './errors.js';

export const MAX_COMMAND_BYTES = 10 * 1024;
export const MAX_DIRECTORY_BYTES = 4096;

export const SUPPORTED_SHELLS = [
  'bash',
  'zsh',
  'fish',
  'sh',
  'dash',
  'ksh',
  'tcsh',
  'csh',
  'nu',
  'elvish',
  'xonsh',
] as const;

export type SupportedShell = (typeof SUPPORTED_SHELLS)[number];

// Control characters other than tab, LF and CR
const FORBIDDEN_CONTROL = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/;

export function validateCommand(command: string): string {
  if (command.trim() === '') {
    throw new ValidationError('Command cannot be empty', 'command');
  }
  if (Buffer.byteLength(command, 'utf-8') > MAX_COMMAND_BYTES) {
    throw new ValidationError(
      `Command exceeds maximum length of ${MAX_COMMAND_BYTES} bytes`,
      'command'
    );
  }
  if (command.includes('\0')) {
    throw new ValidationError('Command contains null bytes', 'command');
  }
  if (FORBIDDEN_CONTROL.test(command)) {
    throw new ValidationError('Command contains invalid control characters', 'command');
  }
  return command;
}

/**
 * Returns the directory resolved to an absolute path.
 */
export function validateDirectory(directory: string): string {
  if (directory === '') {
    throw new ValidationError('Directory cannot be empty', 'directory');
  }
  if (Buffer.byteLength(directory, 'utf-8') > MAX_DIRECTORY_BYTES) {
    throw new ValidationError(
      `Directory path exceeds maximum length of ${MAX_DIRECTORY_BYTES} bytes`,
      'directory'
    );
  }
  if (directory.includes('\0')) {
    throw new ValidationError('Directory path contains null bytes', 'directory');
  }
  return path.resolve(directory);
}

export function validateShell(shell: string): SupportedShell {
  const found = SUPPORTED_SHELLS.find((name) => name === shell);
  if (!found) {
    throw new ValidationError(
      `Unsupported shell "${shell}". Supported: ${SUPPORTED_SHELLS.join(', ')}`,
      'shell'
    );
  }
  return found;
}

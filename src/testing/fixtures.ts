import type { ShellCommand } from '../types.js';

export interface CommandOverrides {
  exitCode?: number;
  durationMs?: number;
  directory?: string;
  timestamp?: Date;
  sessionId?: string;
}

let nextId = 0;

export function makeCommand(raw: string, overrides: CommandOverrides = {}): ShellCommand {
  const [parsedCommand = '', ...args] = raw.trim().split(/\s+/);
  nextId++;
  return {
    id: `cmd-${nextId}`,
    raw,
    parsedCommand,
    arguments: args,
    workingDirectory: overrides.directory ?? '/work',
    exitCode: overrides.exitCode ?? 0,
    durationMs: overrides.durationMs ?? 100,
    timestamp: overrides.timestamp ?? new Date(Date.UTC(2026, 2, 2, 10, 0)),
    sessionId: overrides.sessionId ?? 'test-session',
    environment: { shell: 'zsh', user: 'tester', hostname: 'localhost', terminal: 'xterm' },
  };
}

/**
 * One command per minute starting at `start`, all other fields default
 */
export function makeLog(
  raws: readonly string[],
  start: Date = new Date(Date.UTC(2026, 2, 2, 10, 0)),
  overrides: Omit<CommandOverrides, 'timestamp'> = {}
): ShellCommand[] {
  return raws.map((raw, i) =>
    makeCommand(raw, { ...overrides, timestamp: new Date(start.getTime() + i * 60_000) })
  );
}

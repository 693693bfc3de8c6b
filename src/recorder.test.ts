import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from './errors.js';
import { currentSessionId, parseCommandLine, recordCommand } from './recorder.js';
import { CommandStore } from './storage/database.js';

describe('parseCommandLine', () => {
  it('splits base command and arguments on whitespace', () => {
    expect(parseCommandLine('  git   commit -m  wip ')).toEqual({
      command: 'git',
      args: ['commit', '-m', 'wip'],
    });
  });

  it('returns an empty command for blank input', () => {
    expect(parseCommandLine('   ')).toEqual({ command: '', args: [] });
  });
});

describe('currentSessionId', () => {
  it('prefers the environment variable', () => {
    expect(currentSessionId({ SHELLMIND_SESSION_ID: 'abc' })).toBe('abc');
  });

  it('falls back to epoch seconds and pid', () => {
    expect(currentSessionId({})).toMatch(new RegExp(`^\\d+-${process.pid}$`));
  });
});

describe('recordCommand', () => {
  let store: CommandStore;
  const env = {
    SHELLMIND_SESSION_ID: 'session-1',
    SHELL: '/bin/zsh',
    USER: 'tester',
    TERM: 'xterm-256color',
  };

  beforeEach(() => {
    store = new CommandStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('stores a validated command with its environment', () => {
    const timestamp = new Date(Date.UTC(2026, 5, 1, 8, 30));
    const saved = recordCommand(
      store,
      { command: 'cargo build --release', exitCode: 0, durationMs: 1200, directory: '/src/app', timestamp },
      env
    );

    expect(saved).toMatchObject({
      raw: 'cargo build --release',
      parsedCommand: 'cargo',
      arguments: ['build', '--release'],
      workingDirectory: '/src/app',
      exitCode: 0,
      durationMs: 1200,
      timestamp,
      sessionId: 'session-1',
      environment: { shell: 'zsh', user: 'tester', terminal: 'xterm-256color' },
    });
    expect(store.findById(saved.id)).toEqual(saved);
  });

  it('uses an explicit shell over $SHELL', () => {
    const saved = recordCommand(
      store,
      { command: 'ls', exitCode: 0, durationMs: 0, directory: '/', shell: 'fish' },
      env
    );
    expect(saved.environment.shell).toBe('fish');
  });

  it('rejects invalid input without writing', () => {
    expect(() =>
      recordCommand(store, { command: '', exitCode: 0, durationMs: 0, directory: '/' }, env)
    ).toThrow(ValidationError);
    expect(() =>
      recordCommand(store, { command: 'ls', exitCode: 0, durationMs: -1, directory: '/' }, env)
    ).toThrow(/non-negative/);
    expect(() =>
      recordCommand(store, { command: 'ls', exitCode: 0, durationMs: 0, shell: 'cmd.exe' }, env)
    ).toThrow(/Unsupported shell/);
    expect(store.count()).toBe(0);
  });
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../errors.js';
import { makeCommand } from '../testing/fixtures.js';
import { CommandStore } from './database.js';

const at = (minute: number, hour = 10) => new Date(Date.UTC(2026, 2, 2, hour, minute));

describe('CommandStore', () => {
  let store: CommandStore;

  beforeEach(() => {
    store = new CommandStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('round-trips a command through save and findById', () => {
    const command = makeCommand('git commit -m wip', {
      exitCode: 1,
      durationMs: 250,
      directory: '/repo',
      timestamp: at(5),
      sessionId: 's-1',
    });
    store.save(command);

    expect(store.findById(command.id)).toEqual(command);
    expect(store.findById('missing')).toBeUndefined();
  });

  it('rejects duplicate ids with a StorageError', () => {
    const command = makeCommand('ls');
    store.save(command);
    expect(() => store.save(command)).toThrow(StorageError);
  });

  it('returns the most recent commands in ascending order', () => {
    store.saveMany([
      makeCommand('one', { timestamp: at(1) }),
      makeCommand('three', { timestamp: at(3) }),
      makeCommand('two', { timestamp: at(2) }),
    ]);

    expect(store.recent(2).map((c) => c.raw)).toEqual(['two', 'three']);
    expect(store.count()).toBe(3);
  });

  it('finds commands by session and time range', () => {
    store.saveMany([
      makeCommand('a', { timestamp: at(1), sessionId: 'x' }),
      makeCommand('b', { timestamp: at(2), sessionId: 'y' }),
      makeCommand('c', { timestamp: at(3), sessionId: 'x' }),
    ]);

    expect(store.findBySession('x').map((c) => c.raw)).toEqual(['a', 'c']);
    expect(store.findByTimeRange(at(2), at(3)).map((c) => c.raw)).toEqual(['b', 'c']);
  });

  describe('search', () => {
    beforeEach(() => {
      store.saveMany([
        makeCommand('npm test', { timestamp: at(1), directory: '/a' }),
        makeCommand('npm run build', { timestamp: at(2), directory: '/b', exitCode: 2 }),
        makeCommand('echo 100%', { timestamp: at(3) }),
        makeCommand('npm install', { timestamp: at(4), directory: '/a' }),
      ]);
    });

    it('matches substrings newest first', () => {
      expect(store.search('npm').map((c) => c.raw)).toEqual([
        'npm install',
        'npm run build',
        'npm test',
      ]);
    });

    it('applies limit, directory, since and success filters', () => {
      expect(store.search('npm', { limit: 1 }).map((c) => c.raw)).toEqual(['npm install']);
      expect(store.search('npm', { directory: '/a' }).map((c) => c.raw)).toEqual([
        'npm install',
        'npm test',
      ]);
      expect(store.search('npm', { since: at(2) }).map((c) => c.raw)).toEqual([
        'npm install',
        'npm run build',
      ]);
      expect(store.search('npm', { successOnly: true })).toHaveLength(2);
    });

    it('treats LIKE wildcards literally', () => {
      expect(store.search('%').map((c) => c.raw)).toEqual(['echo 100%']);
      expect(store.search('_')).toEqual([]);
    });
  });

  it('aggregates statistics', () => {
    store.saveMany([
      makeCommand('git status', { timestamp: at(1, 9), durationMs: 100, directory: '/repo' }),
      makeCommand('git push', { timestamp: at(2, 9), durationMs: 201, exitCode: 1, directory: '/repo' }),
      makeCommand('ls', { timestamp: at(3, 14), durationMs: 0, directory: '/tmp' }),
    ]);

    expect(store.stats()).toEqual({
      totalCommands: 3,
      successRate: 2 / 3,
      averageDurationMs: 100,
      topCommands: [
        { command: 'git', count: 2, successRate: 0.5 },
        { command: 'ls', count: 1, successRate: 1 },
      ],
      commandsByHour: [
        { hour: 9, count: 2 },
        { hour: 14, count: 1 },
      ],
      topDirectories: [
        { directory: '/repo', count: 2 },
        { directory: '/tmp', count: 1 },
      ],
    });

    expect(store.stats({ since: at(0, 12) }).totalCommands).toBe(1);
    expect(store.stats({ top: 1 }).topCommands).toHaveLength(1);
  });

  it('returns zeroed statistics for an empty store', () => {
    expect(store.stats()).toEqual({
      totalCommands: 0,
      successRate: 0,
      averageDurationMs: 0,
      topCommands: [],
      commandsByHour: [],
      topDirectories: [],
    });
  });

  it('deletes by age and by count', () => {
    store.saveMany([
      makeCommand('a', { timestamp: at(1) }),
      makeCommand('b', { timestamp: at(2) }),
      makeCommand('c', { timestamp: at(3) }),
      makeCommand('d', { timestamp: at(4) }),
    ]);

    expect(store.deleteBefore(at(2))).toBe(1);
    expect(store.deleteOldest(2)).toBe(2);
    expect(store.deleteOldest(0)).toBe(0);
    expect(store.recent(10).map((c) => c.raw)).toEqual(['d']);
    store.vacuum();
    expect(store.count()).toBe(1);
  });
});

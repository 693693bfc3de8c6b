import { describe, expect, it } from 'vitest';
import { makeCommand } from '../testing/fixtures.js';
import { aggregateMetadata } from './metadata.js';

describe('aggregateMetadata', () => {
  it('summarizes timing, directories and outcomes', () => {
    const early = new Date(Date.UTC(2026, 2, 1, 8, 0));
    const late = new Date(Date.UTC(2026, 2, 3, 18, 30));
    const commands = [
      makeCommand('make', { timestamp: late, directory: '/srv/app', durationMs: 100 }),
      makeCommand('make', { timestamp: early, directory: '/tmp', durationMs: 250, exitCode: 2 }),
      makeCommand('make', { directory: '/srv/app', durationMs: 0 }),
    ];

    expect(aggregateMetadata(commands)).toEqual({
      firstSeen: early,
      lastSeen: late,
      directories: ['/srv/app', '/tmp'],
      successRate: 2 / 3,
      avgDurationMs: 116,
    });
  });

  it('counts duplicated commands every time they appear', () => {
    const failed = makeCommand('npm test', { exitCode: 1 });
    const passed = makeCommand('npm test');

    expect(aggregateMetadata([failed, failed, failed, passed]).successRate).toBe(0.25);
  });

  it('returns zeroed metadata for an empty input', () => {
    expect(aggregateMetadata([])).toEqual({
      firstSeen: new Date(0),
      lastSeen: new Date(0),
      directories: [],
      successRate: 0,
      avgDurationMs: 0,
    });
  });
});

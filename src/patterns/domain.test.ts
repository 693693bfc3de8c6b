import { describe, expect, it } from 'vitest';
import { makeLog } from '../testing/fixtures.js';
import {
  detectBuildTestPatterns,
  detectFileManipulation,
  detectSystemMaintenance,
  detectVersionControlPatterns,
} from './domain.js';

describe('detectBuildTestPatterns', () => {
  it('reports a tool used for both building and testing', () => {
    const log = makeLog(['cargo build', 'cargo test', 'cargo test', 'ls', 'pwd', 'date']);

    const patterns = detectBuildTestPatterns(log);

    expect(patterns).toHaveLength(1);
    expect(patterns[0].patternType).toEqual({ kind: 'BuildTest', tool: 'cargo' });
    expect(patterns[0].description).toBe('Build-test workflow using cargo');
    expect(patterns[0].frequency).toBe(3);
    // 3 of 6 commands * 3, capped
    expect(patterns[0].confidence).toBe(1);
  });

  it('accepts compile as the build step', () => {
    const log = makeLog(['mvn compile', 'mvn test', 'mvn test']);
    expect(detectBuildTestPatterns(log).map((p) => p.patternType)).toEqual([
      { kind: 'BuildTest', tool: 'mvn' },
    ]);
  });

  it('does not report a tool that only ever runs tests', () => {
    const log = makeLog(['npm test', 'npm test', 'npm test', 'npm run lint']);
    expect(detectBuildTestPatterns(log)).toEqual([]);
  });
});

describe('detectVersionControlPatterns', () => {
  it('scores the add and commit loop', () => {
    const log = makeLog(['git status', 'git add .', 'git commit -m wip', 'git push', 'git log']);

    const [pattern] = detectVersionControlPatterns(log);

    expect(pattern.patternType).toEqual({ kind: 'VersionControl', vcs: 'git' });
    expect(pattern.description).toBe('git workflow pattern');
    // score 1.0 * (5 / 10)
    expect(pattern.confidence).toBeCloseTo(0.5, 10);
    expect(pattern.frequency).toBe(5);
  });

  it('requires both add and commit', () => {
    const log = makeLog(['git status', 'git add .', 'git push', 'git log', 'git diff', 'git status']);
    expect(detectVersionControlPatterns(log)).toEqual([]);
  });

  it('requires five uses of the tool', () => {
    const log = makeLog(['git add .', 'git commit -m a', 'git add .', 'git commit -m b']);
    expect(detectVersionControlPatterns(log)).toEqual([]);
  });
});

describe('detectFileManipulation', () => {
  it('reports heavy file management', () => {
    const log = makeLog([
      'mkdir out',
      'cp a.txt out/',
      'mv b.txt out/',
      'chmod +x run.sh',
      'rm -rf tmp',
      'ls',
      'pwd',
      'date',
      'whoami',
      'env',
    ]);

    const patterns = detectFileManipulation(log);

    expect(patterns).toHaveLength(1);
    expect(patterns[0].patternType).toEqual({ kind: 'FileManipulation' });
    expect(patterns[0].frequency).toBe(5);
    expect(patterns[0].confidence).toBe(1);
    expect(patterns[0].commands).toEqual([
      'mkdir out',
      'cp a.txt out/',
      'mv b.txt out/',
      'chmod +x run.sh',
      'rm -rf tmp',
    ]);
  });

  it('stays quiet when file commands are a small share of the log', () => {
    const file = ['touch a', 'touch b', 'touch c', 'touch d', 'touch e'];
    const other = Array.from({ length: 35 }, (_, i) => `echo ${i}`);
    // 5 of 40 commands * 2 = 0.25
    expect(detectFileManipulation(makeLog([...file, ...other]))).toEqual([]);
  });
});

describe('detectSystemMaintenance', () => {
  it('reports monitoring and package upkeep', () => {
    const log = makeLog(['df -h', 'du -sh .', 'brew upgrade', 'ls', 'pwd', 'date', 'id', 'env', 'tty', 'who']);

    const patterns = detectSystemMaintenance(log);

    expect(patterns).toHaveLength(1);
    expect(patterns[0].patternType).toEqual({ kind: 'SystemMaintenance' });
    expect(patterns[0].description).toBe('System maintenance and monitoring');
    expect(patterns[0].confidence).toBeCloseTo(0.9, 10);
  });

  it('needs three maintenance commands', () => {
    expect(detectSystemMaintenance(makeLog(['df -h', 'ps aux', 'ls']))).toEqual([]);
  });
});

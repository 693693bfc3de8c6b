import { describe, expect, it } from 'vitest';
import { makeLog } from '../testing/fixtures.js';
import type { DetectedPattern } from '../types.js';
import { compareConfidence, detectPatterns, PatternDetector, rankPatterns } from './detector.js';

const GIT_LOOP = [
  'git status',
  'git add .',
  'git commit -m test',
  'git push',
  'git status',
  'git add .',
  'git commit -m test',
  'git push',
];

function mixedLog() {
  const start = new Date(Date.UTC(2026, 2, 2, 9, 0));
  const log = makeLog(
    [
      ...GIT_LOOP,
      'npm run build',
      'npm install',
      'npm run build',
      'npm install',
      'cargo build',
      'cargo test',
      'cargo test',
      'mkdir out',
      'cp a out',
      'mv b out',
      'rm c',
      'touch d',
    ],
    start
  );
  return log.map((command) =>
    command.raw === 'npm run build' ? { ...command, exitCode: 1 } : command
  );
}

describe('PatternDetector', () => {
  it('returns nothing for fewer than three commands', () => {
    expect(new PatternDetector(makeLog(['ls', 'ls'])).detectPatterns()).toEqual([]);
  });

  it('finds the four-step git workflow repeated twice', () => {
    const patterns = detectPatterns(makeLog(GIT_LOOP));

    const sequences = patterns.filter(
      (p) => p.patternType.kind === 'CommandSequence' && p.patternType.length === 4
    );
    expect(sequences.map((p) => p.frequency)).toEqual([2]);
  });

  it('keeps every confidence between 0 and 1, highest first', () => {
    const patterns = detectPatterns(mixedLog());

    expect(patterns.length).toBeGreaterThan(0);
    for (const pattern of patterns) {
      expect(pattern.confidence).toBeGreaterThanOrEqual(0.3);
      expect(pattern.confidence).toBeLessThanOrEqual(1);
    }
    const confidences = patterns.map((p) => p.confidence);
    expect(confidences).toEqual([...confidences].sort((a, b) => b - a));
  });

  it('covers several detectors on a mixed log', () => {
    const kinds = new Set(detectPatterns(mixedLog()).map((p) => p.patternType.kind));

    expect(kinds).toContain('CommandSequence');
    expect(kinds).toContain('ErrorRecovery');
    expect(kinds).toContain('BuildTest');
    expect(kinds).toContain('VersionControl');
    expect(kinds).toContain('FileManipulation');
  });

  it('gives identical results on repeated runs', () => {
    const log = mixedLog();
    expect(detectPatterns(log)).toEqual(detectPatterns(log));
  });

  it('orders the log oldest first whatever order it arrives in', () => {
    const log = makeLog(GIT_LOOP);
    expect(detectPatterns([...log].reverse())).toEqual(detectPatterns(log));
  });

  it('does not modify its input', () => {
    const log = makeLog(GIT_LOOP).reverse();
    const before = log.map((c) => c.id);

    detectPatterns(log);

    expect(log.map((c) => c.id)).toEqual(before);
  });
});

describe('rankPatterns', () => {
  const pattern = (description: string, confidence: number): DetectedPattern => ({
    patternType: { kind: 'FileManipulation' },
    description,
    confidence,
    frequency: 5,
    commands: [],
    metadata: {
      firstSeen: new Date(0),
      lastSeen: new Date(0),
      directories: [],
      successRate: 1,
      avgDurationMs: 0,
    },
  });

  it('merges detector outputs by confidence, descending', () => {
    const ranked = rankPatterns([
      [pattern('a', 0.4), pattern('b', 0.9)],
      [pattern('c', 0.6)],
    ]);

    expect(ranked.map((p) => p.description)).toEqual(['b', 'c', 'a']);
  });

  it('treats NaN confidence as equal instead of failing', () => {
    expect(() => rankPatterns([[pattern('a', Number.NaN), pattern('b', 0.5)]])).not.toThrow();
    expect(compareConfidence(Number.NaN, 0.5)).toBe(0);
  });

  it('keeps detector order for equal confidence', () => {
    const ranked = rankPatterns([[pattern('first', 0.5)], [pattern('second', 0.5)]]);
    expect(ranked.map((p) => p.description)).toEqual(['first', 'second']);
  });
});

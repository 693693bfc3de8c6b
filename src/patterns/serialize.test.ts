import { describe, expect, it } from 'vitest';
import { makeCommand, makeLog } from '../testing/fixtures.js';
import { detectPatterns } from './detector.js';
import { parsePatterns, patternFromJson, patternToJson, serializePatterns } from './serialize.js';

function sampleLog() {
  const log = makeLog([
    'git status',
    'git add .',
    'git commit -m test',
    'git push',
    'git status',
    'git add .',
    'git commit -m test',
    'git push',
    'npm run build',
    'npm install',
    'npm run build',
    'npm install',
  ]);
  return log.map((c) => (c.raw === 'npm run build' ? { ...c, exitCode: 1 } : c));
}

describe('pattern JSON', () => {
  it('round-trips every detected pattern exactly', () => {
    const patterns = detectPatterns(sampleLog());

    const restored = parsePatterns(serializePatterns(patterns));

    expect(restored).toEqual(patterns);
  });

  it('uses snake_case payloads under pattern_type', () => {
    const [recovery] = detectPatterns(sampleLog()).filter(
      (p) => p.patternType.kind === 'ErrorRecovery'
    );

    expect(patternToJson(recovery).pattern_type).toEqual({
      kind: 'ErrorRecovery',
      error_command: 'npm run build',
      fix_command: 'npm install',
    });
  });

  it('writes timestamps as ISO strings', () => {
    const when = new Date(Date.UTC(2026, 2, 2, 9, 30));
    const [routine] = detectPatterns(
      [1, 2, 3].map((day) => makeCommand('make', { timestamp: new Date(when.getTime() + day * 86_400_000) }))
    ).filter((p) => p.patternType.kind === 'TimeBasedRoutine');

    const json = patternToJson(routine);

    expect(json.pattern_type).toEqual({ kind: 'TimeBasedRoutine', hour: 9, variance_minutes: 0 });
    expect(json.metadata.first_seen).toBe('2026-03-03T09:30:00.000Z');
    expect(json.metadata.last_seen).toBe('2026-03-05T09:30:00.000Z');
  });

  it('rejects confidences outside [0, 1]', () => {
    const [pattern] = detectPatterns(sampleLog());
    const json = { ...patternToJson(pattern), confidence: 1.5 };

    expect(() => patternFromJson(json)).toThrow();
  });

  it('rejects unknown pattern kinds', () => {
    const [pattern] = detectPatterns(sampleLog());
    const json = { ...patternToJson(pattern), pattern_type: { kind: 'Telepathy' } };

    expect(() => patternFromJson(json)).toThrow();
  });
});

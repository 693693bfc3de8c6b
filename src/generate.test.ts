import chalk from 'chalk';
import { beforeEach, describe, expect, it } from 'vitest';
import { ShellmindError } from './errors.js';
import {
  buildPrompt,
  formatSuggestions,
  generateAutomations,
  isClaudeAvailable,
  parseSuggestions,
} from './generate.js';

const reply = {
  suggestions: [
    {
      title: 'Commit helper',
      description: 'Stage and commit in one step',
      kind: 'function',
      code: 'gac() {\n  git add -A && git commit -m "$1"\n}',
    },
  ],
};

describe('parseSuggestions', () => {
  it('reads a bare JSON reply', () => {
    expect(parseSuggestions(JSON.stringify(reply))).toEqual(reply.suggestions);
  });

  it('finds JSON inside a code fence', () => {
    const text = `Here you go:\n\`\`\`json\n${JSON.stringify(reply)}\n\`\`\`\nEnjoy.`;
    expect(parseSuggestions(text)).toEqual(reply.suggestions);
  });

  it('rejects replies without JSON', () => {
    expect(() => parseSuggestions('no idea')).toThrow(ShellmindError);
  });

  it('rejects malformed or mis-shaped JSON', () => {
    expect(() => parseSuggestions('{"suggestions": [}')).toThrow(/invalid JSON/);
    expect(() => parseSuggestions('{"suggestions": [{"title": "x"}]}')).toThrow(/unexpected shape/);
  });
});

describe('buildPrompt', () => {
  it('appends the reply format to the context', () => {
    const prompt = buildPrompt('# Shell Workflow Context');
    expect(prompt.startsWith('# Shell Workflow Context\n\n')).toBe(true);
    expect(prompt).toContain('Reply with JSON only');
  });
});

describe('formatSuggestions', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('numbers suggestions and indents code', () => {
    expect(formatSuggestions(parseSuggestions(JSON.stringify(reply))).split('\n')).toEqual([
      '1. Commit helper [function]',
      '   Stage and commit in one step',
      '     gac() {',
      '       git add -A && git commit -m "$1"',
      '     }',
    ]);
  });

  it('says when there is nothing to show', () => {
    expect(formatSuggestions([])).toBe('No automation suggestions.');
  });
});

describe('generateAutomations', () => {
  it('needs an API key', async () => {
    expect(isClaudeAvailable({})).toBe(false);
    await expect(generateAutomations('context', {})).rejects.toThrow(/ANTHROPIC_API_KEY/);
  });
});

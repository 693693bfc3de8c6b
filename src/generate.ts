/**
 * Claude API Integration
 *
 * Suggests shell automations for the detected workflows.
 * Requires ANTHROPIC_API_KEY environment variable.
 */

import Anthropic from '@anthropic-ai/sdk';
import chalk from 'chalk';
import { z } from 'zod';
import { ShellmindError } from './errors.js';
import { logger } from './logging.js';

const SYSTEM_PROMPT = `You are a shell productivity assistant. You read a summary of a developer's recurring
shell workflows and recent commands, and suggest small automations that remove repetition.

Prefer aliases and shell functions over standalone scripts. Only suggest automations that are
clearly supported by the workflows shown. Keep code short and portable between bash and zsh.`;

const SuggestionSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  kind: z.enum(['alias', 'function', 'script']),
  code: z.string(),
});

const ReplySchema = z.object({
  suggestions: z.array(SuggestionSchema),
});

export type AutomationSuggestion = z.infer<typeof SuggestionSchema>;

/**
 * Check if Claude API is available
 */
export function isClaudeAvailable(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!env.ANTHROPIC_API_KEY;
}

export async function generateAutomations(
  context: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AutomationSuggestion[]> {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ShellmindError(
      'ANTHROPIC_API_KEY environment variable is required.\n' +
        'Set it with: export ANTHROPIC_API_KEY=your-key-here'
    );
  }

  const client = new Anthropic({ apiKey });
  logger.debug('Requesting automation suggestions', { contextLength: context.length });

  const response = await client.messages.create({
    model: 'claude-sonnet-4-20250514',
    max_tokens: 2048,
    messages: [
      {
        role: 'user',
        content: buildPrompt(context),
      },
    ],
    system: SYSTEM_PROMPT,
  });

  // Extract text from response
  const textContent = response.content.find((block) => block.type === 'text');
  if (!textContent || textContent.type !== 'text') {
    throw new ShellmindError('Unexpected response format from Claude');
  }

  return parseSuggestions(textContent.text);
}

export function buildPrompt(context: string): string {
  return `${context}

Based on these workflows, suggest up to 5 automations.

Reply with JSON only, in this shape:
{"suggestions": [{"title": "...", "description": "...", "kind": "alias" | "function" | "script", "code": "..."}]}`;
}

/**
 * Parse Claude's reply. The JSON object may be wrapped in prose or a code fence.
 */
export function parseSuggestions(text: string): AutomationSuggestion[] {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new ShellmindError('Claude reply did not contain a JSON object');
  }

  let value: unknown;
  try {
    value = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new ShellmindError('Claude reply contained invalid JSON', { cause: err });
  }

  const result = ReplySchema.safeParse(value);
  if (!result.success) {
    throw new ShellmindError(`Claude reply had an unexpected shape: ${result.error.issues[0]?.message}`);
  }
  return result.data.suggestions;
}

export function formatSuggestions(suggestions: readonly AutomationSuggestion[]): string {
  if (suggestions.length === 0) {
    return 'No automation suggestions.';
  }

  const lines: string[] = [];
  suggestions.forEach((suggestion, i) => {
    lines.push(chalk.bold(`${i + 1}. ${suggestion.title}`) + chalk.gray(` [${suggestion.kind}]`));
    if (suggestion.description) {
      lines.push(`   ${suggestion.description}`);
    }
    for (const line of suggestion.code.split('\n')) {
      lines.push(chalk.cyan(`     ${line}`));
    }
    lines.push('');
  });
  return lines.join('\n').trimEnd();
}

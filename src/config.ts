/**
 * Configuration
 *
 * Reads <home>/config.json through a zod schema. Every field has a default,
 * so a missing file or an empty object yields a complete config.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { MIN_CONFIDENCE } from './patterns/constants.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  database_path: z.string().min(1).optional(),
  log_level: z.enum(LOG_LEVELS).default('info'),
  retention_days: z.number().int().min(1).max(3650).optional(),
  max_history_size: z.number().int().min(100).default(10000),
  pattern_sample_size: z.number().int().min(3).max(100000).default(1000),
  min_confidence: z.number().min(0).max(1).default(MIN_CONFIDENCE),
});

export interface Config {
  homeDir: string;
  databasePath: string;
  logDir: string;
  logLevel: LogLevel;
  retentionDays?: number;
  maxHistorySize: number;
  patternSampleSize: number;
  minConfidence: number;
}

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SHELLMIND_HOME || path.join(os.homedir(), '.shellmind');
}

/**
 * Load the config file under the shellmind home directory.
 *
 * Environment variables win over the file: SHELLMIND_DB for the database
 * path and SHELLMIND_LOG_LEVEL for the log level.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const homeDir = resolveHomeDir(env);
  const configPath = path.join(homeDir, 'config.json');

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    const content = fs.readFileSync(configPath, 'utf-8');
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigError(`Invalid JSON in ${configPath}`, undefined, { cause: err });
    }
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue ? issue.path.join('.') : undefined;
    throw new ConfigError(
      `Invalid config ${configPath}: ${field ? `${field}: ` : ''}${issue?.message ?? 'unknown error'}`,
      field
    );
  }

  const file = result.data;
  const envLevel = env.SHELLMIND_LOG_LEVEL;
  if (envLevel !== undefined && !isLogLevel(envLevel)) {
    throw new ConfigError(
      `Invalid SHELLMIND_LOG_LEVEL "${envLevel}". Use one of: ${LOG_LEVELS.join(', ')}`,
      'log_level'
    );
  }

  return {
    homeDir,
    databasePath: env.SHELLMIND_DB || file.database_path || path.join(homeDir, 'shellmind.db'),
    logDir: path.join(homeDir, 'logs'),
    logLevel: envLevel ?? file.log_level,
    retentionDays: file.retention_days,
    maxHistorySize: file.max_history_size,
    patternSampleSize: file.pattern_sample_size,
    minConfidence: file.min_confidence,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

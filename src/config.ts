/**
 * Environment configuration (.env via dotenv, validated with zod)
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

const EnvSchema = z.object({
  REGISTRY_DB_PATH: z.string().min(1).default('registry.db'),
  EXPORT_DIR: z.string().min(1).default('exports'),
  GRADUATION_TERMS: z.string().default('2024-07,2025-02'),
  LOG_LEVEL: z.string().default('info'),
  REGISTRY_DEBUG: z.enum(['true', 'false']).default('false'),
  LOG_TO_FILE: z.enum(['true', 'false']).default('false'),
  LOG_DIR: z.string().min(1).default('logs'),
});

export interface AppConfig {
  dbPath: string;
  exportDir: string;
  graduationTerms: string[];
  logLevel: LogLevel;
  logToFile: boolean;
  logDir: string;
}

export function parseTermList(raw: string): string[] {
  return raw
    .split(',')
    .map(term => term.trim())
    .filter(term => term.length > 0);
}

/**
 * Build the app config from an environment map
 * @throws ConfigError on an invalid value
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
  }

  const vars = parsed.data;
  const logLevel = vars.REGISTRY_DEBUG === 'true' ? LogLevel.DEBUG : parseLogLevel(vars.LOG_LEVEL);
  if (logLevel === undefined) {
    throw new ConfigError(`Invalid environment variable LOG_LEVEL: "${vars.LOG_LEVEL}"`);
  }

  return {
    dbPath: vars.REGISTRY_DB_PATH,
    exportDir: vars.EXPORT_DIR,
    graduationTerms: parseTermList(vars.GRADUATION_TERMS),
    logLevel,
    logToFile: vars.LOG_TO_FILE === 'true',
    logDir: vars.LOG_DIR,
  };
}

export function loadConfig(): AppConfig {
  loadEnv();
  return parseConfig(process.env);
}

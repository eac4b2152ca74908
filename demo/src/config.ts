import { fileURLToPath } from 'node:url';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { isDecimalKey } from 'rb-tree';
import { formatIssues } from './utils/error-utils.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export type LogLevel = typeof LOG_LEVELS[number];

export interface DemoConfig {
  sample: string;           // Entry of the samples file to build
  searchKeys: string[];     // Decimal keys looked up after building
  samplesFile: string;      // Path of the samples JSON file
  logLevel: LogLevel;
  prettyLogs: boolean;      // pino-pretty transport instead of JSON lines
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_SAMPLES_FILE = fileURLToPath(new URL('../samples.json', import.meta.url));

const searchKeysSchema = z.string().transform((raw, ctx) => {
  const keys = raw.split(',').map(part => part.trim()).filter(part => part.length > 0);
  if (!keys.every(isDecimalKey)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be comma-separated numbers, got "${raw}"` });
    return z.NEVER;
  }
  return keys;
});

// Environment variables and their defaults
const EnvSchema = z.object({
  SAMPLE: z.string().default('sample2'),
  SEARCH_KEYS: searchKeysSchema.default('20'),
  SAMPLES_FILE: z.string().default(DEFAULT_SAMPLES_FILE),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  HIDE_LOGS: z.string().optional(),
  NODE_ENV: z.string().default('production')
});

/**
 * Reads the demo settings from environment variables (after dotenv has loaded .env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const { SAMPLE, SEARCH_KEYS, SAMPLES_FILE, LOG_LEVEL, HIDE_LOGS, NODE_ENV } = parsed.data;
  const hideLogs = Boolean(HIDE_LOGS);
  return {
    sample: SAMPLE,
    searchKeys: SEARCH_KEYS,
    samplesFile: SAMPLES_FILE,
    logLevel: hideLogs ? 'warn' : LOG_LEVEL,
    prettyLogs: NODE_ENV === 'development' && !hideLogs
  };
}

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.meraki.com/api/v1';

const ConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  outputDir: z.string().min(1).default('snapshots'),
  concurrency: z.coerce.number().int().min(1).max(32).default(4),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  baseDelayMs: z.coerce.number().int().min(0).default(1_000),
  maxDelayMs: z.coerce.number().int().min(0).default(60_000),
  imagePollAttempts: z.coerce.number().int().min(1).default(10),
  imagePollIntervalMs: z.coerce.number().int().min(0).default(3_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type ConfigInput = z.input<typeof ConfigSchema>;

export const CONFIG_FILE_NAME = 'config.json';

const ENV_KEYS: Record<string, keyof ConfigInput> = {
  MERAKI_DASHBOARD_API_KEY: 'apiKey',
  MERAKI_BASE_URL: 'baseUrl',
  SNAPSHOT_OUTPUT_DIR: 'outputDir',
  SNAPSHOT_CONCURRENCY: 'concurrency',
  SNAPSHOT_TIMEOUT_MS: 'timeoutMs',
  SNAPSHOT_MAX_RETRIES: 'maxRetries',
};

function loadConfigFromDisk(cwd: string): Record<string, unknown> {
  const file = path.resolve(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(file)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read ${file}: ${errorMessage(error)}`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }
  return { ...parsed };
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

function definedOnly(input: ConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined && value !== ''));
}

/**
 * Resolve the run configuration. Precedence, highest first: explicit
 * overrides (CLI flags), environment, `config.json` in `cwd`, defaults.
 */
export function loadConfig(
  overrides: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const merged = {
    ...loadConfigFromDisk(cwd),
    ...loadConfigFromEnv(env),
    ...definedOnly(overrides),
  };
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedpulseDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  db: z
    .object({
      path: z.string().default('~/.feedpulse/feedpulse.db'),
    })
    .default({}),

  crawl: z
    .object({
      user_agent: z.string().default('feedpulse/1.0 (+contact: admin@localhost)'),
      timeout_ms: z.number().int().positive().default(20000),
      sleep_ms: z.number().min(0).default(500),
      max_retries: z.number().int().min(1).default(3),
      backoff_ms: z.number().min(0).default(5000),
      backoff_factor: z.number().min(1).default(1),
      jitter_ms: z.number().min(0).default(0),
      concurrency: z.number().int().min(1).default(4),
      max_items: z.number().int().min(0).default(0),
    })
    .default({}),

  youtube: z
    .object({
      api_base: z.string().url().default('https://www.googleapis.com/youtube/v3'),
      api_key: z.string().default(''),
      uploads_only: z.boolean().default(true),
      playlists_limit: z.number().int().min(0).default(0),
    })
    .default({}),

  render: z
    .object({
      outdir: z.string().default('~/.feedpulse/assets'),
      rolling_days: z.number().int().min(1).default(90),
      catch_up_missing: z.boolean().default(false),
      extra_stopwords: z.array(z.string()).default([]),
    })
    .default({}),

  schedule: z
    .object({
      cycle_cron: z.string().default('0 */6 * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...(value as Record<string, unknown>) }
    : {};
}

/**
 * Overlay FEEDPULSE_* environment variables onto a raw (unvalidated) config object.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const apiKey = env['FEEDPULSE_YOUTUBE_API_KEY'];
  if (apiKey) {
    result['youtube'] = { ...asRecord(result['youtube']), api_key: apiKey };
  }

  const dbPath = env['FEEDPULSE_DB_PATH'];
  if (dbPath) {
    result['db'] = { ...asRecord(result['db']), path: dbPath };
  }

  return result;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedpulse', {
    searchPlaces: [
      'feedpulse.config.yaml',
      'feedpulse.config.yml',
      '.feedpulserc.yaml',
      '.feedpulserc.yml',
    ],
  });

  const envConfigPath = process.env['FEEDPULSE_CONFIG'];
  const defaultConfigPath = path.join(getFeedpulseDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const searched = await explorer.search();
    if (searched) {
      rawConfig = asRecord(searched.config);
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = asRecord(result?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

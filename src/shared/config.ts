import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const STRATEGY_NAMES = ['oauth', 'feed', 'hybrid', 'json'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const ConfigSchema = z.object({
  forums_file: z.string().default('subreddits.yml'),
  data_dir: z.string().default('data'),

  strategies: z
    .array(z.enum(STRATEGY_NAMES))
    .min(1)
    .default(['oauth', 'feed', 'json'])
    .refine((names) => new Set(names).size === names.length, 'strategies must not repeat'),

  listing_limit: z.number().int().min(1).max(100).default(25),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  mirrors: z.array(z.string().min(1)).min(1).default(['www.reddit.com', 'old.reddit.com']),

  retry: z
    .object({
      max_attempts: z.number().int().min(1).default(3),
      base_delay_ms: z.number().int().min(0).default(2000),
      max_delay_ms: z.number().int().min(0).default(30000),
      attempt_timeout_ms: z.number().int().min(1).default(30000),
    })
    .default({}),

  pacing: z
    .object({
      forum_delay_ms: z.number().int().min(0).default(2000),
    })
    .default({}),

  // Feed post list, then one comments request per post for scores.
  hybrid: z
    .object({
      post_delay_ms: z.number().int().min(0).default(1500),
      attempt_timeout_ms: z.number().int().min(1).default(120000),
    })
    .default({}),

  reddit: z
    .object({
      client_id: z.string().default(''),
      client_secret: z.string().default(''),
      user_agent: z.string().default('linux:subarchive:v0.1.0'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  // Credentials come from the environment, never from the committed file.
  const { reddit: _reddit, ...rest } = defaults;
  return yamlStringify(rest);
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export interface LoadConfigOptions {
  configPath?: string;
  force?: boolean;
  cwd?: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig && !options.force) return cachedConfig;

  const explorer = cosmiconfig('subarchive', {
    searchPlaces: [
      'subarchive.config.yaml',
      'subarchive.config.yml',
      '.subarchiverc.yaml',
      '.subarchiverc.yml',
    ],
  });

  const explicitPath = options.configPath ?? process.env['SUBARCHIVE_CONFIG'];
  let rawConfig: Record<string, unknown> = {};

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`, { path: resolved });
    }
    const result = await explorer.load(resolved);
    rawConfig = toRecord(result?.config);
  } else {
    const result = await explorer.search(options.cwd ?? process.cwd());
    if (result) {
      logger.debug({ path: result.filepath }, 'Config file loaded');
      rawConfig = toRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  applyEnvOverrides(rawConfig);

  const parsed = ConfigSchema.safeParse(rawConfig);
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

function toRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  const clientId = process.env['REDDIT_CLIENT_ID'];
  const clientSecret = process.env['REDDIT_CLIENT_SECRET'];
  const userAgent = process.env['REDDIT_USER_AGENT'];

  if (clientId || clientSecret || userAgent) {
    const reddit = toRecord(rawConfig['reddit']);
    if (clientId) reddit['client_id'] = clientId;
    if (clientSecret) reddit['client_secret'] = clientSecret;
    if (userAgent) reddit['user_agent'] = userAgent;
    rawConfig['reddit'] = reddit;
  }
}

export function hasRedditCredentials(config: Config): boolean {
  return config.reddit.client_id.length > 0 && config.reddit.client_secret.length > 0;
}

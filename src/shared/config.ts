import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getPresslineDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(8006),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.pressline/pressline.db'),
    })
    .default({}),

  rules: z
    .object({
      path: z.string().default('~/.pressline/rules.yaml'),
    })
    .default({}),

  archive: z
    .object({
      dir: z.string().default('~/.pressline/archive'),
      // When set, local documents are addressed as <base>/local-archive/<path>.
      public_base_url: z.string().default(''),
    })
    .default({}),

  // Empty URL = use the in-process implementation.
  workers: z
    .object({
      feed_url: z.string().default(''),
      generation_url: z.string().default(''),
      image_url: z.string().default(''),
      archive_url: z.string().default(''),
    })
    .default({}),

  http: z
    .object({
      timeout_ms: z.number().int().positive().default(40000),
      retries: z.number().int().min(0).default(2),
      min_timeout_ms: z.number().int().min(0).default(500),
      max_timeout_ms: z.number().int().min(0).default(4000),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(2500),
      temperature: z.number().default(0.5),
      timeout_ms: z.number().default(60000),
    })
    .default({}),

  scheduler: z
    .object({
      rules_watch_cron: z.string().default('* * * * *'),
      maintenance_cron: z.string().default('30 3 * * *'),
    })
    .default({}),

  logs: z
    .object({
      persist: z.boolean().default(true),
      max_query_limit: z.number().int().positive().default(1000),
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
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Apply PRESSLINE_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const merged = { ...rawConfig };

  const envApiKey = env['PRESSLINE_LLM_API_KEY'];
  const envBaseUrl = env['PRESSLINE_LLM_BASE_URL'];
  const envModel = env['PRESSLINE_LLM_MODEL'];
  if (envApiKey || envBaseUrl || envModel) {
    const llm = asRecord(merged['llm']);
    if (envApiKey) llm['api_key'] = envApiKey;
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    merged['llm'] = llm;
  }

  const envRules = env['PRESSLINE_RULES_PATH'];
  if (envRules) {
    merged['rules'] = { ...asRecord(merged['rules']), path: envRules };
  }

  return merged;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('pressline', {
    searchPlaces: [
      'pressline.config.yaml',
      'pressline.config.yml',
      '.presslinerc.yaml',
      '.presslinerc.yml',
    ],
  });

  const envConfigPath = process.env['PRESSLINE_CONFIG'];
  const defaultConfigPath = path.join(getPresslineDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const found = await explorer.search();
    if (found) {
      rawConfig = asRecord(found.config);
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = asRecord(result?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/** Config with secrets masked, for API and CLI output. */
export function maskConfig(config: Config): Config {
  return {
    ...config,
    llm: { ...config.llm, api_key: config.llm.api_key ? '***' : '' },
  };
}

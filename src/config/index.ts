import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors.js';

export const ModelConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai', 'anthropic']).default('openai'),
  name: z.string().default('gpt-4o'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(1000),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['simple', 'ollama', 'openai']).default('openai'),
  model: z.string().optional(),   // Provider default when unset
});

export const MemoryConfigSchema = z.object({
  autoExtract: z.boolean().default(true),
  autoCurate: z.boolean().default(true),
  importanceThreshold: z.number().int().min(0).max(10).default(5),
  relevantLimit: z.number().int().positive().default(5),
  maxContextChars: z.number().int().positive().default(4000),
});

export const ServicesConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(500),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  model: ModelConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  services: ServicesConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type ServicesConfig = z.infer<typeof ServicesConfigSchema>;

export const MEMORIA_DIR = '.memoria';
export const CONFIG_FILE = 'config.json';
export const MEMORY_DB = 'memories.db';

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const memoriaPath = path.join(currentDir, MEMORIA_DIR);
    if (fs.existsSync(memoriaPath) && fs.statSync(memoriaPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getMemoriaPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new ConfigError('No memoria directory found. Run `mem init` first.');
  }
  return path.join(root, MEMORIA_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getMemoriaPath(projectRoot), CONFIG_FILE);
}

export function getMemoryDbPath(projectRoot?: string): string {
  return path.join(getMemoriaPath(projectRoot), MEMORY_DB);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return ConfigSchema.parse({});
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): void {
  const memoriaPath = path.join(targetDir, MEMORIA_DIR);

  if (fs.existsSync(memoriaPath) && !force) {
    throw new ConfigError('Memoria already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(memoriaPath, { recursive: true, mode: 0o700 });

  const defaultConfig = ConfigSchema.parse({});
  fs.writeFileSync(
    path.join(memoriaPath, CONFIG_FILE),
    JSON.stringify(defaultConfig, null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(memoriaPath, '.gitignore'), `# Memoria local files
memories.db
memories.db-journal
memories.db-wal
memories.db-shm
`);
}

// Keys that may be absent from a parsed config but can still be set
const OPTIONAL_KEYS = new Set(['embeddings.model']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setConfigValue(key: string, value: string, projectRoot?: string): Config {
  const config: Record<string, unknown> = structuredClone(loadConfig(projectRoot));
  const keys = key.split('.');

  let current = config;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (!isRecord(next)) {
      throw new ConfigError(`Invalid config key: ${key}`);
    }
    current = next;
  }

  const lastKey = keys[keys.length - 1];
  if (!(lastKey in current) && !OPTIONAL_KEYS.has(key)) {
    throw new ConfigError(`Invalid config key: ${key}`);
  }

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    current[lastKey] = parseFloat(value);
  } else if (typeof existingValue === 'boolean') {
    if (value !== 'true' && value !== 'false') {
      throw new ConfigError(`Invalid value for ${key}: expected true or false`);
    }
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid value for ${key}: ${issue?.message ?? 'validation failed'}`);
  }

  saveConfig(result.data, projectRoot);
  return result.data;
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}

export interface Credentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  ollamaHost: string;
}

export type CredentialEnv = Record<string, string | undefined>;

/**
 * Pull the keys the configured providers need out of an explicit environment
 * record. Missing keys are a startup failure, not something to discover mid-turn.
 */
export function resolveCredentials(config: Config, env: CredentialEnv): Credentials {
  const credentials: Credentials = {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    ollamaHost: env.OLLAMA_HOST || 'http://127.0.0.1:11434',
  };

  const needsOpenAI = config.model.provider === 'openai' || config.embeddings.provider === 'openai';
  if (needsOpenAI && !credentials.openaiApiKey) {
    throw new ConfigError('OPENAI_API_KEY environment variable required for OpenAI models');
  }

  if (config.model.provider === 'anthropic' && !credentials.anthropicApiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY environment variable required for Anthropic models');
  }

  return credentials;
}

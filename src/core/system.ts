import { createAdapterFromString, parseModelString } from '../adapters/index.js';
import type { ModelAdapter } from '../adapters/types.js';
import { ModelConfigSchema, resolveCredentials } from '../config/index.js';
import type { Config, CredentialEnv } from '../config/index.js';
import { ConfigError } from '../errors.js';
import { LlmCompletionService } from '../memory/completion.js';
import { createEmbedder } from '../memory/embeddings.js';
import type { Embedder } from '../memory/embeddings.js';
import { MemoryStore } from '../memory/store.js';
import type { RequestPolicy } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { MemoryOrchestrator } from './orchestrator.js';

export interface MemorySystemOptions {
  dbPath: string;
  env: CredentialEnv;
  logger?: Logger;
  model?: string;           // "provider:model", overrides config.model
}

export interface MemorySystem {
  orchestrator: MemoryOrchestrator;
  store: MemoryStore;
  adapter: ModelAdapter;
  embedder: Embedder;
  close(): void;
}

export function withModelOverride(config: Config, modelString: string): Config {
  const { provider, model } = parseModelString(modelString);
  const parsed = ModelConfigSchema.shape.provider.safeParse(provider);
  if (!parsed.success) {
    throw new ConfigError(`Unknown provider: ${provider}. Use ollama:, openai:, or anthropic:`);
  }
  return { ...config, model: { ...config.model, provider: parsed.data, name: model } };
}

export function requestPolicyFromConfig(config: Config): RequestPolicy {
  return {
    timeoutMs: config.services.timeoutMs,
    maxRetries: config.services.maxRetries,
    retryDelayMs: config.services.retryDelayMs,
  };
}

/**
 * Wire store, embedder, completion service and orchestrator from an
 * explicit config and credential environment.
 */
export async function createMemorySystem(
  baseConfig: Config,
  options: MemorySystemOptions
): Promise<MemorySystem> {
  const config = options.model ? withModelOverride(baseConfig, options.model) : baseConfig;
  const credentials = resolveCredentials(config, options.env);
  const policy = requestPolicyFromConfig(config);
  const logger = options.logger ?? createLogger({ level: config.logging.level, scope: 'memoria' });

  const adapter = createAdapterFromString(
    `${config.model.provider}:${config.model.name}`,
    {
      OPENAI_API_KEY: credentials.openaiApiKey,
      ANTHROPIC_API_KEY: credentials.anthropicApiKey,
      OLLAMA_HOST: credentials.ollamaHost,
    },
    policy
  );

  const embedder = await createEmbedder({
    provider: config.embeddings.provider,
    model: config.embeddings.model,
    ollamaUrl: credentials.ollamaHost,
    openaiApiKey: credentials.openaiApiKey,
    policy,
  });

  const store = new MemoryStore(options.dbPath);
  const orchestrator = new MemoryOrchestrator({
    store,
    embedder,
    completion: new LlmCompletionService(adapter, { logger }),
    logger,
    options: {
      importanceThreshold: config.memory.importanceThreshold,
      relevantLimit: config.memory.relevantLimit,
      maxContextChars: config.memory.maxContextChars,
    },
  });

  logger.debug(`Memory system ready: model=${adapter.name} embedder=${embedder.name}`);

  return {
    orchestrator,
    store,
    adapter,
    embedder,
    close: () => store.close(),
  };
}

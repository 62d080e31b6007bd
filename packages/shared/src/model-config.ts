/**
 * Model configuration loader.
 *
 * Builds a ModelRouterConfig from:
 *   1. A JSON file at MODEL_ROUTER_CONFIG_PATH (optional)
 *   2. Environment variable overrides: DEFAULT_MODEL, ANTHROPIC_API_KEY, OLLAMA_BASE_URL
 *   3. Defaults: a local Ollama model, plus Claude when an Anthropic key is present
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  ProviderConfig,
} from './model-types.js';

const log = logger.child({ module: 'model-config' });

const DEFAULT_OLLAMA_MODEL = 'llama3.2';

// ---------------------------------------------------------------------------
// Default configuration
// ---------------------------------------------------------------------------

function defaultProviders(env: NodeJS.ProcessEnv): Record<string, ProviderConfig> {
  const providers: Record<string, ProviderConfig> = {
    ollama: {
      provider: 'ollama',
      baseURL: env.OLLAMA_BASE_URL || undefined,
    },
  };

  const apiKey = env.ANTHROPIC_API_KEY;
  if (apiKey) {
    providers['anthropic'] = { provider: 'anthropic', apiKey };
  }

  return providers;
}

function defaultModels(env: NodeJS.ProcessEnv): ModelDefinition[] {
  const models: ModelDefinition[] = [
    {
      id: DEFAULT_OLLAMA_MODEL,
      modelName: DEFAULT_OLLAMA_MODEL,
      provider: 'ollama',
      maxTokens: 1024,
    },
  ];
  if (env.ANTHROPIC_API_KEY) {
    models.push({
      id: 'sonnet-4',
      modelName: 'claude-sonnet-4-20250514',
      provider: 'anthropic',
      maxTokens: 1024,
    });
  }
  return models;
}

export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): ModelRouterConfig {
  return {
    providers: defaultProviders(env),
    models: defaultModels(env),
    roles: { agent: env.ANTHROPIC_API_KEY ? 'sonnet-4' : DEFAULT_OLLAMA_MODEL },
  };
}

// ---------------------------------------------------------------------------
// Runtime config shape validation
// ---------------------------------------------------------------------------

const providerSchema = z.discriminatedUnion('provider', [
  z.object({ provider: z.literal('anthropic'), apiKey: z.string().optional() }),
  z.object({ provider: z.literal('ollama'), baseURL: z.string().optional() }),
  z.object({
    provider: z.literal('openai-compatible'),
    apiKey: z.string().optional(),
    baseURL: z.string(),
  }),
]);

const modelSchema = z.object({
  id: z.string().min(1),
  modelName: z.string().min(1),
  provider: z.enum(['anthropic', 'ollama', 'openai-compatible']),
  maxTokens: z.number().int().positive().default(1024),
});

const configFileSchema = z.object({
  providers: z.record(providerSchema),
  models: z.array(modelSchema),
  roles: z.object({ agent: z.string().min(1) }),
  fallbackChain: z.array(z.string()).optional(),
});

// ---------------------------------------------------------------------------
// File-based config loading
// ---------------------------------------------------------------------------

async function loadConfigFromFile(path: string): Promise<ModelRouterConfig> {
  const raw = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`model-config: config file at '${path}' is not valid JSON`, { cause: err });
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`model-config: invalid config file at '${path}': ${issues.join('; ')}`);
  }

  return result.data;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

function applyEnvOverrides(config: ModelRouterConfig, env: NodeJS.ProcessEnv): ModelRouterConfig {
  // DEFAULT_MODEL overrides the agent role — can be a model ID or raw model name
  const defaultModel = env.DEFAULT_MODEL;
  if (defaultModel) {
    const existing = config.models.find(
      (m) => m.id === defaultModel || m.modelName === defaultModel,
    );
    if (existing) {
      config.roles.agent = existing.id;
    } else {
      // Treat as a raw model name and add an ad-hoc model definition
      const adHocId = 'custom-agent';
      config.models.push({
        id: adHocId,
        modelName: defaultModel,
        provider: guessProvider(defaultModel, config),
        maxTokens: 1024,
      });
      config.roles.agent = adHocId;
    }
    log.info({ defaultModel, agentRole: config.roles.agent }, 'DEFAULT_MODEL override applied');
  }

  return config;
}

/** Best-effort guess of provider based on model name, validated against config */
function guessProvider(modelName: string, config: ModelRouterConfig): ModelProvider {
  const guessed: ModelProvider = modelName.startsWith('claude') ? 'anthropic' : 'ollama';

  if (!config.providers[guessed]) {
    throw new Error(
      `Model '${modelName}' appears to be a ${guessed} model but no ${guessed} provider is configured`,
    );
  }

  return guessed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: ModelRouterConfig): void {
  if (Object.keys(config.providers).length === 0) {
    throw new Error('model-config: no providers configured.');
  }

  const agentModel = config.models.find((m) => m.id === config.roles.agent);
  if (!agentModel) {
    throw new Error(
      `model-config: role 'agent' references unknown model id '${config.roles.agent}'. ` +
        `Available models: ${config.models.map((m) => m.id).join(', ')}`,
    );
  }

  for (const model of config.models) {
    if (!config.providers[model.provider]) {
      throw new Error(
        `model-config: model '${model.id}' uses provider '${model.provider}' but no config exists for that provider.`,
      );
    }
  }

  if (config.fallbackChain) {
    for (const modelId of config.fallbackChain) {
      if (!config.models.find((m) => m.id === modelId)) {
        throw new Error(`model-config: fallback chain references unknown model id '${modelId}'.`);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and return a fully resolved ModelRouterConfig.
 *
 * Resolution order:
 *   1. If MODEL_ROUTER_CONFIG_PATH is set, load from that JSON file
 *   2. Otherwise use built-in defaults
 *   3. Apply DEFAULT_MODEL
 *   4. Validate the final config
 */
export async function loadModelConfig(env: NodeJS.ProcessEnv = process.env): Promise<ModelRouterConfig> {
  let config: ModelRouterConfig;

  const configPath = env.MODEL_ROUTER_CONFIG_PATH;
  if (configPath) {
    log.info({ configPath }, 'loading model router config from file');
    config = await loadConfigFromFile(configPath);
  } else {
    log.info('using default model router config');
    config = createDefaultConfig(env);
  }

  config = applyEnvOverrides(config, env);
  validateConfig(config);

  log.info(
    {
      providers: Object.keys(config.providers),
      models: config.models.map((m) => m.id),
      roles: config.roles,
    },
    'model router config loaded',
  );

  return config;
}

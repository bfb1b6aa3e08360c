/**
 * Model configuration loader.
 *
 * Builds a ModelRouterConfig from:
 *   1. A JSON file at MODEL_CONFIG_PATH (optional)
 *   2. Environment overrides: MODEL, TASK_MODEL, ENDPOINT, API_KEY, ANTHROPIC_API_KEY
 *   3. Defaults pointing at a local OpenAI-compatible server
 */

import { readFile } from 'node:fs/promises';
import { logger } from './logger.js';
import type { ModelRouterConfig, ModelDefinition, ModelProvider, ProviderConfig } from './model-types.js';

const log = logger.child({ module: 'model-config' });

const DEFAULT_ENDPOINT = 'http://localhost:8080/v1';
const DEFAULT_MODEL_NAME = 'qwen3-next-80b-a3b-instruct';
const PROVIDERS: readonly ModelProvider[] = ['anthropic', 'openai-compatible', 'ollama'];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

function defaultProviders(): ModelRouterConfig['providers'] {
  const providers: ModelRouterConfig['providers'] = {
    'openai-compatible': {
      provider: 'openai-compatible',
      baseURL: process.env.ENDPOINT ?? DEFAULT_ENDPOINT,
      apiKey: process.env.API_KEY || undefined,
    },
  };

  const anthropicKey = process.env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    providers.anthropic = { provider: 'anthropic', apiKey: anthropicKey };
  }

  return providers;
}

/** Anthropic only becomes the default when it is the sole thing configured */
function defaultProvider(): ModelProvider {
  return process.env.ANTHROPIC_API_KEY && !process.env.ENDPOINT ? 'anthropic' : 'openai-compatible';
}

function defaultModels(): ModelDefinition[] {
  const provider = defaultProvider();
  return [
    {
      id: 'default',
      modelName: provider === 'anthropic' ? 'claude-sonnet-4-20250514' : DEFAULT_MODEL_NAME,
      provider,
      maxTokens: 4096,
    },
  ];
}

export function createDefaultConfig(): ModelRouterConfig {
  return {
    providers: defaultProviders(),
    models: defaultModels(),
    roles: { agent: 'default' },
  };
}

// ---------------------------------------------------------------------------
// File-based config
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProvider(value: unknown): value is ModelProvider {
  return PROVIDERS.some((p) => p === value);
}

function isProviderConfig(value: unknown): value is ProviderConfig {
  return isRecord(value) && isProvider(value.provider);
}

function isModelDefinition(value: unknown): value is ModelDefinition {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.modelName === 'string' &&
    typeof value.maxTokens === 'number' &&
    isProvider(value.provider)
  );
}

function validateConfigShape(parsed: unknown): parsed is ModelRouterConfig {
  if (!isRecord(parsed)) return false;
  if (!isRecord(parsed.providers)) return false;
  if (!Object.values(parsed.providers).every(isProviderConfig)) return false;
  if (!Array.isArray(parsed.models) || !parsed.models.every(isModelDefinition)) return false;
  return isRecord(parsed.roles) && typeof parsed.roles.agent === 'string';
}

async function loadConfigFromFile(path: string): Promise<ModelRouterConfig> {
  const raw = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(raw);

  if (!validateConfigShape(parsed)) {
    throw new Error(
      `model-config: invalid config file at '${path}'. ` +
        'Expected "providers" (object of provider configs), "models" (array of {id, modelName, provider, maxTokens}) and "roles" (object with "agent").',
    );
  }

  return parsed;
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

/** Point a role at an existing model (by id or name) or add an ad-hoc definition */
function overrideRole(config: ModelRouterConfig, role: 'agent' | 'task', value: string): void {
  const existing = config.models.find((m) => m.id === value || m.modelName === value);
  if (existing) {
    config.roles[role] = existing.id;
    return;
  }
  const id = `custom-${role}`;
  config.models.push({
    id,
    modelName: value,
    provider: guessProvider(value, config),
    maxTokens: 4096,
  });
  config.roles[role] = id;
}

function applyEnvOverrides(config: ModelRouterConfig): ModelRouterConfig {
  const model = process.env.MODEL;
  if (model) {
    overrideRole(config, 'agent', model);
    log.info({ model, agentRole: config.roles.agent }, 'MODEL override applied');
  }

  const taskModel = process.env.TASK_MODEL;
  if (taskModel) {
    overrideRole(config, 'task', taskModel);
    log.info({ taskModel, taskRole: config.roles.task }, 'TASK_MODEL override applied');
  }

  const anthropicKey = process.env.ANTHROPIC_API_KEY;
  if (anthropicKey && !config.providers.anthropic) {
    config.providers.anthropic = { provider: 'anthropic', apiKey: anthropicKey };
  }

  return config;
}

function guessProvider(modelName: string, config: ModelRouterConfig): ModelProvider {
  const guessed: ModelProvider = modelName.startsWith('claude')
    ? 'anthropic'
    : config.providers['openai-compatible']
      ? 'openai-compatible'
      : config.providers.ollama
        ? 'ollama'
        : 'openai-compatible';

  if (!config.providers[guessed]) {
    throw new Error(`Model '${modelName}' appears to be a ${guessed} model but no ${guessed} provider is configured`);
  }
  return guessed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: ModelRouterConfig): void {
  if (Object.keys(config.providers).length === 0) {
    throw new Error('model-config: no providers configured. Set ENDPOINT or ANTHROPIC_API_KEY.');
  }

  for (const [role, modelId] of Object.entries(config.roles)) {
    if (!modelId) continue;
    const model = config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(
        `model-config: role '${role}' references unknown model id '${modelId}'. ` +
          `Available models: ${config.models.map((m) => m.id).join(', ')}`,
      );
    }
    if (!config.providers[model.provider]) {
      throw new Error(
        `model-config: model '${model.id}' uses provider '${model.provider}' but no config exists for that provider.`,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load a fully resolved ModelRouterConfig.
 *
 * Resolution order:
 *   1. MODEL_CONFIG_PATH JSON file, if set; built-in defaults otherwise
 *   2. Environment overrides
 *   3. Validation
 */
export async function loadModelConfig(): Promise<ModelRouterConfig> {
  let config: ModelRouterConfig;

  const configPath = process.env.MODEL_CONFIG_PATH;
  if (configPath) {
    log.info({ configPath }, 'loading model config from file');
    config = await loadConfigFromFile(configPath);
  } else {
    log.info('using default model config');
    config = createDefaultConfig();
  }

  config = applyEnvOverrides(config);
  validateConfig(config);

  log.info(
    {
      providers: Object.keys(config.providers),
      models: config.models.map((m) => m.id),
      roles: config.roles,
    },
    'model config loaded',
  );

  return config;
}

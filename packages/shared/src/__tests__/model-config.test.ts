import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock node:fs/promises
// ---------------------------------------------------------------------------

const { mockReadFile } = vi.hoisted(() => ({
  mockReadFile: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  readFile: mockReadFile,
}));

vi.mock('../logger.js', () => {
  const stub = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { logger: { ...stub, child: () => stub } };
});

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { createDefaultConfig, loadModelConfig } from '../model-config.js';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('model-config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createDefaultConfig()', () => {
    it('falls back to a local ollama model without an Anthropic key', () => {
      const config = createDefaultConfig({});
      expect(config.providers).toEqual({ ollama: { provider: 'ollama', baseURL: undefined } });
      expect(config.models.map((m) => m.id)).toEqual(['llama3.2']);
      expect(config.roles.agent).toBe('llama3.2');
    });

    it('prefers Claude when ANTHROPIC_API_KEY is set', () => {
      const config = createDefaultConfig({ ANTHROPIC_API_KEY: 'test-secret' });
      expect(config.providers['anthropic']).toEqual({ provider: 'anthropic', apiKey: 'test-secret' });
      expect(config.roles.agent).toBe('sonnet-4');
      expect(config.models.map((m) => m.id)).toEqual(['llama3.2', 'sonnet-4']);
    });

    it('passes OLLAMA_BASE_URL through to the ollama provider', () => {
      const config = createDefaultConfig({ OLLAMA_BASE_URL: 'http://ollama.test:11434/v1' });
      expect(config.providers['ollama']).toEqual({
        provider: 'ollama',
        baseURL: 'http://ollama.test:11434/v1',
      });
    });
  });

  describe('loadModelConfig()', () => {
    it('loads from file when MODEL_ROUTER_CONFIG_PATH set', async () => {
      const fileConfig = {
        providers: { anthropic: { provider: 'anthropic', apiKey: 'file-key' } },
        models: [{ id: 'test-model', modelName: 'test-model-name', provider: 'anthropic', maxTokens: 512 }],
        roles: { agent: 'test-model' },
      };
      mockReadFile.mockResolvedValue(JSON.stringify(fileConfig));

      const config = await loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/some/config.json' });
      expect(mockReadFile).toHaveBeenCalledWith('/some/config.json', 'utf-8');
      expect(config.models[0]).toEqual({
        id: 'test-model',
        modelName: 'test-model-name',
        provider: 'anthropic',
        maxTokens: 512,
      });
    });

    it('fills in maxTokens when the file omits it', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { ollama: { provider: 'ollama' } },
        models: [{ id: 'm', modelName: 'mistral', provider: 'ollama' }],
        roles: { agent: 'm' },
      }));
      const config = await loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/c.json' });
      expect(config.models[0].maxTokens).toBe(1024);
    });

    it('uses defaults when no file path', async () => {
      const config = await loadModelConfig({});
      expect(mockReadFile).not.toHaveBeenCalled();
      expect(config.roles.agent).toBe('llama3.2');
    });

    it('applies DEFAULT_MODEL override for a known model ID', async () => {
      const config = await loadModelConfig({ ANTHROPIC_API_KEY: 'test-secret', DEFAULT_MODEL: 'llama3.2' });
      expect(config.roles.agent).toBe('llama3.2');
    });

    it('applies DEFAULT_MODEL override with unknown model as ad-hoc', async () => {
      const config = await loadModelConfig({ DEFAULT_MODEL: 'mistral' });
      expect(config.roles.agent).toBe('custom-agent');
      expect(config.models.find((m) => m.id === 'custom-agent')).toEqual({
        id: 'custom-agent',
        modelName: 'mistral',
        provider: 'ollama',
        maxTokens: 1024,
      });
    });

    it('rejects an ad-hoc claude model when no anthropic provider exists', async () => {
      await expect(loadModelConfig({ DEFAULT_MODEL: 'claude-opus-4' })).rejects.toThrow(
        "Model 'claude-opus-4' appears to be a anthropic model but no anthropic provider is configured",
      );
    });
  });

  describe('config file shape', () => {
    it('rejects invalid JSON', async () => {
      mockReadFile.mockResolvedValue('{not json');
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad.json' })).rejects.toThrow(
        "config file at '/bad.json' is not valid JSON",
      );
    });

    it('rejects non-object', async () => {
      mockReadFile.mockResolvedValue('"not an object"');
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad.json' })).rejects.toThrow('invalid config file');
    });

    it('rejects missing models array', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { anthropic: { provider: 'anthropic' } },
        roles: { agent: 'x' },
      }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad.json' })).rejects.toThrow('models: Required');
    });

    it('rejects model without provider field', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { anthropic: { provider: 'anthropic' } },
        models: [{ id: 'test', modelName: 'test-name' }],
        roles: { agent: 'test' },
      }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad.json' })).rejects.toThrow('models.0.provider');
    });
  });

  describe('validateConfig()', () => {
    it('throws when the agent role references an unknown model', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { anthropic: { provider: 'anthropic', apiKey: 'key' } },
        models: [{ id: 'model-a', modelName: 'model-a-name', provider: 'anthropic', maxTokens: 1024 }],
        roles: { agent: 'nonexistent-model' },
      }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad-role.json' })).rejects.toThrow(
        "role 'agent' references unknown model id 'nonexistent-model'",
      );
    });

    it('throws when model references unconfigured provider', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { anthropic: { provider: 'anthropic', apiKey: 'key' } },
        models: [
          { id: 'model-a', modelName: 'model-a-name', provider: 'anthropic', maxTokens: 1024 },
          { id: 'model-b', modelName: 'model-b-name', provider: 'ollama', maxTokens: 1024 },
        ],
        roles: { agent: 'model-a' },
      }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad-provider.json' })).rejects.toThrow(
        "model 'model-b' uses provider 'ollama' but no config exists",
      );
    });

    it('validates fallback chain references', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({
        providers: { anthropic: { provider: 'anthropic', apiKey: 'key' } },
        models: [{ id: 'model-a', modelName: 'model-a-name', provider: 'anthropic', maxTokens: 1024 }],
        roles: { agent: 'model-a' },
        fallbackChain: ['model-a', 'nonexistent'],
      }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/bad-fallback.json' })).rejects.toThrow(
        "fallback chain references unknown model id 'nonexistent'",
      );
    });
  });
});

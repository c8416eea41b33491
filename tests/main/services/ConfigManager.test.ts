/**
 * @file ConfigManager.test.ts - Unit tests for configuration manager
 * @description Tests raw read/write, subscriptions, reset, and engine config resolution
 *   (defaults, stored values, environment overrides, validation). conf is mocked.
 * @depends ConfigManager, conf
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// ====== Mock Setup ======
// vi.hoisted ensures mocks are available when vi.mock is hoisted
const { mockStore, values, MockConf } = vi.hoisted(() => {
  const values: Record<string, unknown> = {};
  const store = {
    get: vi.fn((key: string) => values[key]),
    set: vi.fn((key: string | Record<string, unknown>, value?: unknown) => {
      if (typeof key === 'object') {
        Object.assign(values, key);
      } else {
        values[key] = value;
      }
    }),
    delete: vi.fn((key: string) => {
      delete values[key];
    }),
    has: vi.fn((key: string) => key in values),
    clear: vi.fn(() => {
      for (const key of Object.keys(values)) {
        delete values[key];
      }
    }),
    path: '/mock/config/config.json',
  };

  const MockConf = vi.fn(function MockConf() {
    return store;
  });

  return { mockStore: store, values, MockConf };
});

vi.mock('conf', () => ({
  default: MockConf,
}));

// ====== Import after mocks ======

import { ConfigKeys } from '../../../shared/types/config-keys';

type ConfigModule = typeof import('../../../src/main/services/ConfigManager');

describe('ConfigManager', () => {
  let configManager: ReturnType<ConfigModule['getConfigManager']>;

  beforeEach(async () => {
    vi.clearAllMocks();
    mockStore.clear();

    vi.resetModules();
    const module = await import('../../../src/main/services/ConfigManager');
    configManager = module.getConfigManager();
    // Constructor seeds defaults through conf; start each test from an empty store
    mockStore.clear();
    vi.clearAllMocks();
  });

  afterEach(() => {
    delete process.env.DOCENT_LLM_MODEL;
    delete process.env.DOCENT_DB_PATH;
  });

  // ====== Construction ======

  it('should open a flat-keyed conf store for the project', async () => {
    vi.resetModules();
    const module = await import('../../../src/main/services/ConfigManager');
    module.getConfigManager();

    expect(MockConf).toHaveBeenCalledWith(
      expect.objectContaining({
        projectName: 'docent-rag',
        accessPropertiesByDotNotation: false,
      })
    );
    expect(module.getConfigManager().getConfigPath()).toBe('/mock/config/config.json');
  });

  // ====== Basic Read/Write ======

  describe('Basic Read/Write', () => {
    it('should get config value', () => {
      values[ConfigKeys.LLMModel] = 'qwen2.5:7b';

      expect(configManager.get(ConfigKeys.LLMModel)).toBe('qwen2.5:7b');
    });

    it('should return undefined for a missing key', () => {
      expect(configManager.get('non-existent-key')).toBeUndefined();
    });

    it('should set config value', () => {
      configManager.set(ConfigKeys.ChunkSize, 400);

      expect(mockStore.set).toHaveBeenCalledWith(ConfigKeys.ChunkSize, 400);
      expect(values[ConfigKeys.ChunkSize]).toBe(400);
    });

    it('should check if key exists', () => {
      values[ConfigKeys.LLMProvider] = 'openai';

      expect(configManager.has(ConfigKeys.LLMProvider)).toBe(true);
      expect(configManager.has('non-existent')).toBe(false);
    });

    it('should delete config value', () => {
      values[ConfigKeys.LLMModel] = 'qwen2.5:7b';
      configManager.delete(ConfigKeys.LLMModel);

      expect(mockStore.delete).toHaveBeenCalledWith(ConfigKeys.LLMModel);
      expect(configManager.has(ConfigKeys.LLMModel)).toBe(false);
    });
  });

  // ====== Subscription Pattern ======

  describe('Subscription Pattern', () => {
    it('should pass new and old value to subscribers', () => {
      values[ConfigKeys.RetrievalTopK] = 5;
      const callback = vi.fn();
      configManager.subscribe(ConfigKeys.RetrievalTopK, callback);

      configManager.setAndNotify(ConfigKeys.RetrievalTopK, 8);

      expect(callback).toHaveBeenCalledWith(8, 5);
    });

    it('should stop notifying after unsubscribe', () => {
      const callback = vi.fn();
      const unsubscribe = configManager.subscribe(ConfigKeys.RetrievalTopK, callback);

      unsubscribe();
      configManager.setAndNotify(ConfigKeys.RetrievalTopK, 8);

      expect(callback).not.toHaveBeenCalled();
    });

    it('should keep notifying other subscribers when one throws', () => {
      const failing = vi.fn(() => {
        throw new Error('subscriber failed');
      });
      const healthy = vi.fn();
      configManager.subscribe(ConfigKeys.LLMModel, failing);
      configManager.subscribe(ConfigKeys.LLMModel, healthy);

      configManager.setAndNotify(ConfigKeys.LLMModel, 'llama3.1:70b');

      expect(healthy).toHaveBeenCalledWith('llama3.1:70b', undefined);
    });
  });

  // ====== Reset ======

  describe('Reset', () => {
    it('should restore a known key to its default', () => {
      values[ConfigKeys.ChunkSize] = 999;

      configManager.reset(ConfigKeys.ChunkSize);

      expect(values[ConfigKeys.ChunkSize]).toBe(300);
    });

    it('should delete an unknown key', () => {
      values['custom.flag'] = true;

      configManager.reset('custom.flag');

      expect(values['custom.flag']).toBeUndefined();
    });

    it('should restore every default on full reset', () => {
      values[ConfigKeys.LLMModel] = 'other';

      configManager.reset();

      expect(mockStore.clear).toHaveBeenCalled();
      expect(values[ConfigKeys.LLMModel]).toBe('llama3.1:8b');
      expect(values[ConfigKeys.ContextFetchTimeoutMs]).toBe(5000);
    });
  });

  // ====== Engine Config ======

  describe('getEngineConfig', () => {
    it('should fall back to defaults for an empty store', () => {
      const config = configManager.getEngineConfig();

      expect(config.llm).toEqual({
        provider: 'ollama',
        model: 'llama3.1:8b',
        apiKey: '',
        maxTokens: 1024,
      });
      expect(config.indexing).toEqual({
        chunkSize: 300,
        chunkOverlap: 50,
        sparseMaxFeatures: 1000,
        dbPath: './data/docent.db',
      });
      expect(config.retrieval).toEqual({ topK: 10, overFetchFactor: 2, denseWeight: 0.7 });
      expect(config.session.maxHistory).toBe(20);
      expect(config.prompt).toEqual({ maxContextLength: 2500, appearancePercentage: 70 });
      expect(config.context).toEqual({
        serviceUrl: 'http://localhost:5004',
        fetchTimeoutMs: 5000,
      });
      expect(config.llm.baseUrl).toBeUndefined();
      expect(config.embedding.dimensions).toBeUndefined();
    });

    it('should prefer stored values over defaults', () => {
      values[ConfigKeys.ChunkSize] = 500;
      values[ConfigKeys.LLMProvider] = 'anthropic';

      const config = configManager.getEngineConfig();

      expect(config.indexing.chunkSize).toBe(500);
      expect(config.llm.provider).toBe('anthropic');
    });

    it('should prefer environment overrides over stored values', () => {
      values[ConfigKeys.LLMModel] = 'stored-model';
      process.env.DOCENT_LLM_MODEL = 'env-model';
      process.env.DOCENT_DB_PATH = '/tmp/docent-test.db';

      const config = configManager.getEngineConfig();

      expect(config.llm.model).toBe('env-model');
      expect(config.indexing.dbPath).toBe('/tmp/docent-test.db');
    });

    it('should reject an over-fetch factor below 2', () => {
      values[ConfigKeys.RetrievalOverFetchFactor] = 1;

      expect(() => configManager.getEngineConfig()).toThrow(/retrieval\.overFetchFactor/);
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
      values[ConfigKeys.ChunkSize] = 100;
      values[ConfigKeys.ChunkOverlap] = 100;

      expect(() => configManager.getEngineConfig()).toThrow(/indexing\.chunkOverlap/);
    });

    it('should reject an unknown provider', () => {
      values[ConfigKeys.LLMProvider] = 'not-a-provider';

      expect(() => configManager.getEngineConfig()).toThrow(/llm\.provider/);
    });
  });
});

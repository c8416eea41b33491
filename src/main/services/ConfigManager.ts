/**
 * @file ConfigManager - Configuration manager
 * @description Persistent config management using conf with pub/sub notification.
 *   Engine settings are resolved as defaults < stored values < DOCENT_* environment variables.
 */

import Conf from 'conf';
import { ConfigKeys } from '../../../shared/types/config-keys';
import {
  DEFAULT_APPEARANCE_PERCENTAGE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONTEXT_FETCH_TIMEOUT_MS,
  DEFAULT_CONTEXT_SERVICE_URL,
  DEFAULT_DB_PATH,
  DEFAULT_DENSE_WEIGHT,
  DEFAULT_EMBEDDING_BASE_URL,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_PROVIDER,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_MODEL,
  DEFAULT_LLM_PROVIDER,
  DEFAULT_MAX_CONTEXT_LENGTH,
  DEFAULT_MAX_HISTORY,
  DEFAULT_OVER_FETCH_FACTOR,
  DEFAULT_SPARSE_MAX_FEATURES,
  DEFAULT_TOP_K,
} from '../../../shared/types/defaults';
import {
  ENV_OVERRIDES,
  collectRawConfig,
  engineConfigSchema,
  type EngineConfig,
} from './EngineConfig';
import { createLogger } from './LoggerService';
import type { IConfigManager } from './interfaces/IConfigManager';

export { ConfigKeys };

const logger = createLogger('ConfigManager');

type ConfigSubscriber = (newValue: unknown, oldValue?: unknown) => void;

class ConfigManagerImpl implements IConfigManager {
  private static instance: ConfigManagerImpl;
  private store: Conf<Record<string, unknown>>;
  private subscribers: Map<string, Set<ConfigSubscriber>> = new Map();

  private constructor() {
    this.store = new Conf<Record<string, unknown>>({
      projectName: 'docent-rag',
      cwd: process.env.DOCENT_CONFIG_DIR || undefined,
      // Keys are flat dotted names, not nested paths
      accessPropertiesByDotNotation: false,
      defaults: this.getDefaults(),
    });

    logger.info('ConfigManager initialized', {
      configPath: this.store.path,
    });
  }

  /** Get singleton instance */
  public static getInstance(): ConfigManagerImpl {
    if (!ConfigManagerImpl.instance) {
      ConfigManagerImpl.instance = new ConfigManagerImpl();
    }
    return ConfigManagerImpl.instance;
  }

  private getDefaults(): Record<string, unknown> {
    return {
      [ConfigKeys.LLMProvider]: DEFAULT_LLM_PROVIDER,
      [ConfigKeys.LLMModel]: DEFAULT_LLM_MODEL,
      [ConfigKeys.LLMMaxTokens]: DEFAULT_LLM_MAX_TOKENS,
      [ConfigKeys.EmbeddingProvider]: DEFAULT_EMBEDDING_PROVIDER,
      [ConfigKeys.EmbeddingModel]: DEFAULT_EMBEDDING_MODEL,
      [ConfigKeys.EmbeddingBaseUrl]: DEFAULT_EMBEDDING_BASE_URL,
      [ConfigKeys.ChunkSize]: DEFAULT_CHUNK_SIZE,
      [ConfigKeys.ChunkOverlap]: DEFAULT_CHUNK_OVERLAP,
      [ConfigKeys.SparseMaxFeatures]: DEFAULT_SPARSE_MAX_FEATURES,
      [ConfigKeys.DatabasePath]: DEFAULT_DB_PATH,
      [ConfigKeys.RetrievalTopK]: DEFAULT_TOP_K,
      [ConfigKeys.RetrievalOverFetchFactor]: DEFAULT_OVER_FETCH_FACTOR,
      [ConfigKeys.RetrievalDenseWeight]: DEFAULT_DENSE_WEIGHT,
      [ConfigKeys.SessionMaxHistory]: DEFAULT_MAX_HISTORY,
      [ConfigKeys.MaxContextLength]: DEFAULT_MAX_CONTEXT_LENGTH,
      [ConfigKeys.AppearancePercentage]: DEFAULT_APPEARANCE_PERCENTAGE,
      [ConfigKeys.ContextServiceUrl]: DEFAULT_CONTEXT_SERVICE_URL,
      [ConfigKeys.ContextFetchTimeoutMs]: DEFAULT_CONTEXT_FETCH_TIMEOUT_MS,
    };
  }

  // ====== Core Read/Write ======

  public get(key: ConfigKeys | string): unknown {
    return this.store.get(key);
  }

  /** @security Check if key contains credentials */
  private isSensitiveKey(key: ConfigKeys | string): boolean {
    return key.toLowerCase().includes('apikey');
  }

  /** @security Sanitize sensitive values for logging */
  private sanitizeValueForLog(key: ConfigKeys | string, value: unknown): unknown {
    if (!this.isSensitiveKey(key)) {
      return value;
    }
    if (typeof value === 'string') {
      return { _sanitized: true, type: 'string', length: value.length };
    }
    return { _sanitized: true, type: typeof value };
  }

  public set(key: ConfigKeys | string, value: unknown): void {
    this.store.set(key, value);
    logger.debug(`Config set: ${key}`, { value: this.sanitizeValueForLog(key, value) });
  }

  public setAndNotify(key: ConfigKeys | string, value: unknown): void {
    const oldValue = this.store.get(key);
    this.store.set(key, value);
    this.notifySubscribers(key, value, oldValue);

    logger.debug(`Config set and notified: ${key}`, {
      value: this.sanitizeValueForLog(key, value),
      oldValue: this.sanitizeValueForLog(key, oldValue),
    });
  }

  public delete(key: ConfigKeys | string): void {
    this.store.delete(key);
    logger.debug(`Config deleted: ${key}`);
  }

  public has(key: ConfigKeys | string): boolean {
    return this.store.has(key);
  }

  public reset(key?: ConfigKeys | string): void {
    if (key) {
      const defaults = this.getDefaults();
      if (key in defaults) {
        this.setAndNotify(key, defaults[key]);
      } else {
        this.delete(key);
      }
    } else {
      this.store.clear();
      this.store.set(this.getDefaults());
      logger.info('All config reset to defaults');
    }
  }

  public getConfigPath(): string {
    return this.store.path;
  }

  // ====== Engine Configuration ======

  public getEngineConfig(): EngineConfig {
    const overrides = new Map<string, string>();
    for (const [envName, key] of ENV_OVERRIDES) {
      const value = process.env[envName];
      if (value) {
        overrides.set(key, value);
      }
    }

    const raw = collectRawConfig((key) => overrides.get(key) ?? this.store.get(key));
    const parsed = engineConfigSchema.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.error('Invalid engine configuration', { issues });
      throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }

    if (overrides.size > 0) {
      logger.debug('Environment overrides applied', { keys: [...overrides.keys()] });
    }

    return parsed.data;
  }

  // ====== Pub/Sub ======

  public subscribe(key: ConfigKeys | string, callback: ConfigSubscriber): () => void {
    let subscribers = this.subscribers.get(key);
    if (!subscribers) {
      subscribers = new Set();
      this.subscribers.set(key, subscribers);
    }
    const current = subscribers;
    current.add(callback);

    logger.debug(`Subscribed to config: ${key}`, { subscriberCount: current.size });

    return () => {
      current.delete(callback);
      if (current.size === 0) {
        this.subscribers.delete(key);
      }
      logger.debug(`Unsubscribed from config: ${key}`);
    };
  }

  private notifySubscribers(key: string, newValue: unknown, oldValue?: unknown): void {
    const subscribers = this.subscribers.get(key);
    if (subscribers && subscribers.size > 0) {
      for (const callback of subscribers) {
        try {
          callback(newValue, oldValue);
        } catch (error) {
          logger.error(`Error in config subscriber for ${key}`, error);
        }
      }
    }
  }
}

/** Lazily created so importing this module never touches the disk */
export function getConfigManager(): ConfigManagerImpl {
  return ConfigManagerImpl.getInstance();
}

export { ConfigManagerImpl };
export type { EngineConfig };

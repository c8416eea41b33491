/**
 * @file IConfigManager - Configuration manager contract
 * @description Public interface for config access used in dependency injection
 * @depends ConfigManagerImpl
 */

import type { ConfigKeys } from '../../../../shared/types/config-keys';
import type { EngineConfig } from '../EngineConfig';

/**
 * Configuration manager interface.
 * Exposes only the capabilities required by dependent services.
 */
export interface IConfigManager {
  // ====== Generic Config Access ======

  /**
   * Reads a raw stored value; unknown keys give undefined.
   * Typed access goes through getEngineConfig().
   */
  get(key: ConfigKeys | string): unknown;

  /**
   * Writes a configuration value.
   * @sideeffect Persists value
   */
  set(key: ConfigKeys | string, value: unknown): void;

  /** Writes and notifies subscribers of the key */
  setAndNotify(key: ConfigKeys | string, value: unknown): void;

  has(key: ConfigKeys | string): boolean;

  delete(key: ConfigKeys | string): void;

  /** Restores one key, or every key when omitted, to its default */
  reset(key?: ConfigKeys | string): void;

  // ====== Engine Configuration ======

  /**
   * Defaults, then stored values, then DOCENT_* environment overrides, validated.
   * @throws Error when the merged values fail validation
   */
  getEngineConfig(): EngineConfig;

  /** Location of the persisted config file */
  getConfigPath(): string;

  // ====== Subscriptions ======

  /**
   * Subscribes to config changes for a key.
   * @returns Unsubscribe function
   */
  subscribe(
    key: ConfigKeys | string,
    callback: (newValue: unknown, oldValue?: unknown) => void
  ): () => void;
}

/**
 * @file ServiceContainer - Lightweight dependency injection container
 * @description Provides service lifecycle management and DI.
 *   - Singleton: Created once, on first access, for the engine lifetime
 *   - Instance: Pre-built object (tests swap fakes in this way)
 */

import { isDisposable, type IDisposable } from '../../../shared/utils/lifecycle';
import { createLogger } from './LoggerService';

const logger = createLogger('ServiceContainer');

/** Service factory function. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

interface ServiceRegistration<T = unknown> {
  factory: ServiceFactory<T>;
  instance?: T;
}

/** Lightweight dependency injection container. */
export class ServiceContainer {
  private registrations: Map<string, ServiceRegistration> = new Map();
  private disposables: Set<IDisposable> = new Set();
  private resolving: Set<string> = new Set();

  /** Register a singleton service; the factory runs on first `get`. */
  registerSingleton<T>(name: string, factory: ServiceFactory<T>): this {
    this.registrations.set(name, { factory });
    return this;
  }

  /** Register an existing instance. */
  registerInstance<T>(name: string, instance: T): this {
    this.registrations.set(name, {
      factory: () => instance,
      instance,
    });

    if (isDisposable(instance)) {
      this.disposables.add(instance);
    }

    return this;
  }

  /**
   * @throws Error when service is not registered or its factories form a cycle.
   */
  get<T>(name: string): T {
    const registration = this.registrations.get(name);

    if (!registration) {
      throw new Error(`Service not registered: ${name}`);
    }

    if (registration.instance !== undefined) {
      return registration.instance as T;
    }

    if (this.resolving.has(name)) {
      throw new Error(`Circular service dependency: ${[...this.resolving, name].join(' -> ')}`);
    }

    this.resolving.add(name);
    try {
      const instance = registration.factory(this);
      registration.instance = instance;

      if (isDisposable(instance)) {
        this.disposables.add(instance);
      }

      return instance as T;
    } finally {
      this.resolving.delete(name);
    }
  }

  /** Dispose all services in reverse creation order and clear registrations. */
  async dispose(): Promise<void> {
    const ordered = [...this.disposables].reverse();

    for (const disposable of ordered) {
      try {
        await disposable.dispose();
      } catch (error) {
        logger.error('[ServiceContainer] Error disposing service', error);
      }
    }

    this.disposables.clear();
    this.registrations.clear();
  }

  /** Get all registered service names. */
  getRegisteredServices(): string[] {
    return Array.from(this.registrations.keys());
  }

  /** Get service statistics for diagnostics. */
  getStats(): {
    registered: number;
    instantiated: number;
    disposables: number;
  } {
    let instantiated = 0;
    for (const reg of this.registrations.values()) {
      if (reg.instance !== undefined) {
        instantiated++;
      }
    }

    return {
      registered: this.registrations.size,
      instantiated,
      disposables: this.disposables.size,
    };
  }
}

// ====== Service Name Constants ======

/** Predefined service names. */
export const ServiceNames = {
  CONFIG: 'config',

  AI: 'ai',
  EMBEDDING: 'embedding',
  VECTOR_STORE: 'vectorStore',
  INDEX_BUILDER: 'indexBuilder',
  HYBRID_RETRIEVER: 'hybridRetriever',

  SESSION_STORE: 'sessionStore',
  CONTEXT_PROVIDER: 'contextProvider',
  CHAT_ORCHESTRATOR: 'chatOrchestrator',

  RAG: 'rag',
} as const;

/** Union of all service name values. */
export type ServiceName = (typeof ServiceNames)[keyof typeof ServiceNames];

/**
 * @file Lifecycle Management
 * @description Disposal contract shared by services, abort sources and the service container
 * @depends None (base dependency for other utilities)
 */

/**
 * Disposable resource interface
 */
export interface IDisposable {
  dispose(): void;
}

/**
 * Check if an object is disposable
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

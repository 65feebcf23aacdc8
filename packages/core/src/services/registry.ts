/**
 * ServiceRegistry - typed service container.
 *
 * Entry points (server, CLI) create the registry once and register the
 * process-wide services; library code resolves them by token.
 *
 *   import { getServiceRegistry, Services } from '@wetlands/core';
 *   const log = getServiceRegistry().get(Services.Log);
 */

/**
 * Typed key for service registration and retrieval.
 */
export class ServiceToken<T> {
  /** @internal keeps T alive for inference */
  declare readonly _type: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

export interface Disposable {
  dispose(): Promise<void> | void;
}

function isDisposable(value: unknown): value is Disposable {
  return (
    value !== null &&
    typeof value === 'object' &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

export class ServiceRegistry {
  private readonly instances = new Map<string, unknown>();
  private readonly disposables: Disposable[] = [];

  /**
   * Register a service instance. Disposable instances are cleaned up on dispose().
   */
  register<T>(token: ServiceToken<T>, instance: T): void {
    this.instances.set(token.name, instance);
    if (isDisposable(instance)) {
      this.disposables.push(instance);
    }
  }

  /**
   * Get a registered service. Throws if not found.
   */
  get<T>(token: ServiceToken<T>): T {
    if (!this.instances.has(token.name)) {
      throw new Error(
        `Service '${token.name}' not registered. ` +
          `Make sure it is registered during startup before use.`
      );
    }
    // The token's type parameter is what the value was registered under.
    return this.instances.get(token.name) as T;
  }

  tryGet<T>(token: ServiceToken<T>): T | null {
    return this.has(token) ? this.get(token) : null;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.instances.has(token.name);
  }

  list(): string[] {
    return [...this.instances.keys()];
  }

  /**
   * Dispose services in reverse registration order.
   * Every service gets its turn; failures are rethrown together afterwards.
   */
  async dispose(): Promise<void> {
    const failures: unknown[] = [];
    for (const d of [...this.disposables].reverse()) {
      try {
        await d.dispose();
      } catch (error) {
        failures.push(error);
      }
    }
    this.instances.clear();
    this.disposables.length = 0;
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} service(s) failed to dispose`);
    }
  }
}

let _registry: ServiceRegistry | null = null;

/**
 * Initialize the global ServiceRegistry. Call once during startup.
 */
export function initServiceRegistry(): ServiceRegistry {
  if (_registry) {
    throw new Error(
      'ServiceRegistry already initialized. Call resetServiceRegistry() first if re-initializing.'
    );
  }
  _registry = new ServiceRegistry();
  return _registry;
}

export function getServiceRegistry(): ServiceRegistry {
  if (!_registry) {
    throw new Error('ServiceRegistry not initialized. Call initServiceRegistry() during startup.');
  }
  return _registry;
}

export function hasServiceRegistry(): boolean {
  return _registry !== null;
}

/**
 * Reset the global ServiceRegistry (tests, CLI commands that start twice).
 */
export async function resetServiceRegistry(): Promise<void> {
  const current = _registry;
  _registry = null;
  if (current) {
    await current.dispose();
  }
}

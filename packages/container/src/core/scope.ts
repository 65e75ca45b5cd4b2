/* Scope
 *
 * Custom scopes hold components whose lifetime is neither the container's
 * (singleton) nor a single lookup (prototype): one instance per request,
 * per job, per session, and so on.
 *
 * A definition opts in with `scope: '<name>'`; the container asks the scope
 * registered under that name for the instance and hands it a producer to
 * call on a miss.
 *
 * ContextScope is the stock implementation: an explicit unit of work that
 * caches instances until it is disposed.
 *
 * Usage example:
 * ```typescript
 * const request = new ContextScope();
 * container.registerScope('request', request);
 * container.registerDefinition('handler', {
 *   type: HandlerT,
 *   useClass: RequestHandler,
 *   scope: 'request',
 * });
 *
 * try {
 *   request.provide('requestId', randomUUID());
 *   container.getInstance(HandlerT).handle();
 * } finally {
 *   request.dispose();
 * }
 * ```
 *
 * Design:
 *  - Lazy initialization: instance and callback maps only created when first used
 *  - Destruction callbacks run in registration order on dispose()
 *  - dispose() is idempotent; a disposed scope rejects further use
 */

import { ScopeDisposedError } from '../errors/errors.js';
import type { Disposable } from '../types/types.js';

export interface CustomScope {
  /** Cached instance for `name`, or the result of `producer` stored for later lookups. */
  get(name: string, producer: () => unknown): unknown;
  /** Drop `name` without running its destruction callback. */
  remove(name: string): unknown;
  registerDestructionCallback(name: string, callback: () => void): void;
}

export class ContextScope implements CustomScope {
  private disposed = false;

  /**
   * Instances of this scope, lazily allocated on first use.
   */
  private instances?: Map<string, unknown>;

  /**
   * Destruction callbacks by component name. Lazily allocated; re-registering
   * a name replaces its callback.
   */
  private callbacks?: Map<string, () => void>;

  get isDisposed(): boolean {
    return this.disposed;
  }

  get size(): number {
    return this.instances?.size ?? 0;
  }

  get(name: string, producer: () => unknown): unknown {
    if (this.disposed) throw new ScopeDisposedError();
    const instances = (this.instances ??= new Map());
    if (instances.has(name)) return instances.get(name);

    const instance = producer();
    instances.set(name, instance);
    return instance;
  }

  has(name: string): boolean {
    return !this.disposed && (this.instances?.has(name) ?? false);
  }

  remove(name: string): unknown {
    if (this.disposed) return undefined;
    const instance = this.instances?.get(name);
    this.instances?.delete(name);
    this.callbacks?.delete(name);
    return instance;
  }

  registerDestructionCallback(name: string, callback: () => void): void {
    if (this.disposed) throw new ScopeDisposedError();
    (this.callbacks ??= new Map()).set(name, callback);
  }

  /**
   * Put a ready-made value in this scope under `name`, replacing any previous
   * value and its destruction callback. Values exposing `dispose()` or
   * `close()` are destroyed with the scope.
   *
   * @example
   * ```typescript
   * scope.provide('connection', await pool.connect());
   * ```
   */
  provide(name: string, value: unknown): void {
    if (this.disposed) throw new ScopeDisposedError();
    this.callbacks?.delete(name);
    (this.instances ??= new Map()).set(name, value);

    if (value && (typeof value === 'object' || typeof value === 'function')) {
      const { dispose, close } = value as Disposable;
      const disposer = typeof dispose === 'function' ? dispose : typeof close === 'function' ? close : undefined;
      if (disposer) this.registerDestructionCallback(name, () => disposer.call(value));
    }
  }

  /**
   * Run every destruction callback and drop all instances.
   *
   * Every callback runs even when some throw; failures are reported together
   * afterwards as an AggregateError.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const errors: unknown[] = [];
    for (const callback of this.callbacks?.values() ?? []) {
      try {
        callback();
      } catch (error) {
        errors.push(error);
      }
    }
    this.callbacks = undefined;
    this.instances = undefined;

    if (errors.length > 0) {
      throw new AggregateError(errors, `${errors.length} scoped component(s) failed to dispose`);
    }
  }
}

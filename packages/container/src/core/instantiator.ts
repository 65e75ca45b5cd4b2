/* Instantiator
 *
 * Turns a merged definition plus already resolved arguments into a raw
 * instance. Three paths:
 *  - class-backed definitions (`new useClass(...args)`)
 *  - factory-backed definitions (`useFactory(...args)`)
 *  - factory-method definitions (`owner[method](...args)`)
 *
 * Dependency resolution, caching and initialization stay in
 * ComponentFactory; this module only calls user code, times it for the
 * instantiation hook and wraps what it throws.
 */

import { ComponentCreationError, ContainerError, InvalidDefinitionError } from '../errors/errors.js';
import type { MergedDefinition } from '../definition/merged-definition.js';
import type { InstantiateHook } from '../types/types.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function' ? () => maybePerf.now() : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

const isPromiseLike = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && typeof Reflect.get(value, 'then') === 'function';

export class Instantiator {
  constructor(private readonly hook: InstantiateHook | undefined) {}

  /**
   * Wrap synchronous instantiation with performance instrumentation.
   */
  private instrumentSync<T>(name: string, execute: () => T): T {
    const hook = this.hook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(name, toNs(nowMs() - start));
    }
  }

  /**
   * Behavior contract
   *  - Throws `ComponentCreationError` wrapping whatever user code throws.
   *  - Throws `ComponentCreationError` when a factory returns a promise:
   *    components are created synchronously.
   *  - Throws `InvalidDefinitionError` when a factory method does not exist
   *    on its owner.
   */
  instantiate(
    def: MergedDefinition,
    args: readonly unknown[],
    owner: unknown,
    resolutionPath: readonly string[]
  ): unknown {
    const { name, strategy } = def;
    let invoke: () => unknown;

    switch (strategy.kind) {
      case 'class': {
        const ctor = strategy.useClass;
        invoke = () => new ctor(...args);
        break;
      }
      case 'factory': {
        const factory = strategy.useFactory;
        invoke = () => factory(...args);
        break;
      }
      case 'factory-method': {
        const method: unknown =
          typeof owner === 'object' && owner !== null ? Reflect.get(owner, strategy.method) : undefined;
        if (typeof method !== 'function') {
          throw new InvalidDefinitionError(
            name,
            `component '${strategy.component}' has no method '${strategy.method}'`
          );
        }
        invoke = () => method.apply(owner, args);
        break;
      }
      case 'none':
        throw new InvalidDefinitionError(name, 'no construction strategy');
    }

    let result: unknown;
    try {
      result = this.instrumentSync(name, invoke);
    } catch (e) {
      if (e instanceof ContainerError) throw e;
      throw new ComponentCreationError(name, e, resolutionPath);
    }

    if (isPromiseLike(result)) {
      throw new ComponentCreationError(
        name,
        new Error('factory returned a promise; components are created synchronously'),
        resolutionPath
      );
    }
    return result;
  }
}

/* InstanceCache
 *
 * Singleton storage for one container, with the three-tier exposure used to
 * break reference cycles between singletons:
 *
 *  1. completed instances
 *  2. early references already handed out for a singleton still in creation
 *  3. one-shot producers able to create such an early reference
 *
 * A producer is registered once the raw instance exists (after its
 * constructor ran, before its properties are populated). The first lookup
 * during creation invokes it and promotes the result to tier 2, so every
 * participant of the cycle sees the same early reference.
 *
 * Singletons whose constructor arguments loop back on themselves never reach
 * tier 3: the second request finds the name in creation with nothing to hand
 * out and fails with CircularReferenceError.
 *
 * Also tracks who depends on whom, so that destruction runs dependents
 * before their dependencies.
 */

import {
  CircularReferenceError,
  ComponentCreationError,
  DefinitionConflict,
  PrototypeCycleError,
} from '../errors/errors.js';

export interface CreationHandle {
  /**
   * Register the producer of the early reference for the singleton being
   * created. Call once the raw instance exists.
   */
  exposeEarlyReference(producer: () => unknown): void;
}

export type DestructionErrorHandler = (name: string, error: unknown) => void;

export class InstanceCache {
  private readonly completed = new Map<string, unknown>();
  private readonly early = new Map<string, unknown>();
  private readonly producers = new Map<string, () => unknown>();

  /** Insertion order mirrors the creation chain. */
  private readonly inCreation = new Set<string>();
  private readonly prototypesInCreation = new Set<string>();

  private readonly dependents = new Map<string, Set<string>>();
  private readonly dependencies = new Map<string, Set<string>>();
  private readonly disposables = new Map<string, () => void>();

  private destroying = false;

  /**
   * Look a singleton up. While `name` is in creation, an early reference is
   * returned when one exists; with `allowEarly`, a registered producer is
   * invoked to create it.
   */
  getSingleton(name: string, allowEarly = true): unknown {
    if (this.completed.has(name)) return this.completed.get(name);
    if (!this.inCreation.has(name)) return undefined;
    if (this.early.has(name)) return this.early.get(name);
    if (!allowEarly) return undefined;

    const producer = this.producers.get(name);
    if (!producer) return undefined;
    const ref = producer();
    this.early.set(name, ref);
    this.producers.delete(name);
    return ref;
  }

  /**
   * Whether a lookup of `name` would be answered without creating anything.
   */
  hasExposedInstance(name: string): boolean {
    return this.completed.has(name) || (this.inCreation.has(name) && (this.early.has(name) || this.producers.has(name)));
  }

  /**
   * Create the singleton `name` through `construct` and store it.
   *
   * @throws CircularReferenceError when `name` is already in creation
   */
  createSingleton<T>(name: string, construct: (handle: CreationHandle) => T): T {
    if (this.destroying) {
      throw new ComponentCreationError(
        name,
        new Error('singletons cannot be created while the container destroys its singletons')
      );
    }
    if (this.inCreation.has(name)) {
      const chain = [...this.inCreation];
      throw new CircularReferenceError([...chain.slice(chain.indexOf(name)), name]);
    }

    this.inCreation.add(name);
    try {
      const instance = construct({
        exposeEarlyReference: (producer) => {
          if (!this.completed.has(name) && !this.early.has(name)) this.producers.set(name, producer);
        },
      });
      this.completed.set(name, instance);
      return instance;
    } finally {
      this.early.delete(name);
      this.producers.delete(name);
      this.inCreation.delete(name);
    }
  }

  /**
   * Register an externally created singleton.
   *
   * @throws DefinitionConflict when a singleton already exists under `name`
   */
  registerSingleton(name: string, instance: unknown): void {
    if (this.completed.has(name)) {
      throw new DefinitionConflict(name, 'a singleton instance is already registered under this name');
    }
    this.completed.set(name, instance);
  }

  containsSingleton(name: string): boolean {
    return this.completed.has(name);
  }

  /** Completed singleton names, in completion order. */
  singletonNames(): readonly string[] {
    return [...this.completed.keys()];
  }

  get singletonCount(): number {
    return this.completed.size;
  }

  isCurrentlyInCreation(name: string): boolean {
    return this.inCreation.has(name) || this.prototypesInCreation.has(name);
  }

  /** Whether an early reference to `name` was handed out during its creation. */
  earlyReferenceExposed(name: string): boolean {
    return this.early.has(name);
  }

  /**
   * Track a prototype creation.
   *
   * @throws PrototypeCycleError when the same prototype is already being created
   */
  beginPrototype(name: string): void {
    if (this.prototypesInCreation.has(name)) {
      const chain = [...this.prototypesInCreation];
      throw new PrototypeCycleError([...chain.slice(chain.indexOf(name)), name]);
    }
    this.prototypesInCreation.add(name);
  }

  endPrototype(name: string): void {
    this.prototypesInCreation.delete(name);
  }

  registerDependent(dependency: string, dependent: string): void {
    if (dependency === dependent) return;
    let set = this.dependents.get(dependency);
    if (!set) this.dependents.set(dependency, (set = new Set()));
    set.add(dependent);

    let deps = this.dependencies.get(dependent);
    if (!deps) this.dependencies.set(dependent, (deps = new Set()));
    deps.add(dependency);
  }

  dependentsOf(name: string): readonly string[] {
    return [...(this.dependents.get(name) ?? [])];
  }

  dependenciesOf(name: string): readonly string[] {
    return [...(this.dependencies.get(name) ?? [])];
  }

  /** Whether `dependent` depends on `name`, directly or transitively. */
  isDependent(name: string, dependent: string, seen = new Set<string>()): boolean {
    if (seen.has(name)) return false;
    const direct = this.dependents.get(name);
    if (!direct) return false;
    if (direct.has(dependent)) return true;
    seen.add(name);
    for (const next of direct) {
      if (this.isDependent(next, dependent, seen)) return true;
    }
    return false;
  }

  registerDisposable(name: string, callback: () => void): void {
    this.disposables.set(name, callback);
  }

  /**
   * Remove `name` and destroy it, after destroying every component that
   * depends on it. Callback failures go to `onError`; destruction goes on.
   */
  destroySingleton(name: string, onError: DestructionErrorHandler): void {
    this.completed.delete(name);
    this.early.delete(name);
    this.producers.delete(name);

    const callback = this.disposables.get(name);
    this.disposables.delete(name);

    const dependents = this.dependents.get(name);
    this.dependents.delete(name);
    for (const dependent of dependents ?? []) {
      this.destroySingleton(dependent, onError);
    }

    if (callback) {
      try {
        callback();
      } catch (error) {
        onError(name, error);
      }
    }

    for (const [dependency, set] of [...this.dependents]) {
      set.delete(name);
      if (set.size === 0) this.dependents.delete(dependency);
    }
    this.dependencies.delete(name);
  }

  /**
   * Destroy every disposable singleton in reverse completion order, then
   * clear all tiers.
   */
  destroySingletons(onError: DestructionErrorHandler): void {
    this.destroying = true;
    try {
      for (const name of [...this.disposables.keys()].reverse()) {
        this.destroySingleton(name, onError);
      }
      this.completed.clear();
      this.early.clear();
      this.producers.clear();
      this.dependents.clear();
      this.dependencies.clear();
      this.disposables.clear();
    } finally {
      this.destroying = false;
    }
  }
}

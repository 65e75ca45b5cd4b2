/*
 * ComponentFactory
 * ----------------
 * Creates components from merged definitions and serves lookups by name and
 * by type. One factory per container; a child container's factory delegates
 * unknown names to its parent's.
 *
 * Creation pipeline for one component:
 *
 *   beforeInstantiation   post-processors may supply the instance outright
 *   instantiate           resolve constructor/factory arguments, call user code
 *   expose early          singletons register an early-reference producer
 *   populate              resolve and assign properties
 *   initialize            aware callbacks, beforeInit, init method, afterInit
 *   reconcile             an early reference that was handed out must still
 *                         be what the component ends up exposed as
 *   register destruction  destroy method, inferred dispose()/close()
 *
 * A factory component (see factory-component.ts) is created like any other
 * singleton; its name then answers the product and `&name` the factory.
 *
 * Scopes:
 *  - singleton: created once through InstanceCache
 *  - prototype: created on every lookup, never cached nor destroyed
 *  - custom: delegated to the CustomScope registered under the scope name
 */

import type { DependencyRequest } from './dependency-descriptor.js';
import { describeDependency } from './dependency-descriptor.js';
import { DependencyResolver, describeValue, isOfType, type CandidateMetadata } from './dependency-resolver.js';
import {
  FACTORY_COMPONENT,
  FACTORY_PREFIX,
  isFactoryComponent,
  isFactoryReference,
  stripFactoryPrefix,
  type FactoryComponent,
} from './factory-component.js';
import { InstanceCache, type DestructionErrorHandler } from './instance-cache.js';
import { Instantiator } from './instantiator.js';
import { sortByPriority, type InstancePostProcessor } from './post-processors.js';
import type { CustomScope } from './scope.js';
import type { TypeMatcher } from './type-matcher.js';
import type { TypeId, TypeTag } from './type-tag.js';
import type { Injection } from '../definition/component-definition.js';
import { DefinitionStore } from '../definition/definition-store.js';
import { isPrototype, isSingleton, type MergedDefinition } from '../definition/merged-definition.js';
import {
  CircularReferenceError,
  ComponentCreationError,
  ContainerError,
  DefinitionNotFound,
  InvalidContainerConfigError,
  InvalidDefinitionError,
  ScopeNotFoundError,
  TypeMismatchError,
} from '../errors/errors.js';
import { errorContext, type Logger } from '../logging/logger.js';
import {
  ComponentScope,
  hasMethod,
  isNameAware,
  isSingletonsReadyAware,
  type InstantiateHook,
} from '../types/types.js';

export interface ComponentFactoryOptions {
  name: string;
  logger: Logger;
  matcher: TypeMatcher;
  allowOverriding: boolean;
  allowCircularReferences: boolean;
  onInstantiate?: InstantiateHook;
  parent?: ComponentFactory;
}

const MANUAL_METADATA: CandidateMetadata = Object.freeze({
  primary: false,
  priority: undefined,
  order: undefined,
  autowireCandidate: true,
  factoryComponent: undefined,
});

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> => hasMethod(value, 'then');

export class ComponentFactory {
  readonly name: string;
  readonly store: DefinitionStore;
  readonly cache = new InstanceCache();
  readonly matcher: TypeMatcher;
  readonly parentFactory: ComponentFactory | undefined;

  private readonly logger: Logger;
  private readonly allowCircularReferences: boolean;
  private readonly resolver = new DependencyResolver(this);
  private readonly instantiator: Instantiator;

  private postProcessors: InstancePostProcessor[] = [];
  private readonly scopes = new Map<string, CustomScope>();
  /** Externally registered singletons, in registration order, with their optional type. */
  private readonly manual = new Map<string, TypeTag | undefined>();
  private readonly resolvables = new Map<TypeId, { type: TypeTag; value: unknown }>();
  /** Shared products of singleton factory components, keyed by factory name. */
  private readonly products = new Map<string, { factory: FactoryComponent; product: unknown }>();

  constructor(options: ComponentFactoryOptions) {
    this.name = options.name;
    this.logger = options.logger;
    this.matcher = options.matcher;
    this.allowCircularReferences = options.allowCircularReferences;
    this.parentFactory = options.parent;
    this.instantiator = new Instantiator(options.onInstantiate);
    this.store = new DefinitionStore({
      allowOverriding: options.allowOverriding,
      logger: options.logger,
      onReset: (name) => {
        this.products.delete(name);
        if (this.cache.containsSingleton(name)) this.cache.destroySingleton(name, this.reportDestroyError);
      },
    });
  }

  // ---------- Lookups ----------

  /**
   * Look a component up by type or by name (or alias). `args` replace the
   * definition's arguments when the lookup creates the component.
   *
   * @throws DefinitionNotFound for an unknown name
   * @throws NoMatchError | AmbiguityError for type lookups
   */
  getInstance<T>(type: TypeTag<T>, args?: readonly unknown[]): T;
  getInstance(name: string, args?: readonly unknown[]): unknown;
  getInstance<T>(target: string | TypeTag<T>, args?: readonly unknown[]): unknown {
    if (typeof target === 'string') return this.getInstanceInternal(target, [], args);

    const descriptor = describeDependency({ type: target });
    let value: unknown;
    if (args) {
      const chosen = this.resolver.select(descriptor, []);
      value = chosen?.owner.getInstanceInternal(chosen.name, [], args);
    } else {
      value = this.resolver.resolve(descriptor, []);
    }

    if (!isOfType(this.matcher, value, target)) {
      throw new TypeMismatchError(target.label, target.label, describeValue(value));
    }
    return value;
  }

  /**
   * Every local component assignable to `type`, keyed by name, in
   * registration order. Creates the ones that do not exist yet.
   */
  getInstancesOfType<T>(type: TypeTag<T>): Map<string, T> {
    const out = new Map<string, T>();
    for (const name of this.getNamesForType(type)) {
      const value = this.getInstanceInternal(name, []);
      if (!isOfType(this.matcher, value, type)) {
        throw new TypeMismatchError(name, type.label, describeValue(value));
      }
      out.set(name, value);
    }
    return out;
  }

  /**
   * Local definition names, then typed manual singletons, assignable to `type`.
   *
   * A factory component is listed under its name when its product type
   * matches, and as `&name` when only the factory itself does. Finding the
   * product type may create the factory; with `allowFactoryInit` false only
   * factories that already exist are asked.
   */
  getNamesForType(type: TypeTag, allowFactoryInit = true): readonly string[] {
    const defined = this.store.namesForType(type, this.matcher);
    const hasFactories = this.store.namesForType(FACTORY_COMPONENT, this.matcher).length > 0;

    const names: string[] = [];
    if (!hasFactories) {
      names.push(...defined);
    } else {
      const matching = new Set(defined);
      for (const name of this.store.names()) {
        this.pushMatch(names, name, matching.has(name), type, allowFactoryInit);
      }
    }

    for (const [name, manualType] of this.manual) {
      if (this.store.has(name) || !manualType) continue;
      this.pushMatch(names, name, this.matcher.isAssignable(manualType, type), type, allowFactoryInit);
    }
    return names;
  }

  private pushMatch(out: string[], name: string, typeMatches: boolean, type: TypeTag, allowInit: boolean): void {
    if (!this.isFactoryName(name)) {
      if (typeMatches) out.push(name);
      return;
    }
    const productType = this.factoryForTypeCheck(name, allowInit)?.getObjectType();
    if (productType && this.matcher.isAssignable(productType, type)) out.push(name);
    else if (typeMatches) out.push(FACTORY_PREFIX + name);
  }

  /** Names defined or registered in this factory, ancestors excluded. */
  getLocalNames(): readonly string[] {
    return [...this.store.names(), ...[...this.manual.keys()].filter((n) => !this.store.has(n))];
  }

  containsLocalComponent(nameOrAlias: string): boolean {
    const name = this.store.canonicalName(stripFactoryPrefix(nameOrAlias));
    return this.store.has(name) || this.cache.containsSingleton(name);
  }

  containsComponent(nameOrAlias: string): boolean {
    return this.containsLocalComponent(nameOrAlias) || (this.parentFactory?.containsComponent(nameOrAlias) ?? false);
  }

  /**
   * Type of what a lookup of `nameOrAlias` returns, if known without creating
   * anything: the product type for a factory component that exists already.
   */
  getType(nameOrAlias: string): TypeTag | undefined {
    const name = this.store.canonicalName(stripFactoryPrefix(nameOrAlias));
    if (!this.containsLocalComponent(name)) return this.parentFactory?.getType(nameOrAlias);

    const declared = this.localType(name);
    if (isFactoryReference(nameOrAlias) || !this.isFactoryName(name)) return declared;
    return this.factoryForTypeCheck(name, false)?.getObjectType();
  }

  candidateMetadata(candidateName: string): CandidateMetadata {
    const name = stripFactoryPrefix(candidateName);
    if (!this.store.has(name)) return MANUAL_METADATA;
    const def = this.store.getMerged(name);
    return {
      primary: def.primary,
      priority: def.priority,
      order: def.order,
      autowireCandidate: def.autowireCandidate,
      factoryComponent:
        def.strategy.kind === 'factory-method' ? this.store.canonicalName(def.strategy.component) : undefined,
    };
  }

  /** Whether `hint` is the component's name or one of its aliases. */
  matchesName(candidateName: string, hint: string): boolean {
    const name = stripFactoryPrefix(candidateName);
    return candidateName === hint || name === hint || this.store.aliasesOf(name).includes(hint);
  }

  /**
   * Resolve an arbitrary dependency request, as if it were an injection
   * point of `declaringComponent`.
   */
  resolveDependency<T>(request: DependencyRequest<T>, declaringComponent?: string): unknown {
    return this.resolver.resolve(describeDependency(request, declaringComponent), []);
  }

  /**
   * Lookup used by the resolver and by nested creations; `path` is the
   * chain of components whose creation led here.
   *
   * @internal
   */
  getInstanceInternal(nameOrAlias: string, path: readonly string[], args?: readonly unknown[]): unknown {
    const name = this.store.canonicalName(stripFactoryPrefix(nameOrAlias));

    if (!this.containsLocalComponent(name) && this.parentFactory?.containsComponent(nameOrAlias)) {
      return this.parentFactory.getInstanceInternal(nameOrAlias, path, args);
    }

    const instance = this.obtainInstance(name, path, args);
    const factoryRef = isFactoryReference(nameOrAlias);
    if (!factoryRef && !this.isFactoryName(name)) return instance;
    if (!isFactoryComponent(instance)) {
      throw new TypeMismatchError(name, FACTORY_COMPONENT.label, describeValue(instance), path);
    }
    return factoryRef ? instance : this.productOf(name, instance, path);
  }

  /** The component registered under the canonical `name`, created if needed. */
  private obtainInstance(name: string, path: readonly string[], args?: readonly unknown[]): unknown {
    if (this.cache.hasExposedInstance(name)) return this.cache.getSingleton(name);
    if (!this.store.has(name)) throw new DefinitionNotFound(name, this.store.names(), path);

    const def = this.store.getMerged(name);
    if (def.abstract) {
      throw new InvalidDefinitionError(name, 'abstract definitions are templates and cannot be instantiated');
    }
    const nextPath = [...path, name];

    for (const dependsOn of def.dependsOn) {
      const dep = this.store.canonicalName(dependsOn);
      if (this.cache.isDependent(name, dep)) {
        throw new CircularReferenceError(
          [...nextPath, dep],
          `'${name}' and '${dep}' wait for each other through dependsOn.`
        );
      }
      this.cache.registerDependent(dep, name);
      this.getInstanceInternal(dep, nextPath);
    }
    // A dependsOn target may have looked this component up already.
    if (this.cache.hasExposedInstance(name)) return this.cache.getSingleton(name);

    if (isSingleton(def)) {
      let started = false;
      try {
        return this.cache.createSingleton(name, (handle) => {
          started = true;
          const instance = this.createComponent(def, nextPath, args, (producer) => handle.exposeEarlyReference(producer));
          const destroy = this.destroyerFor(def, instance);
          if (destroy) this.cache.registerDisposable(name, destroy);
          return instance;
        });
      } catch (e) {
        // Anything that received an early reference must go too.
        if (started) this.cache.destroySingleton(name, this.reportDestroyError);
        throw e;
      }
    }

    if (isPrototype(def)) {
      this.cache.beginPrototype(name);
      try {
        return this.createComponent(def, nextPath, args);
      } finally {
        this.cache.endPrototype(name);
      }
    }

    const scope = this.scopes.get(def.scope);
    if (!scope) throw new ScopeNotFoundError(def.scope, name);
    return scope.get(name, () => {
      this.cache.beginPrototype(name);
      try {
        const instance = this.createComponent(def, nextPath, args);
        const destroy = this.destroyerFor(def, instance);
        if (destroy) scope.registerDestructionCallback(name, destroy);
        return instance;
      } finally {
        this.cache.endPrototype(name);
      }
    });
  }

  // ---------- Registration ----------

  /**
   * Register an instance created outside the container. With `type`, the
   * instance also takes part in type lookups and autowiring.
   */
  registerSingleton(name: string, instance: unknown, type?: TypeTag): void {
    if (type && !this.matcher.isInstance(instance, type)) {
      throw new TypeMismatchError(name, type.label, describeValue(instance));
    }
    this.cache.registerSingleton(name, instance);
    this.manual.set(name, type);
    this.store.clearMetadataCache((n) => n !== name);
  }

  /**
   * Value injected wherever `type` (or a supertype of it) is requested,
   * without being a component itself.
   */
  registerResolvableValue<T>(type: TypeTag<T>, value: T): void {
    this.resolvables.set(type.id, { type, value });
  }

  findResolvableValue(type: TypeTag): { value: unknown } | undefined {
    const exact = this.resolvables.get(type.id);
    if (exact) return { value: exact.value };
    for (const entry of this.resolvables.values()) {
      if (this.matcher.isAssignable(entry.type, type) && this.matcher.isInstance(entry.value, type)) {
        return { value: entry.value };
      }
    }
    return undefined;
  }

  addPostProcessor(processor: InstancePostProcessor): void {
    this.postProcessors = sortByPriority([...this.postProcessors.filter((p) => p !== processor), processor]);
  }

  /** Drop every instance post-processor; a new refresh registers them again. */
  clearPostProcessors(): void {
    this.postProcessors = [];
  }

  registerScope(name: string, scope: CustomScope): void {
    if (name === ComponentScope.Singleton || name === ComponentScope.Prototype) {
      throw new InvalidContainerConfigError(`cannot replace the built-in '${name}' scope`);
    }
    this.scopes.set(name, scope);
  }

  // ---------- Bulk operations ----------

  /**
   * Create every non-lazy, non-abstract singleton in registration order, then
   * notify those implementing `afterSingletonsInstantiated()`.
   */
  preInstantiateSingletons(): void {
    const names = [...this.store.names()];
    for (const name of names) {
      const def = this.store.getMerged(name);
      if (!def.abstract && isSingleton(def) && !def.lazy) this.obtainInstance(name, []);
    }
    for (const name of names) {
      const instance = this.cache.getSingleton(name, false);
      if (isSingletonsReadyAware(instance)) instance.afterSingletonsInstantiated();
    }
  }

  destroySingletons(onError: DestructionErrorHandler = this.reportDestroyError): void {
    this.cache.destroySingletons(onError);
    this.manual.clear();
    this.products.clear();
  }

  clearMetadataCache(): void {
    this.store.clearMetadataCache((name) => this.cache.containsSingleton(name));
  }

  // ---------- Factory components ----------

  private localType(name: string): TypeTag | undefined {
    if (this.store.has(name)) return this.store.getMerged(name).type;
    return this.manual.get(name);
  }

  private isFactoryName(name: string): boolean {
    const type = this.localType(name);
    return type !== undefined && this.matcher.isAssignable(type, FACTORY_COMPONENT);
  }

  /**
   * The factory component under `name`, for asking its product type. Only
   * singleton factories qualify; one in creation is skipped.
   */
  private factoryForTypeCheck(name: string, allowInit: boolean): FactoryComponent | undefined {
    if (this.cache.containsSingleton(name)) {
      const existing = this.cache.getSingleton(name, false);
      return isFactoryComponent(existing) ? existing : undefined;
    }
    if (!allowInit || !this.store.has(name) || this.cache.isCurrentlyInCreation(name)) return undefined;

    const def = this.store.getMerged(name);
    if (def.abstract || !isSingleton(def)) return undefined;
    const created = this.obtainInstance(name, []);
    return isFactoryComponent(created) ? created : undefined;
  }

  private productOf(name: string, factory: FactoryComponent, path: readonly string[]): unknown {
    if (this.cache.isCurrentlyInCreation(name)) {
      throw new CircularReferenceError(
        [...path, name],
        `'${name}' is a factory component still being created; its product is not available yet.`
      );
    }

    const shared = this.cache.containsSingleton(name) && factory.isSingleton?.() !== false;
    const cached = shared ? this.products.get(name) : undefined;
    if (cached && cached.factory === factory) return cached.product;

    const product = this.guard(name, path, () => {
      const made = factory.getObject();
      if (made === undefined || made === null) throw new Error('getObject() returned no object');
      if (isPromiseLike(made)) throw new Error('getObject() returned a promise; products are created synchronously');
      return this.applyAfterInit(made, name);
    });
    if (shared) this.products.set(name, { factory, product });
    return product;
  }

  // ---------- Creation pipeline ----------

  private createComponent(
    def: MergedDefinition,
    path: readonly string[],
    explicitArgs: readonly unknown[] | undefined,
    exposeEarly?: (producer: () => unknown) => void
  ): unknown {
    const { name } = def;

    for (const processor of this.postProcessors) {
      const supplied = this.guard(name, path, () => processor.beforeInstantiation?.(name, def));
      if (supplied !== undefined) return this.guard(name, path, () => this.applyAfterInit(supplied, name));
    }

    const args = explicitArgs ?? def.args.map((arg) => this.resolveInjection(name, arg, path));
    const owner = this.factoryOwner(def, path);
    const instance = this.instantiator.instantiate(def, args, owner, path);

    const early = exposeEarly !== undefined && this.allowCircularReferences;
    if (early) exposeEarly(() => this.earlyReferenceFor(instance, name));

    let exposed = this.guard(name, path, () => {
      const populate = this.postProcessors.every((p) => p.afterInstantiation?.(instance, name) !== false);
      if (populate) this.populate(def, instance, path);
      return this.initialize(def, instance);
    });

    if (early && this.cache.earlyReferenceExposed(name)) {
      const earlyRef = this.cache.getSingleton(name, false);
      if (exposed === instance) {
        exposed = earlyRef;
      } else if (exposed !== earlyRef) {
        throw new CircularReferenceError(
          [...path, name],
          `'${name}' was injected into ${this.cache.dependentsOf(name).join(', ') || 'other components'} ` +
            'in its raw form, but was wrapped afterwards.'
        );
      }
    }

    return exposed;
  }

  /** Run user code, wrapping anything that is not already a container error. */
  private guard<T>(name: string, path: readonly string[], fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof ContainerError) throw e;
      throw new ComponentCreationError(name, e, path);
    }
  }

  private factoryOwner(def: MergedDefinition, path: readonly string[]): unknown {
    if (def.strategy.kind !== 'factory-method') return undefined;
    const ownerName = this.store.canonicalName(def.strategy.component);
    if (ownerName === def.name) {
      throw new InvalidDefinitionError(def.name, 'a factory-method definition cannot own its own method');
    }
    const owner = this.getInstanceInternal(ownerName, path);
    if (this.store.has(ownerName)) this.cache.registerDependent(ownerName, def.name);
    return owner;
  }

  private resolveInjection(declaring: string, injection: Injection, path: readonly string[], hint?: string): unknown {
    switch (injection.kind) {
      case 'value':
        return injection.value;
      case 'ref': {
        if (!injection.required && !this.containsComponent(injection.name)) return undefined;
        const target = this.store.canonicalName(stripFactoryPrefix(injection.name));
        const value = this.getInstanceInternal(injection.name, path);
        if (this.containsLocalComponent(target)) this.cache.registerDependent(target, declaring);
        return value;
      }
      case 'inject':
        return this.resolver.resolve(
          describeDependency({ ...injection.request, name: injection.request.name ?? hint }, declaring),
          path
        );
    }
  }

  private populate(def: MergedDefinition, instance: unknown, path: readonly string[]): void {
    const entries = Object.entries(def.properties);
    if (entries.length === 0) return;
    if (typeof instance !== 'object' || instance === null) {
      throw new InvalidDefinitionError(def.name, `cannot assign properties on ${describeValue(instance)}`);
    }
    for (const [key, injection] of entries) {
      const value = this.resolveInjection(def.name, injection, path, key);
      Reflect.set(instance, key, value);
    }
  }

  private initialize(def: MergedDefinition, instance: unknown): unknown {
    const { name } = def;
    if (isNameAware(instance)) instance.setComponentName(name);

    let current = instance;
    for (const processor of this.postProcessors) {
      const next = processor.beforeInit?.(current, name);
      if (next !== undefined) current = next;
    }

    if (def.initMethod !== undefined) {
      const initMethod = def.initMethod;
      if (!hasMethod(current, initMethod)) {
        throw new InvalidDefinitionError(name, `init method '${initMethod}' not found`);
      }
      current[initMethod]();
    }

    return this.applyAfterInit(current, name);
  }

  private applyAfterInit(instance: unknown, name: string): unknown {
    let current = instance;
    for (const processor of this.postProcessors) {
      const next = processor.afterInit?.(current, name);
      if (next !== undefined) current = next;
    }
    return current;
  }

  private earlyReferenceFor(instance: unknown, name: string): unknown {
    let current = instance;
    for (const processor of this.postProcessors) {
      const next = processor.earlyReference?.(current, name);
      if (next !== undefined) current = next;
    }
    return current;
  }

  // ---------- Destruction ----------

  private destroyerFor(def: MergedDefinition, instance: unknown): (() => void) | undefined {
    const { name } = def;
    const processors = this.postProcessors.filter((p) => p.beforeDestruction !== undefined);
    const method = this.destroyMethodName(def, instance);
    if (method === undefined && processors.length === 0) return undefined;

    return () => {
      for (const processor of processors) processor.beforeDestruction?.(instance, name);
      if (method === undefined || !hasMethod(instance, method)) return;
      const result = instance[method]();
      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch((error: unknown) =>
          this.logger.error(`Asynchronous destroy of '${name}' failed`, errorContext(error))
        );
      }
    };
  }

  private destroyMethodName(def: MergedDefinition, instance: unknown): string | undefined {
    if (def.destroyMethod === false) return undefined;
    if (def.destroyMethod !== undefined) {
      if (!hasMethod(instance, def.destroyMethod)) {
        throw new InvalidDefinitionError(def.name, `destroy method '${def.destroyMethod}' not found`);
      }
      return def.destroyMethod;
    }
    if (hasMethod(instance, 'dispose')) return 'dispose';
    if (hasMethod(instance, 'close')) return 'close';
    return undefined;
  }

  private readonly reportDestroyError: DestructionErrorHandler = (name, error) => {
    this.logger.warn(`Destroy of component '${name}' failed`, errorContext(error));
  };
}

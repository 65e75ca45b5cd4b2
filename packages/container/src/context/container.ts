/*
 * Container
 * ---------
 * Public face of the engine: owns a ComponentFactory, an EventBus and a
 * LifecycleProcessor, and drives them through a guarded state machine:
 *
 *   new -> refreshing -> active -> closing -> closed
 *               \
 *                -> failed (inactive, refresh may be retried)
 *
 * refresh() bootstraps every eager singleton or none: any failure after the
 * preparation step destroys what was created and leaves the container
 * inactive.
 *
 * Subclasses customize the bootstrap through the protected hooks
 * obtainFreshFactory(), postProcessFactory(), onRefresh() and onClose().
 */

import { ComponentFactory } from '../core/component-factory.js';
import type { DependencyRequest } from '../core/dependency-descriptor.js';
import { describeValue, isOfType } from '../core/dependency-resolver.js';
import {
  sortByPriority,
  type DefinitionPostProcessor,
  type InstancePostProcessor,
} from '../core/post-processors.js';
import type { CustomScope } from '../core/scope.js';
import { TagHierarchyMatcher, type TypeMatcher } from '../core/type-matcher.js';
import type { TypeTag } from '../core/type-tag.js';
import type {
  ComponentDefinition,
  DefinitionRegistry,
  DefinitionSource,
} from '../definition/component-definition.js';
import {
  ContainerError,
  ContainerStateError,
  InvalidContainerConfigError,
  MissingPropertiesError,
  RefreshFailure,
  TypeMismatchError,
} from '../errors/errors.js';
import { EventBus } from '../events/event-bus.js';
import { ClosedEvent, RefreshedEvent, StartedEvent, StoppedEvent, type EventPublisher } from '../events/events.js';
import { SimpleEventMulticaster, type EventListener, type EventMulticaster } from '../events/multicaster.js';
import { createConsoleLogger, errorContext, isLogLevel, type Logger } from '../logging/logger.js';
import { hasMethod, isContainerAware, type ContainerConfig, type InstantiateHook } from '../types/types.js';
import {
  COMPONENT_FACTORY,
  CONTAINER,
  DEFINITION_POST_PROCESSOR,
  EVENT_MULTICASTER,
  EVENT_MULTICASTER_NAME,
  EVENT_PUBLISHER,
  INSTANCE_POST_PROCESSOR,
  LISTENER,
  MESSAGE_RESOLVER,
  MESSAGE_RESOLVER_NAME,
  PROPERTIES,
  PROPERTIES_NAME,
  type Properties,
} from './framework-types.js';
import { LifecycleProcessor } from './lifecycle-processor.js';
import { DelegatingMessageResolver, type MessageResolver } from './message-resolver.js';

export type ContainerState = 'new' | 'refreshing' | 'active' | 'closing' | 'closed' | 'failed';

interface ResolvedConfig {
  readonly name: string;
  readonly parent: Container | undefined;
  readonly allowDefinitionOverriding: boolean;
  readonly allowCircularReferences: boolean;
  readonly properties: Properties;
  readonly requiredProperties: readonly string[];
  readonly logger: Logger;
  readonly sources: readonly DefinitionSource[];
  readonly typeMatcher: TypeMatcher;
  readonly onInstantiate: InstantiateHook | undefined;
  readonly registerShutdownHook: boolean;
}

const LOGGER_METHODS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

/**
 * Validate configuration and return a frozen, fully defaulted copy.
 *
 * Note: the freeze is shallow; `properties` and `sources` are copied so later
 * mutation of the caller's objects does not leak in.
 */
function validateConfig(raw: ContainerConfig = {}): ResolvedConfig {
  if (typeof raw !== 'object' || raw === null) {
    throw new InvalidContainerConfigError('configuration must be an object');
  }
  if (raw.name !== undefined && (typeof raw.name !== 'string' || raw.name.trim() === '')) {
    throw new InvalidContainerConfigError('name must be a non-empty string');
  }
  if (raw.parent !== undefined && !(raw.parent instanceof Container)) {
    throw new InvalidContainerConfigError('parent must be a Container');
  }
  for (const key of ['allowDefinitionOverriding', 'allowCircularReferences', 'registerShutdownHook'] as const) {
    if (raw[key] !== undefined && typeof raw[key] !== 'boolean') {
      throw new InvalidContainerConfigError(`${key} must be a boolean`);
    }
  }
  if (raw.properties !== undefined && (typeof raw.properties !== 'object' || raw.properties === null)) {
    throw new InvalidContainerConfigError('properties must be an object');
  }
  if (
    raw.requiredProperties !== undefined &&
    (!Array.isArray(raw.requiredProperties) || raw.requiredProperties.some((p) => typeof p !== 'string'))
  ) {
    throw new InvalidContainerConfigError('requiredProperties must be an array of strings');
  }
  if (raw.logger !== undefined && !LOGGER_METHODS.every((m) => hasMethod(raw.logger, m))) {
    throw new InvalidContainerConfigError(`logger must implement ${LOGGER_METHODS.join(', ')}`);
  }
  if (
    raw.sources !== undefined &&
    (!Array.isArray(raw.sources) || !raw.sources.every((s) => hasMethod(s, 'loadDefinitions')))
  ) {
    throw new InvalidContainerConfigError('sources must be an array of definition sources');
  }
  if (
    raw.typeMatcher !== undefined &&
    !(hasMethod(raw.typeMatcher, 'isAssignable') && hasMethod(raw.typeMatcher, 'isInstance'))
  ) {
    throw new InvalidContainerConfigError('typeMatcher must implement isAssignable and isInstance');
  }
  if (raw.onInstantiate !== undefined && typeof raw.onInstantiate !== 'function') {
    throw new InvalidContainerConfigError('onInstantiate must be a function');
  }

  const name = raw.name ?? 'container';
  const envLevel = process.env.ARBOR_LOG_LEVEL;
  return Object.freeze({
    name,
    parent: raw.parent,
    allowDefinitionOverriding: raw.allowDefinitionOverriding ?? true,
    allowCircularReferences: raw.allowCircularReferences ?? true,
    properties: Object.freeze({ ...(raw.properties ?? process.env) }),
    requiredProperties: Object.freeze([...(raw.requiredProperties ?? [])]),
    logger: raw.logger ?? createConsoleLogger({ level: isLogLevel(envLevel) ? envLevel : undefined }),
    sources: Object.freeze([...(raw.sources ?? [])]),
    typeMatcher: raw.typeMatcher ?? new TagHierarchyMatcher(),
    onInstantiate: raw.onInstantiate,
    registerShutdownHook: raw.registerShutdownHook ?? false,
  });
}

/** Hands the container to components implementing `setContainer()`. */
class ContainerAwareProcessor implements InstancePostProcessor {
  readonly priority = Number.NEGATIVE_INFINITY;

  constructor(private readonly container: Container) {}

  beforeInit(instance: unknown): unknown {
    if (isContainerAware(instance)) instance.setContainer(this.container);
    return instance;
  }
}

export class Container implements DefinitionRegistry, EventPublisher, MessageResolver {
  readonly name: string;
  protected readonly logger: Logger;

  private readonly config: ResolvedConfig;
  private readonly factory: ComponentFactory;
  private readonly bus: EventBus;
  private readonly awareProcessor = new ContainerAwareProcessor(this);

  private state: ContainerState = 'new';
  private active = false;
  private transitioning = false;
  private startupDate: number | undefined;

  private multicaster: EventMulticaster | undefined;
  private messageResolver: MessageResolver | undefined;
  private lifecycle: LifecycleProcessor | undefined;

  private listeners: EventListener[] = [];
  private listenerSnapshot: readonly EventListener[] | undefined;
  private readonly definitionPostProcessors: DefinitionPostProcessor[] = [];
  private readonly instancePostProcessors: InstancePostProcessor[] = [];
  private readonly loadedSources = new Set<DefinitionSource>();
  private shutdownHook: (() => void) | undefined;

  constructor(config?: ContainerConfig) {
    this.config = validateConfig(config);
    this.name = this.config.name;
    this.logger = this.config.logger;
    this.factory = new ComponentFactory({
      name: this.name,
      logger: this.logger,
      matcher: this.config.typeMatcher,
      allowOverriding: this.config.allowDefinitionOverriding,
      allowCircularReferences: this.config.allowCircularReferences,
      onInstantiate: this.config.onInstantiate,
      parent: this.config.parent?.getComponentFactory(),
    });
    const parent = this.config.parent;
    // A closed parent no longer takes events; the child keeps working.
    this.bus = new EventBus(
      this,
      parent && {
        publish: (event) => {
          if (!parent.isClosed()) parent.publish(event);
        },
      }
    );
    if (this.config.registerShutdownHook) this.registerShutdownHook();
  }

  // ---------- State ----------

  getState(): ContainerState {
    return this.state;
  }

  isActive(): boolean {
    return this.active;
  }

  isClosed(): boolean {
    return this.state === 'closed';
  }

  /** Epoch milliseconds at which the last refresh started. */
  getStartupDate(): number | undefined {
    return this.startupDate;
  }

  getParent(): Container | undefined {
    return this.config.parent;
  }

  getProperties(): Properties {
    return this.config.properties;
  }

  getComponentFactory(): ComponentFactory {
    return this.factory;
  }

  // ---------- Definition registry ----------

  registerDefinition(name: string, definition: ComponentDefinition): void {
    this.factory.store.register(name, definition);
  }

  removeDefinition(name: string): void {
    this.factory.store.remove(name);
  }

  getDefinition(name: string): Readonly<ComponentDefinition> {
    return this.factory.store.get(this.factory.store.canonicalName(name));
  }

  containsDefinition(name: string): boolean {
    return this.factory.store.has(this.factory.store.canonicalName(name));
  }

  getDefinitionNames(): readonly string[] {
    return this.factory.store.names();
  }

  registerAlias(name: string, alias: string): void {
    this.factory.store.registerAlias(name, alias);
  }

  registerSingleton(name: string, instance: unknown, type?: TypeTag): void {
    this.factory.registerSingleton(name, instance, type);
  }

  registerScope(name: string, scope: CustomScope): void {
    this.factory.registerScope(name, scope);
  }

  addDefinitionPostProcessor(processor: DefinitionPostProcessor): void {
    this.definitionPostProcessors.push(processor);
  }

  addInstancePostProcessor(processor: InstancePostProcessor): void {
    this.instancePostProcessors.push(processor);
    if (this.active) this.factory.addPostProcessor(processor);
  }

  // ---------- Lookups ----------

  /**
   * Look a component up by type or by name (or alias).
   *
   * @throws ContainerStateError when the container is not active
   */
  getInstance<T>(type: TypeTag<T>, args?: readonly unknown[]): T;
  getInstance(name: string, args?: readonly unknown[]): unknown;
  getInstance<T>(target: string | TypeTag<T>, args?: readonly unknown[]): unknown {
    this.assertActive('look up components in');
    return typeof target === 'string' ? this.factory.getInstance(target, args) : this.factory.getInstance(target, args);
  }

  getInstancesOfType<T>(type: TypeTag<T>): Map<string, T> {
    this.assertActive('look up components in');
    return this.factory.getInstancesOfType(type);
  }

  getNamesForType(type: TypeTag): readonly string[] {
    return this.factory.getNamesForType(type);
  }

  /** Type a lookup of `name` returns, when known without creating anything. */
  getType(name: string): TypeTag | undefined {
    return this.factory.getType(name);
  }

  containsComponent(name: string): boolean {
    return this.factory.containsComponent(name);
  }

  /** Resolve an ad-hoc injection point, e.g. every component of a type as a Map. */
  resolveDependency<T>(request: DependencyRequest<T>): unknown {
    this.assertActive('look up components in');
    return this.factory.resolveDependency(request);
  }

  // ---------- Events & messages ----------

  /**
   * Publish an event to this container's listeners (buffered until the
   * multicaster is ready), then to the parent container.
   *
   * Listener errors reach the caller.
   */
  publish(event: unknown): void {
    if (this.state === 'closed') throw new ContainerStateError(this.name, this.state, 'publish events in');
    this.bus.publish(event);
  }

  addListener(listener: EventListener): void {
    this.listeners.push(listener);
    this.multicaster?.addListener(listener);
  }

  resolveMessage(code: string, args?: readonly unknown[], fallback?: string): string | undefined {
    if (!this.messageResolver) {
      throw new ContainerStateError(this.name, this.state, 'resolve messages in');
    }
    return this.messageResolver.resolveMessage(code, args, fallback);
  }

  // ---------- Lifecycle ----------

  start(): void {
    this.assertActive('start');
    this.lifecycleProcessor().start();
    this.publish(new StartedEvent(this));
  }

  stop(): void {
    this.assertActive('stop');
    this.lifecycleProcessor().stop();
    this.publish(new StoppedEvent(this));
  }

  isRunning(): boolean {
    return this.lifecycle?.isRunning() ?? false;
  }

  /**
   * Load definitions and create every eager singleton, all or nothing.
   *
   * @throws ContainerStateError when active, closed, or already transitioning
   * @throws MissingPropertiesError when a required property is absent
   * @throws ContainerError raised by the container, as is
   * @throws RefreshFailure wrapping any other error
   */
  refresh(): void {
    if (this.transitioning || this.state === 'active' || this.state === 'closed') {
      throw new ContainerStateError(this.name, this.state, 'refresh');
    }
    this.transitioning = true;
    this.state = 'refreshing';
    try {
      this.prepareRefresh();
      try {
        const factory = this.obtainFreshFactory();
        this.prepareFactory(factory);
        this.postProcessFactory(factory);
        this.invokeDefinitionPostProcessors(factory);
        this.registerInstancePostProcessors(factory);
        this.initMessageResolver(factory);
        this.initEventMulticaster(factory);
        this.onRefresh();
        this.registerListeners(factory);
        this.finishFactoryInitialization(factory);
        this.finishRefresh();
      } catch (e) {
        this.logger.warn(`Refresh of '${this.name}' failed; destroying created singletons`, errorContext(e));
        this.cancelRefresh();
        throw e instanceof ContainerError ? e : new RefreshFailure(this.name, e);
      }
      this.state = 'active';
      this.logger.info(`Container '${this.name}' refreshed`, {
        definitions: this.factory.store.size,
        singletons: this.factory.cache.singletonCount,
      });
    } catch (e) {
      this.state = 'failed';
      this.active = false;
      throw e;
    } finally {
      this.transitioning = false;
    }
  }

  /**
   * Destroy every singleton and deactivate. A no-op unless active; a call
   * made while refreshing or closing is logged and ignored.
   */
  close(): void {
    if (this.transitioning) {
      this.logger.warn(`close() on '${this.name}' ignored: a ${this.state} transition is in progress`);
      return;
    }
    if (!this.active || this.state !== 'active') return;

    this.transitioning = true;
    this.state = 'closing';
    try {
      this.doClose();
    } finally {
      this.transitioning = false;
      this.removeShutdownHook();
    }
  }

  /** Close this container when the process exits. */
  registerShutdownHook(): void {
    if (this.shutdownHook) return;
    this.shutdownHook = () => this.close();
    process.on('exit', this.shutdownHook);
  }

  // ---------- Extension hooks ----------

  /** Load every configured definition source into the factory. */
  protected obtainFreshFactory(): ComponentFactory {
    for (const source of this.config.sources) {
      if (this.loadedSources.has(source)) continue;
      source.loadDefinitions(this);
      this.loadedSources.add(source);
    }
    return this.factory;
  }

  /** Called before definition post-processors run. */
  protected postProcessFactory(_factory: ComponentFactory): void {}

  /** Called after the event multicaster is ready, before singletons are created. */
  protected onRefresh(): void {}

  /** Called at the end of close(), after singletons are destroyed. */
  protected onClose(): void {}

  // ---------- Refresh steps ----------

  private prepareRefresh(): void {
    this.startupDate = Date.now();
    this.active = true;
    this.logger.debug(`Refreshing container '${this.name}'`);

    const missing = this.config.requiredProperties.filter((key) => this.config.properties[key] === undefined);
    if (missing.length > 0) {
      this.active = false;
      throw new MissingPropertiesError(missing);
    }

    if (this.listenerSnapshot) this.listeners = [...this.listenerSnapshot];
    else this.listenerSnapshot = [...this.listeners];

    this.bus.reset();
  }

  private prepareFactory(factory: ComponentFactory): void {
    factory.registerResolvableValue(CONTAINER, this);
    factory.registerResolvableValue(COMPONENT_FACTORY, factory);
    factory.registerResolvableValue(EVENT_PUBLISHER, this);
    factory.registerResolvableValue(PROPERTIES, this.config.properties);
    if (!factory.containsLocalComponent(PROPERTIES_NAME)) {
      factory.registerSingleton(PROPERTIES_NAME, this.config.properties, PROPERTIES);
    }
  }

  /**
   * Registry phase for programmatic processors, then for processors declared
   * as definitions until no new ones appear; then the factory phase for all.
   */
  private invokeDefinitionPostProcessors(factory: ComponentFactory): void {
    const invoked: DefinitionPostProcessor[] = [];
    for (const processor of sortByPriority(this.definitionPostProcessors)) {
      processor.postProcessRegistry?.(this);
      invoked.push(processor);
    }

    const seen = new Set<string>();
    for (;;) {
      const fresh = factory.getNamesForType(DEFINITION_POST_PROCESSOR, false).filter((n) => !seen.has(n));
      if (fresh.length === 0) break;
      fresh.forEach((n) => seen.add(n));
      const declared = sortByPriority(fresh.map((n) => this.typedInstance(factory, n, DEFINITION_POST_PROCESSOR)));
      for (const processor of declared) {
        processor.postProcessRegistry?.(this);
        invoked.push(processor);
      }
    }

    for (const processor of invoked) processor.postProcessFactory?.(factory);
    factory.clearMetadataCache();
  }

  private registerInstancePostProcessors(factory: ComponentFactory): void {
    factory.addPostProcessor(this.awareProcessor);
    for (const processor of this.instancePostProcessors) factory.addPostProcessor(processor);
    for (const name of factory.getNamesForType(INSTANCE_POST_PROCESSOR, false)) {
      factory.addPostProcessor(this.typedInstance(factory, name, INSTANCE_POST_PROCESSOR));
    }
  }

  private initMessageResolver(factory: ComponentFactory): void {
    if (factory.containsLocalComponent(MESSAGE_RESOLVER_NAME)) {
      this.messageResolver = this.typedInstance(factory, MESSAGE_RESOLVER_NAME, MESSAGE_RESOLVER);
      return;
    }
    const resolver = new DelegatingMessageResolver(this.config.parent);
    factory.registerSingleton(MESSAGE_RESOLVER_NAME, resolver, MESSAGE_RESOLVER);
    this.messageResolver = resolver;
  }

  private initEventMulticaster(factory: ComponentFactory): void {
    if (factory.containsLocalComponent(EVENT_MULTICASTER_NAME)) {
      this.multicaster = this.typedInstance(factory, EVENT_MULTICASTER_NAME, EVENT_MULTICASTER);
      return;
    }
    const multicaster = new SimpleEventMulticaster();
    factory.registerSingleton(EVENT_MULTICASTER_NAME, multicaster, EVENT_MULTICASTER);
    this.multicaster = multicaster;
  }

  private registerListeners(factory: ComponentFactory): void {
    const multicaster = this.requireMulticaster();
    for (const listener of this.listeners) multicaster.addListener(listener);
    for (const name of factory.getNamesForType(LISTENER, false)) {
      multicaster.addListenerName(name, () => this.typedInstance(factory, name, LISTENER));
    }
    this.bus.attach(multicaster);
  }

  private finishFactoryInitialization(factory: ComponentFactory): void {
    factory.store.freeze();
    factory.preInstantiateSingletons();
  }

  private finishRefresh(): void {
    this.lifecycleProcessor().onRefresh();
    this.publish(new RefreshedEvent(this));
  }

  private cancelRefresh(): void {
    this.factory.destroySingletons((name, error) =>
      this.logger.warn(`Destroy of '${name}' failed during refresh rollback`, errorContext(error))
    );
    this.factory.clearPostProcessors();
    this.active = false;
    this.bus.reset();
    this.multicaster?.removeAllListeners();
    this.multicaster = undefined;
    this.messageResolver = undefined;
    this.lifecycle = undefined;
    this.factory.clearMetadataCache();
  }

  private doClose(): void {
    this.logger.debug(`Closing container '${this.name}'`);

    try {
      this.publish(new ClosedEvent(this));
    } catch (e) {
      this.logger.warn(`Publishing the close event of '${this.name}' failed`, errorContext(e));
    }

    try {
      this.lifecycle?.onClose();
    } catch (e) {
      this.logger.warn(`Stopping lifecycle components of '${this.name}' failed`, errorContext(e));
    }

    this.factory.destroySingletons((name, error) =>
      this.logger.warn(`Destroy of '${name}' failed during close`, errorContext(error))
    );
    this.factory.clearMetadataCache();

    this.onClose();

    if (this.listenerSnapshot) this.listeners = [...this.listenerSnapshot];
    this.multicaster?.removeAllListeners();
    this.multicaster = undefined;
    this.messageResolver = undefined;
    this.lifecycle = undefined;
    this.bus.reset();

    this.active = false;
    this.state = 'closed';
  }

  // ---------- Helpers ----------

  private assertActive(operation: string): void {
    if (!this.active) throw new ContainerStateError(this.name, this.state, operation);
  }

  private lifecycleProcessor(): LifecycleProcessor {
    return (this.lifecycle ??= new LifecycleProcessor(this.factory, this.logger, this));
  }

  private requireMulticaster(): EventMulticaster {
    if (!this.multicaster) throw new ContainerStateError(this.name, this.state, 'multicast events in');
    return this.multicaster;
  }

  private typedInstance<T>(factory: ComponentFactory, name: string, type: TypeTag<T>): T {
    const value = factory.getInstance(name);
    if (!isOfType(this.config.typeMatcher, value, type)) {
      throw new TypeMismatchError(name, type.label, describeValue(value));
    }
    return value;
  }

  private removeShutdownHook(): void {
    if (!this.shutdownHook) return;
    process.off('exit', this.shutdownHook);
    this.shutdownHook = undefined;
  }
}

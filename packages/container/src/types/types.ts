import type { Container } from '../context/container.js';
import type { TypeMatcher } from '../core/type-matcher.js';
import type { DefinitionSource } from '../definition/component-definition.js';
import type { Logger } from '../logging/logger.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Plain factory function producing a component from its resolved arguments.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Factory<T = unknown> = (...args: any[]) => T;

/**
 * Built-in scopes.
 *
 *   - **Singleton**: one shared instance per container (default)
 *   - **Prototype**: a fresh, uncached instance per request
 *
 * Any other string names a custom scope registered with
 * `container.registerScope()`.
 *
 * @example
 * ```typescript
 * container.registerDefinition('handler', {
 *   type: HandlerT,
 *   useClass: RequestHandler,
 *   scope: ComponentScope.Prototype,
 * });
 * ```
 */
export const ComponentScope = {
  Singleton: 'singleton',
  Prototype: 'prototype',
} as const;

// eslint-disable-next-line @typescript-eslint/ban-types
export type ScopeName = (typeof ComponentScope)[keyof typeof ComponentScope] | (string & {});

/**
 * How internal a definition is. Overriding a definition with a more
 * internal one is reported at a higher log level than other overrides.
 */
export const Role = {
  Application: 'application',
  Support: 'support',
  Infrastructure: 'infrastructure',
} as const;

export type RoleType = (typeof Role)[keyof typeof Role];

export function roleRank(role: RoleType): number {
  switch (role) {
    case 'application':
      return 0;
    case 'support':
      return 1;
    case 'infrastructure':
      return 2;
  }
}

/**
 * Components exposing `dispose()` or `close()` are destroyed through it
 * when no explicit destroy method is configured.
 */
export interface Disposable {
  dispose?: () => void;
  close?: () => void;
}

/**
 * Components that can be started and stopped with the container.
 */
export interface Lifecycle {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /** Lower phases start first and stop last. @default 0 */
  readonly phase?: number;
  /** Start automatically at the end of refresh. @default true */
  readonly autoStartup?: boolean;
}

/**
 * Singletons implementing this hook are called once every eager singleton of
 * a refresh has been created.
 */
export interface SingletonsReadyAware {
  afterSingletonsInstantiated(): void;
}

/** Receives the name the component is registered under. */
export interface NameAware {
  setComponentName(name: string): void;
}

/** Receives the container that created the component. */
export interface ContainerAware {
  setContainer(container: Container): void;
}

/**
 * Whether `value` is an object or function exposing a method named `key`.
 */
export function hasMethod<K extends string>(
  value: unknown,
  key: K
): value is Record<K, (...args: unknown[]) => unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, key) === 'function'
  );
}

export const isSingletonsReadyAware = (value: unknown): value is SingletonsReadyAware =>
  hasMethod(value, 'afterSingletonsInstantiated');

export const isNameAware = (value: unknown): value is NameAware => hasMethod(value, 'setComponentName');

export const isContainerAware = (value: unknown): value is ContainerAware => hasMethod(value, 'setContainer');

export const isLifecycle = (value: unknown): value is Lifecycle =>
  hasMethod(value, 'start') && hasMethod(value, 'stop') && hasMethod(value, 'isRunning');

/** Hook invoked after a component is instantiated. */
export type InstantiateHook = (name: string, durationNs: number) => void;

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerConfig {
  /**
   * Name used in logs and error messages.
   *
   * @default 'container'
   */
  name?: string;

  /**
   * Parent container. Its components are visible as candidates and events
   * published here propagate to it.
   */
  parent?: Container;

  /**
   * Whether registering a definition under an existing name replaces it.
   *
   * @default true
   */
  allowDefinitionOverriding?: boolean;

  /**
   * Whether singletons expose early references to break property-level
   * cycles.
   *
   * @default true
   */
  allowCircularReferences?: boolean;

  /**
   * Configuration values visible to components and required-property
   * validation.
   *
   * @default process.env
   */
  properties?: Readonly<Record<string, string | undefined>>;

  /** Property keys that must be present when refresh starts. */
  requiredProperties?: readonly string[];

  /** Logger used by every container module. */
  logger?: Logger;

  /** Definition sources loaded at the start of each refresh. */
  sources?: readonly DefinitionSource[];

  /** Type-introspection capability. @default TagHierarchyMatcher */
  typeMatcher?: TypeMatcher;

  /**
   * Optional hook invoked after a component is instantiated.
   *
   * Receives the component name and the instantiation duration in
   * nanoseconds. Useful for profiling or custom telemetry.
   */
  onInstantiate?: InstantiateHook;

  /**
   * Close the container when the process exits.
   *
   * @default false
   */
  registerShutdownHook?: boolean;
}

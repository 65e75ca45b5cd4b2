/*
 * Component definitions
 * ---------------------
 * Declarative recipes handed to the container by definition sources. A
 * definition names a type, a scope, a construction strategy and the values
 * its constructor arguments and properties receive. Definitions may inherit
 * from a parent definition; the merged, fully-resolved view lives in
 * merged-definition.ts.
 */

import type { DependencyRequest } from '../core/dependency-descriptor.js';
import { isTypeTag, type TypeTag } from '../core/type-tag.js';
import { DefinitionConflict, InvalidDefinitionError } from '../errors/errors.js';
import type { Constructor, Factory, RoleType, ScopeName } from '../types/types.js';

/**
 * Value supplied to a constructor argument, factory argument or property.
 */
export type Injection =
  | { readonly kind: 'value'; readonly value: unknown }
  | { readonly kind: 'ref'; readonly name: string; readonly required: boolean }
  | { readonly kind: 'inject'; readonly request: DependencyRequest };

/** Literal value. */
export function value(v: unknown): Injection {
  return { kind: 'value', value: v };
}

/** Another component, by name or alias. */
export function ref(name: string, options: { required?: boolean } = {}): Injection {
  return { kind: 'ref', name, required: options.required ?? true };
}

/** Autowire a single component by type. */
export function inject<T>(type: TypeTag<T>, options: Omit<DependencyRequest<T>, 'type'> = {}): Injection {
  return { kind: 'inject', request: { ...options, type } };
}

/** Autowire every candidate of a type, as an array. */
export function injectAll<T>(type: TypeTag<T>, options: Omit<DependencyRequest<T>, 'type' | 'shape'> = {}): Injection {
  return { kind: 'inject', request: { ...options, type, shape: 'array' } };
}

/** Optional single component; `undefined` when none matches. */
export function injectOptional<T>(type: TypeTag<T>, options: Omit<DependencyRequest<T>, 'type' | 'required'> = {}): Injection {
  return { kind: 'inject', request: { ...options, type, required: false } };
}

/**
 * Component produced by calling a method on another component.
 */
export interface FactoryMethodRef {
  /** Name of the component owning the method. */
  readonly component: string;
  readonly method: string;
}

export interface ComponentDefinition<T = unknown> {
  /** Declared type. Required once merged, unless the definition is abstract. */
  type?: TypeTag<T>;
  /** @default 'singleton' */
  scope?: ScopeName;
  /** Skip eager creation during refresh. @default false */
  lazy?: boolean;
  /** Template only: never instantiated, only inherited from. @default false */
  abstract?: boolean;
  /** Name of the definition to inherit unset fields from. */
  parent?: string;

  useClass?: Constructor<T>;
  useFactory?: Factory<T>;
  factoryMethod?: FactoryMethodRef;

  /** Constructor or factory arguments, by position. */
  args?: readonly Injection[];
  /** Properties assigned after construction. */
  properties?: Readonly<Record<string, Injection>>;

  /** Wins ties between several candidates of the same type. */
  primary?: boolean;
  /** Lower value wins ties between non-primary candidates. */
  priority?: number;
  /** Position in multi-element injections, ascending. */
  order?: number;
  /** @default true */
  autowireCandidate?: boolean;

  /** Method called after properties are set. */
  initMethod?: string;
  /**
   * Method called when the component is destroyed. When unset, `dispose()`
   * or `close()` is used if present; `false` disables destruction.
   */
  destroyMethod?: string | false;

  /** @default 'application' */
  role?: RoleType;
  /** Components created before this one, without being injected. */
  dependsOn?: readonly string[];
  description?: string;
}

/**
 * Write side of the definition registry, as seen by definition sources and
 * definition post-processors.
 */
export interface DefinitionRegistry {
  registerDefinition(name: string, definition: ComponentDefinition): void;
  removeDefinition(name: string): void;
  getDefinition(name: string): Readonly<ComponentDefinition>;
  containsDefinition(name: string): boolean;
  getDefinitionNames(): readonly string[];
  registerAlias(name: string, alias: string): void;
}

/**
 * External collaborator turning some configuration format into definitions.
 */
export interface DefinitionSource {
  loadDefinitions(registry: DefinitionRegistry): void;
}

const STRATEGY_KEYS = ['useClass', 'useFactory', 'factoryMethod'] as const;

export function strategyCount(def: ComponentDefinition): number {
  return STRATEGY_KEYS.filter((key) => def[key] !== undefined).length;
}

function validateInjection(name: string, where: string, injection: Injection): void {
  switch (injection.kind) {
    case 'value':
      return;
    case 'ref':
      if (typeof injection.name !== 'string' || injection.name.length === 0) {
        throw new InvalidDefinitionError(name, `${where} references an empty component name`);
      }
      return;
    case 'inject':
      if (!isTypeTag(injection.request.type)) {
        throw new InvalidDefinitionError(name, `${where} must inject a type tag`);
      }
      return;
    default:
      throw new InvalidDefinitionError(name, `${where} is not an injection`);
  }
}

/**
 * Check a raw definition before it enters the registry.
 *
 * Cross-definition checks (parent existence, merged strategy) happen when
 * the definition is merged.
 */
export function validateDefinition(name: string, def: ComponentDefinition): void {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InvalidDefinitionError(String(name), 'name must be a non-empty string');
  }
  if (name.startsWith('&')) {
    throw new InvalidDefinitionError(name, "names starting with '&' are reserved for factory component lookups");
  }
  if (typeof def !== 'object' || def === null) {
    throw new InvalidDefinitionError(name, 'definition must be an object');
  }
  if (strategyCount(def) > 1) {
    throw new InvalidDefinitionError(name, 'useClass, useFactory and factoryMethod are mutually exclusive');
  }
  if (def.useClass !== undefined && typeof def.useClass !== 'function') {
    throw new InvalidDefinitionError(name, 'useClass must be a constructor');
  }
  if (def.useFactory !== undefined && typeof def.useFactory !== 'function') {
    throw new InvalidDefinitionError(name, 'useFactory must be a function');
  }
  if (def.factoryMethod !== undefined) {
    const { component, method } = def.factoryMethod;
    if (!component || !method) {
      throw new InvalidDefinitionError(name, 'factoryMethod needs both component and method');
    }
  }
  if (def.type !== undefined && !isTypeTag(def.type)) {
    throw new InvalidDefinitionError(name, 'type must be a type tag');
  }
  if (def.scope !== undefined && (typeof def.scope !== 'string' || def.scope.length === 0)) {
    throw new InvalidDefinitionError(name, 'scope must be a non-empty string');
  }
  for (const key of ['priority', 'order'] as const) {
    const n = def[key];
    if (n !== undefined && !Number.isFinite(n)) {
      throw new InvalidDefinitionError(name, `${key} must be a finite number`);
    }
  }
  if (def.parent !== undefined && def.parent === name) {
    throw new DefinitionConflict(name, `parent chain loops: ${name} -> ${name}`);
  }
  if (!def.abstract && def.parent === undefined && strategyCount(def) === 0) {
    throw new InvalidDefinitionError(name, 'no construction strategy');
  }
  def.args?.forEach((arg, i) => validateInjection(name, `argument ${i}`, arg));
  for (const [key, injection] of Object.entries(def.properties ?? {})) {
    validateInjection(name, `property '${key}'`, injection);
  }
}

function freezeInjection(injection: Injection): Injection {
  const copy: Injection =
    injection.kind === 'inject' ? { kind: 'inject', request: Object.freeze({ ...injection.request }) } : { ...injection };
  return Object.freeze(copy);
}

/**
 * Frozen copy of `def`, detached from the caller's object and its arrays.
 */
export function snapshotDefinition(def: ComponentDefinition): Readonly<ComponentDefinition> {
  const copy: ComponentDefinition = { ...def };
  if (def.args) copy.args = Object.freeze(def.args.map(freezeInjection));
  if (def.properties) {
    copy.properties = Object.freeze(
      Object.fromEntries(Object.entries(def.properties).map(([key, injection]) => [key, freezeInjection(injection)]))
    );
  }
  if (def.dependsOn) copy.dependsOn = Object.freeze([...def.dependsOn]);
  if (def.factoryMethod) copy.factoryMethod = Object.freeze({ ...def.factoryMethod });
  return Object.freeze(copy);
}

function injectionsEqual(a: Injection | undefined, b: Injection | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.kind !== b.kind) return false;
  switch (a.kind) {
    case 'value':
      return b.kind === 'value' && Object.is(a.value, b.value);
    case 'ref':
      return b.kind === 'ref' && a.name === b.name && a.required === b.required;
    case 'inject': {
      if (b.kind !== 'inject') return false;
      const x = a.request;
      const y = b.request;
      return (
        x.type === y.type &&
        x.shape === y.shape &&
        x.required === y.required &&
        x.name === y.name &&
        x.keyType === y.keyType
      );
    }
  }
}

const SIMPLE_KEYS = [
  'type',
  'scope',
  'lazy',
  'abstract',
  'parent',
  'useClass',
  'useFactory',
  'primary',
  'priority',
  'order',
  'autowireCandidate',
  'initMethod',
  'destroyMethod',
  'role',
  'description',
] as const;

/**
 * Structural equality used to grade override log messages.
 */
export function definitionsEqual(a: ComponentDefinition, b: ComponentDefinition): boolean {
  if (a === b) return true;
  for (const key of SIMPLE_KEYS) {
    if (a[key] !== b[key]) return false;
  }
  if (a.factoryMethod?.component !== b.factoryMethod?.component) return false;
  if (a.factoryMethod?.method !== b.factoryMethod?.method) return false;

  const argsA = a.args ?? [];
  const argsB = b.args ?? [];
  if (argsA.length !== argsB.length) return false;
  if (argsA.some((arg, i) => !injectionsEqual(arg, argsB[i]))) return false;

  const propsA = a.properties ?? {};
  const propsB = b.properties ?? {};
  const keysA = Object.keys(propsA);
  if (keysA.length !== Object.keys(propsB).length) return false;
  if (keysA.some((key) => !injectionsEqual(propsA[key], propsB[key]))) return false;

  const depsA = a.dependsOn ?? [];
  const depsB = b.dependsOn ?? [];
  return depsA.length === depsB.length && depsA.every((d, i) => d === depsB[i]);
}

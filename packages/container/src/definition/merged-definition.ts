import type { TypeTag } from '../core/type-tag.js';
import { InvalidDefinitionError } from '../errors/errors.js';
import { ComponentScope, Role, type Constructor, type Factory, type RoleType, type ScopeName } from '../types/types.js';
import type { ComponentDefinition, Injection } from './component-definition.js';

export type CreationStrategy =
  | { readonly kind: 'class'; readonly useClass: Constructor }
  | { readonly kind: 'factory'; readonly useFactory: Factory }
  | { readonly kind: 'factory-method'; readonly component: string; readonly method: string }
  | { readonly kind: 'none' };

export type DefinitionOrigin = { readonly kind: 'local' } | { readonly kind: 'inherited'; readonly parentName: string };

/**
 * Fully resolved, frozen view of a definition and its parent chain.
 */
export interface MergedDefinition {
  readonly name: string;
  /** Undefined only for abstract templates. */
  readonly type: TypeTag | undefined;
  readonly scope: ScopeName;
  readonly lazy: boolean;
  readonly abstract: boolean;
  readonly strategy: CreationStrategy;
  readonly args: readonly Injection[];
  readonly properties: Readonly<Record<string, Injection>>;
  readonly primary: boolean;
  readonly priority: number | undefined;
  readonly order: number | undefined;
  readonly autowireCandidate: boolean;
  readonly initMethod: string | undefined;
  readonly destroyMethod: string | false | undefined;
  readonly role: RoleType;
  readonly dependsOn: readonly string[];
  readonly description: string | undefined;
  readonly origin: DefinitionOrigin;
}

function ownStrategy(def: ComponentDefinition): CreationStrategy | undefined {
  if (def.useClass) return { kind: 'class', useClass: def.useClass };
  if (def.useFactory) return { kind: 'factory', useFactory: def.useFactory };
  if (def.factoryMethod) {
    return { kind: 'factory-method', component: def.factoryMethod.component, method: def.factoryMethod.method };
  }
  return undefined;
}

function mergeArgs(child: readonly Injection[] | undefined, parent: readonly Injection[]): readonly Injection[] {
  if (!child) return parent;
  const length = Math.max(child.length, parent.length);
  const out: Injection[] = [];
  for (let i = 0; i < length; i++) {
    const arg = child[i] ?? parent[i];
    if (arg) out.push(arg);
  }
  return Object.freeze(out);
}

/**
 * Combine a raw definition with its already merged parent.
 *
 * Scalar fields set on the child win. Properties merge by key, arguments by
 * position. `abstract` is never inherited.
 *
 * @throws InvalidDefinitionError when the result is concrete but has no type
 * or no construction strategy
 */
export function mergeDefinitions(name: string, def: ComponentDefinition, parent?: MergedDefinition): MergedDefinition {
  const abstract = def.abstract ?? false;
  const strategy = ownStrategy(def) ?? parent?.strategy ?? { kind: 'none' };
  const type = def.type ?? parent?.type;

  if (!abstract) {
    if (strategy.kind === 'none') {
      throw new InvalidDefinitionError(name, 'no construction strategy on the definition or its parents');
    }
    if (!type) {
      throw new InvalidDefinitionError(name, 'a concrete definition needs a type tag');
    }
  }

  const merged: MergedDefinition = {
    name,
    type,
    scope: def.scope ?? parent?.scope ?? ComponentScope.Singleton,
    lazy: def.lazy ?? parent?.lazy ?? false,
    abstract,
    strategy,
    args: mergeArgs(def.args, parent?.args ?? []),
    properties: Object.freeze({ ...(parent?.properties ?? {}), ...(def.properties ?? {}) }),
    primary: def.primary ?? parent?.primary ?? false,
    priority: def.priority ?? parent?.priority,
    order: def.order ?? parent?.order,
    autowireCandidate: def.autowireCandidate ?? parent?.autowireCandidate ?? true,
    initMethod: def.initMethod ?? parent?.initMethod,
    destroyMethod: def.destroyMethod ?? parent?.destroyMethod,
    role: def.role ?? parent?.role ?? Role.Application,
    dependsOn: Object.freeze([...(def.dependsOn ?? parent?.dependsOn ?? [])]),
    description: def.description ?? parent?.description,
    origin: parent ? { kind: 'inherited', parentName: parent.name } : { kind: 'local' },
  };
  return Object.freeze(merged);
}

export function isSingleton(def: MergedDefinition): boolean {
  return def.scope === ComponentScope.Singleton;
}

export function isPrototype(def: MergedDefinition): boolean {
  return def.scope === ComponentScope.Prototype;
}

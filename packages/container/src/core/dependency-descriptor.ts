import type { TypeTag } from './type-tag.js';

/**
 * Shape of the value requested at an injection point.
 *
 *   - **scalar**: one component
 *   - **array**: every candidate, as `T[]`
 *   - **collection**: every candidate, as an insertion-ordered `Set<T>`
 *   - **map**: every candidate keyed by component name, as `Map<string, T>`
 *   - **stream**: every candidate, resolved lazily while iterating
 */
export type DependencyShape = 'scalar' | 'array' | 'collection' | 'map' | 'stream';

export type MapKeyType = 'string' | 'number' | 'symbol';

/**
 * What an injection point asks for. This is the user-facing half of a
 * descriptor; the container fills in where the request comes from.
 */
export interface DependencyRequest<T = unknown> {
  /** Element type. For multi-element shapes this is the type of each element. */
  type: TypeTag<T>;
  /** @default 'scalar' */
  shape?: DependencyShape;
  /** @default true */
  required?: boolean;
  /**
   * Name of the injection site (parameter or property name). A candidate
   * whose name or alias equals it wins an otherwise ambiguous match.
   */
  name?: string;
  /** Key type of map-shaped requests. @default 'string' */
  keyType?: MapKeyType;
}

export interface DependencyDescriptor<T = unknown> {
  readonly type: TypeTag<T>;
  readonly shape: DependencyShape;
  readonly required: boolean;
  readonly name: string | undefined;
  readonly keyType: MapKeyType;
  /** Component whose creation needs this dependency, if any. */
  readonly declaringComponent: string | undefined;
  /** 1 for direct injection points, incremented for nested lookups. */
  readonly nestingLevel: number;
}

export function describeDependency<T>(
  request: DependencyRequest<T>,
  declaringComponent?: string,
  nestingLevel = 1
): DependencyDescriptor<T> {
  return Object.freeze({
    type: request.type,
    shape: request.shape ?? 'scalar',
    required: request.required ?? true,
    name: request.name,
    keyType: request.keyType ?? 'string',
    declaringComponent,
    nestingLevel,
  });
}

export function isMultiElement(descriptor: DependencyDescriptor): boolean {
  return descriptor.shape !== 'scalar';
}

/**
 * Copy of a descriptor one level deeper, used when a lazily resolved value
 * (a stream) performs its own lookups later.
 */
export function nestedDescriptor<T>(descriptor: DependencyDescriptor<T>): DependencyDescriptor<T> {
  return Object.freeze({ ...descriptor, nestingLevel: descriptor.nestingLevel + 1 });
}

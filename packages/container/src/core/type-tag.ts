import type { Constructor } from '../types/types.js';

/**
 * Branded type for canonical type identifiers.
 * Prevents accidental use of raw strings as type IDs.
 */
export type TypeId = string & { __brand: 'TypeId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates tags with the value type they describe without runtime overhead.
 */
declare const TYPE_BRAND: unique symbol;

/**
 * Runtime identity of a component type.
 *
 * TypeScript erases interfaces, so every definition carries a tag instead of
 * relying on reflection. A tag lists the tags it is assignable to
 * (`supertypes`) and may carry a `guard` used for the final
 * type-compatibility check on produced values.
 *
 * @template T - The type of value this tag describes
 */
export interface TypeTag<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'type';

  /** Unique canonical identifier (type_1, type_2, etc.) */
  readonly id: TypeId;

  /** Human-readable label for debugging and error messages */
  readonly label: string;

  /** Direct supertypes; assignability follows them transitively */
  readonly supertypes: readonly TypeTag[];

  /** Optional runtime check applied to produced values */
  readonly guard?: (value: unknown) => boolean;

  /** Phantom type brand - associates tag with its value type */
  readonly [TYPE_BRAND]: T;
}

export interface TypeTagOptions<T> {
  /** Tags this type is assignable to. */
  extends?: readonly TypeTag[];
  /** Runtime check for produced values. */
  guard?: (value: unknown) => value is T;
  /** Shorthand for a guard built from `instanceof`. */
  instanceOf?: Constructor<T>;
}

/**
 * Global counter for generating unique type IDs.
 */
let _typeCounter = 0;

/**
 * Create a new type tag.
 *
 * @example
 * ```typescript
 * const RepositoryT = typeTag<Repository>('Repository');
 * const UserRepositoryT = typeTag<UserRepository>('UserRepository', {
 *   extends: [RepositoryT],
 *   instanceOf: UserRepository,
 * });
 * ```
 */
export function typeTag<T = unknown>(label?: string, options: TypeTagOptions<T> = {}): TypeTag<T> {
  const resolvedLabel = label ?? 'Type';
  const id = `type_${++_typeCounter}` as TypeId;
  const ctor = options.instanceOf;
  const guard: ((value: unknown) => boolean) | undefined =
    options.guard ?? (ctor ? (value: unknown) => value instanceof ctor : undefined);

  for (const parent of options.extends ?? []) {
    if (!isTypeTag(parent)) {
      throw new TypeError(`typeTag('${resolvedLabel}'): 'extends' entries must be type tags`);
    }
  }

  const tag = {
    kind: 'type' as const,
    id,
    label: resolvedLabel,
    supertypes: Object.freeze([...(options.extends ?? [])]),
    ...(guard ? { guard } : {}),
  };
  return Object.freeze(tag) as TypeTag<T>;
}

/**
 * Runtime type guard to check if a value is a valid TypeTag.
 */
export function isTypeTag(x: unknown): x is TypeTag<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as TypeTag).kind === 'type' &&
    typeof (x as TypeTag).id === 'string' &&
    typeof (x as TypeTag).label === 'string' &&
    Array.isArray((x as TypeTag).supertypes)
  );
}

/**
 * Create several tags at once with a shared label prefix.
 *
 * @example
 * ```typescript
 * const types = defineTypes('User', {
 *   Repository: null as unknown as UserRepository,
 *   Service: null as unknown as UserService,
 * });
 * // types.Repository: TypeTag<UserRepository>, label 'UserRepository'
 * ```
 */
export function defineTypes<T extends Record<string, unknown>>(
  prefix: string,
  shape: T,
  options: { extends?: readonly TypeTag[] } = {}
): { [K in keyof T]: TypeTag<T[K]> } {
  const result = {} as { [K in keyof T]: TypeTag<T[K]> };

  (Object.keys(shape) as Array<keyof T>).forEach((key) => {
    result[key] = typeTag<T[typeof key]>(`${prefix}${String(key)}`, { extends: options.extends });
  });

  return result;
}

import type { TypeId, TypeTag } from './type-tag.js';

/**
 * Type-introspection capability consulted by the resolver.
 *
 * The default implementation walks tag supertypes; a custom matcher can
 * answer assignability from any other source (generated metadata, schema
 * registries).
 */
export interface TypeMatcher {
  /** Whether a component declared as `candidate` may be injected where `target` is requested. */
  isAssignable(candidate: TypeTag, target: TypeTag): boolean;
  /** Whether a produced value satisfies `target`. */
  isInstance(value: unknown, target: TypeTag): boolean;
}

/**
 * Default matcher: a tag is assignable to itself and to every tag reachable
 * through `supertypes`. Results are memoized per (candidate, target) pair.
 */
export class TagHierarchyMatcher implements TypeMatcher {
  private readonly memo = new Map<TypeId, Map<TypeId, boolean>>();

  isAssignable(candidate: TypeTag, target: TypeTag): boolean {
    if (candidate.id === target.id) return true;

    let row = this.memo.get(candidate.id);
    if (!row) {
      row = new Map();
      this.memo.set(candidate.id, row);
    }
    const cached = row.get(target.id);
    if (cached !== undefined) return cached;

    const result = this.walk(candidate, target.id, new Set());
    row.set(target.id, result);
    return result;
  }

  isInstance(value: unknown, target: TypeTag): boolean {
    if (value === undefined) return false;
    return target.guard ? target.guard(value) : true;
  }

  private walk(tag: TypeTag, targetId: TypeId, seen: Set<TypeId>): boolean {
    if (tag.id === targetId) return true;
    if (seen.has(tag.id)) return false;
    seen.add(tag.id);
    for (const parent of tag.supertypes) {
      if (this.walk(parent, targetId, seen)) return true;
    }
    return false;
  }
}

/*
 * DependencyResolver
 * ------------------
 * Answers "what goes into this injection point": given a descriptor (element
 * type, shape, required flag, declaring component, name hint) it
 *
 *  1. returns a registered resolvable value when one matches,
 *  2. collects candidates from this factory and then its ancestors,
 *  3. drops self-references and non-autowire candidates,
 *  4. assembles every candidate for multi-element shapes, or
 *  5. picks exactly one for scalar requests: primary, then lowest priority,
 *     then name hint.
 *
 * Every resolved value is checked against the requested type, and
 * dependencies of a declaring component are recorded so that destruction
 * runs in the right order.
 */

import {
  AmbiguousMatchError,
  AmbiguousPrimaryError,
  AmbiguousPriorityError,
  NoMatchError,
  TypeMismatchError,
} from '../errors/errors.js';
import type { ComponentFactory } from './component-factory.js';
import {
  isMultiElement,
  nestedDescriptor,
  type DependencyDescriptor,
} from './dependency-descriptor.js';
import { stripFactoryPrefix } from './factory-component.js';
import type { TypeMatcher } from './type-matcher.js';
import type { TypeTag } from './type-tag.js';

export interface Candidate {
  readonly name: string;
  /** Factory owning the candidate; an ancestor for inherited candidates. */
  readonly owner: ComponentFactory;
  readonly local: boolean;
}

export interface CandidateMetadata {
  readonly primary: boolean;
  readonly priority: number | undefined;
  readonly order: number | undefined;
  readonly autowireCandidate: boolean;
  /** Owner component of a factory-method definition. */
  readonly factoryComponent: string | undefined;
}

/** Type predicate over a matcher, so checked values narrow to `T`. */
export function isOfType<T>(matcher: TypeMatcher, value: unknown, type: TypeTag<T>): value is T {
  return matcher.isInstance(value, type);
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? `instance of ${ctor.name}` : 'object';
  }
  return `${typeof value} ${String(value)}`;
}

const byOrderThenPriority = (
  a: { meta: CandidateMetadata; index: number },
  b: { meta: CandidateMetadata; index: number }
): number => {
  const inf = Number.POSITIVE_INFINITY;
  const oa = a.meta.order ?? inf;
  const ob = b.meta.order ?? inf;
  if (oa !== ob) return oa - ob;
  const pa = a.meta.priority ?? inf;
  const pb = b.meta.priority ?? inf;
  if (pa !== pb) return pa - pb;
  return a.index - b.index;
};

export class DependencyResolver {
  constructor(private readonly factory: ComponentFactory) {}

  /**
   * Resolve a descriptor into a value of the requested shape.
   *
   * @throws NoMatchError when a required scalar has no candidate
   * @throws AmbiguousPrimaryError | AmbiguousPriorityError | AmbiguousMatchError
   * @throws TypeMismatchError when a produced value fails the type check
   */
  resolve(descriptor: DependencyDescriptor, path: readonly string[]): unknown {
    const shortcut = this.factory.findResolvableValue(descriptor.type);
    if (shortcut !== undefined) {
      return isMultiElement(descriptor)
        ? this.assemble(descriptor, [{ key: descriptor.type.label, value: shortcut.value }])
        : shortcut.value;
    }

    if (isMultiElement(descriptor)) return this.resolveMultiple(descriptor, path);

    const chosen = this.select(descriptor, path);
    if (!chosen) return undefined;
    return this.obtain(chosen, descriptor, path);
  }

  /**
   * Pick the single candidate a scalar descriptor resolves to, without
   * creating it.
   */
  select(descriptor: DependencyDescriptor, path: readonly string[]): Candidate | undefined {
    const candidates = this.findCandidates(descriptor);

    if (candidates.length === 0) {
      if (descriptor.required) {
        throw new NoMatchError(descriptor.type.label, path, descriptor.declaringComponent);
      }
      return undefined;
    }
    if (candidates.length === 1) return candidates[0];

    const chosen =
      this.determinePrimary(candidates, descriptor, path) ??
      this.determineHighestPriority(candidates, descriptor, path) ??
      this.matchNameHint(candidates, descriptor);
    if (chosen) return chosen;

    if (!descriptor.required) return undefined;
    throw new AmbiguousMatchError(
      descriptor.type.label,
      candidates.map((c) => c.name),
      path
    );
  }

  /**
   * Candidates for the element type of `descriptor`: local names first, in
   * registration order, then inherited ones not shadowed locally.
   */
  findCandidates(descriptor: DependencyDescriptor): Candidate[] {
    const all = this.collect(descriptor.type);
    const declaring = descriptor.declaringComponent;

    const accepted = all.filter((c) => !this.isSelfReference(c, declaring) && this.meta(c).autowireCandidate);
    if (accepted.length > 0 || isMultiElement(descriptor) || declaring === undefined) return accepted;

    return all.filter((c) => this.isSelfReference(c, declaring) && this.meta(c).autowireCandidate);
  }

  private collect(type: TypeTag): Candidate[] {
    const out: Candidate[] = [];
    const seen = new Set<string>();
    let factory: ComponentFactory | undefined = this.factory;
    let local = true;
    while (factory) {
      for (const name of factory.getNamesForType(type)) {
        const key = stripFactoryPrefix(name);
        if (seen.has(key)) continue;
        seen.add(key);
        out.push({ name, owner: factory, local });
      }
      // Names defined at this level shadow same-named ancestors even when
      // their type does not match.
      for (const name of factory.getLocalNames()) seen.add(name);
      factory = factory.parentFactory;
      local = false;
    }
    return out;
  }

  private meta(candidate: Candidate): CandidateMetadata {
    return candidate.owner.candidateMetadata(candidate.name);
  }

  private isSelfReference(candidate: Candidate, declaring: string | undefined): boolean {
    if (declaring === undefined) return false;
    if (stripFactoryPrefix(candidate.name) === declaring) return true;
    return candidate.local && this.meta(candidate).factoryComponent === declaring;
  }

  private determinePrimary(
    candidates: readonly Candidate[],
    descriptor: DependencyDescriptor,
    path: readonly string[]
  ): Candidate | undefined {
    let primary: Candidate | undefined;
    for (const candidate of candidates) {
      if (!this.meta(candidate).primary) continue;
      if (!primary) {
        primary = candidate;
      } else if (candidate.local && primary.local) {
        throw new AmbiguousPrimaryError(descriptor.type.label, [primary.name, candidate.name], path);
      } else if (candidate.local) {
        primary = candidate;
      }
    }
    return primary;
  }

  private determineHighestPriority(
    candidates: readonly Candidate[],
    descriptor: DependencyDescriptor,
    path: readonly string[]
  ): Candidate | undefined {
    let best: Candidate | undefined;
    let bestPriority = Number.POSITIVE_INFINITY;
    let tied: string[] = [];

    for (const candidate of candidates) {
      const priority = this.meta(candidate).priority;
      if (priority === undefined) continue;
      if (priority < bestPriority) {
        best = candidate;
        bestPriority = priority;
        tied = [candidate.name];
      } else if (priority === bestPriority) {
        tied.push(candidate.name);
      }
    }

    if (tied.length > 1) {
      throw new AmbiguousPriorityError(descriptor.type.label, tied, bestPriority, path);
    }
    return best;
  }

  private matchNameHint(candidates: readonly Candidate[], descriptor: DependencyDescriptor): Candidate | undefined {
    const hint = descriptor.name;
    if (hint === undefined) return undefined;
    return candidates.find((c) => c.owner.matchesName(c.name, hint));
  }

  private resolveMultiple(descriptor: DependencyDescriptor, path: readonly string[]): unknown {
    if (descriptor.shape === 'map' && descriptor.keyType !== 'string') {
      throw new TypeMismatchError(
        descriptor.declaringComponent ?? descriptor.type.label,
        `Map<string, ${descriptor.type.label}>`,
        `Map<${descriptor.keyType}, ${descriptor.type.label}>`,
        path
      );
    }

    if (descriptor.shape === 'stream') {
      const nested = nestedDescriptor(descriptor);
      const ordered = () => this.ordered(this.findCandidates(nested));
      const obtain = (c: Candidate) => this.obtain(c, nested, path);
      return {
        *[Symbol.iterator]() {
          for (const candidate of ordered()) yield obtain(candidate);
        },
      };
    }

    const entries = this.ordered(this.findCandidates(descriptor)).map((candidate) => ({
      key: candidate.name,
      value: this.obtain(candidate, descriptor, path),
    }));
    return this.assemble(descriptor, entries);
  }

  private ordered(candidates: readonly Candidate[]): Candidate[] {
    return candidates
      .map((candidate, index) => ({ candidate, index, meta: this.meta(candidate) }))
      .sort(byOrderThenPriority)
      .map(({ candidate }) => candidate);
  }

  private assemble(descriptor: DependencyDescriptor, entries: readonly { key: string; value: unknown }[]): unknown {
    switch (descriptor.shape) {
      case 'collection':
        return new Set(entries.map((e) => e.value));
      case 'map':
        return new Map(entries.map((e) => [e.key, e.value]));
      case 'stream': {
        const values = entries.map((e) => e.value);
        return { [Symbol.iterator]: () => values[Symbol.iterator]() };
      }
      default:
        return entries.map((e) => e.value);
    }
  }

  /** Create or fetch a chosen candidate, record the dependency, check the type. */
  private obtain(candidate: Candidate, descriptor: DependencyDescriptor, path: readonly string[]): unknown {
    const value = candidate.owner.getInstanceInternal(candidate.name, path);
    const declaring = descriptor.declaringComponent;
    if (declaring !== undefined && candidate.local) {
      this.factory.cache.registerDependent(stripFactoryPrefix(candidate.name), declaring);
    }
    if (!this.factory.matcher.isInstance(value, descriptor.type)) {
      throw new TypeMismatchError(candidate.name, descriptor.type.label, describeValue(value), path);
    }
    return value;
  }
}

/*
 * DefinitionStore
 * ---------------
 * Registry of named component definitions and their aliases, owned by one
 * container.
 *
 * Responsibilities
 *  - enforce the override policy and report overrides at a level matching
 *    how significant they are
 *  - maintain the alias graph (alias -> name, possibly chained)
 *  - merge definitions with their parent chain into frozen snapshots, cached
 *    per name and invalidated in cascade when a definition changes
 *  - cache "names for type" answers once the registry is frozen
 *
 * Registration order is preserved: eager singletons are created and
 * multi-element injections are assembled in that order.
 */

import type { TypeMatcher } from '../core/type-matcher.js';
import type { TypeId, TypeTag } from '../core/type-tag.js';
import { DefinitionConflict, DefinitionNotFound } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import { roleRank } from '../types/types.js';
import {
  definitionsEqual,
  snapshotDefinition,
  validateDefinition,
  type ComponentDefinition,
} from './component-definition.js';
import { mergeDefinitions, type MergedDefinition } from './merged-definition.js';

export interface DefinitionStoreOptions {
  allowOverriding: boolean;
  logger: Logger;
  /** Called after the definition under `name` was replaced or removed. */
  onReset?: (name: string) => void;
}

export class DefinitionStore {
  private readonly definitions = new Map<string, Readonly<ComponentDefinition>>();
  private readonly aliases = new Map<string, string>();
  private readonly merged = new Map<string, MergedDefinition>();
  private readonly stale = new WeakSet<MergedDefinition>();
  private readonly byType = new Map<TypeId, readonly string[]>();

  private frozen = false;
  private frozenNames: readonly string[] | undefined;

  constructor(private readonly options: DefinitionStoreOptions) {}

  get size(): number {
    return this.definitions.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Register or replace the definition stored under `name`.
   *
   * @throws InvalidDefinitionError when the definition is malformed
   * @throws DefinitionConflict when the name is an alias, or overriding is disabled
   */
  register(name: string, def: ComponentDefinition): void {
    validateDefinition(name, def);

    if (this.aliases.has(name)) {
      throw new DefinitionConflict(name, `'${name}' is already an alias for '${this.aliases.get(name)}'`);
    }

    const existing = this.definitions.get(name);
    if (existing) {
      if (!this.options.allowOverriding) {
        throw new DefinitionConflict(name, 'a definition with this name already exists and overriding is disabled');
      }
      this.logOverride(name, existing, def);
    }

    this.definitions.set(name, snapshotDefinition(def));
    this.frozenNames = undefined;
    this.byType.clear();
    if (existing) this.reset(name);
  }

  /**
   * @throws DefinitionNotFound for an unknown name
   */
  remove(name: string): void {
    if (!this.definitions.delete(name)) {
      throw new DefinitionNotFound(name, this.names());
    }
    this.frozenNames = undefined;
    this.byType.clear();
    this.reset(name);
  }

  /** The registered definition, frozen; register a new one to change it. */
  get(name: string): Readonly<ComponentDefinition> {
    const def = this.definitions.get(name);
    if (!def) throw new DefinitionNotFound(name, this.names());
    return def;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): readonly string[] {
    if (this.frozen) {
      return (this.frozenNames ??= Object.freeze([...this.definitions.keys()]));
    }
    return [...this.definitions.keys()];
  }

  /**
   * Merged view of `name` and its parent chain. Cached until the definition
   * or one of its ancestors changes.
   *
   * @throws DefinitionNotFound for an unknown name or parent
   * @throws DefinitionConflict when the parent chain loops
   */
  getMerged(name: string): MergedDefinition {
    return this.mergeChain(name, []);
  }

  /** Whether a snapshot was invalidated after it was handed out. */
  isStale(merged: MergedDefinition): boolean {
    return this.stale.has(merged);
  }

  freeze(): void {
    this.frozen = true;
    this.frozenNames = undefined;
  }

  registerAlias(name: string, alias: string): void {
    if (alias === name) {
      this.aliases.delete(alias);
      return;
    }
    if (this.definitions.has(alias)) {
      throw new DefinitionConflict(alias, `cannot alias '${alias}' to '${name}': a definition already uses that name`);
    }
    const current = this.aliases.get(alias);
    if (current === name) return;
    if (current !== undefined) {
      if (!this.options.allowOverriding) {
        throw new DefinitionConflict(alias, `alias already points to '${current}'`);
      }
      this.options.logger.debug(`Overriding alias '${alias}': '${current}' -> '${name}'`);
    }
    if (this.resolvesThrough(name, alias)) {
      throw new DefinitionConflict(alias, `alias cycle: '${alias}' -> '${name}' leads back to '${alias}'`);
    }
    this.aliases.set(alias, name);
    this.byType.clear();
  }

  removeAlias(alias: string): void {
    if (!this.aliases.delete(alias)) {
      throw new DefinitionNotFound(alias, [...this.aliases.keys()]);
    }
  }

  isAlias(name: string): boolean {
    return this.aliases.has(name);
  }

  /** Follow aliases until a non-alias name is reached. */
  canonicalName(nameOrAlias: string): string {
    let current = nameOrAlias;
    let next = this.aliases.get(current);
    while (next !== undefined) {
      current = next;
      next = this.aliases.get(current);
    }
    return current;
  }

  /** Every alias, direct or chained, that resolves to `name`. */
  aliasesOf(name: string): readonly string[] {
    const out: string[] = [];
    for (const [alias, target] of this.aliases) {
      if (target === name) {
        out.push(alias, ...this.aliasesOf(alias));
      }
    }
    return out;
  }

  /**
   * Concrete definition names whose merged type is assignable to `tag`, in
   * registration order. Cached per tag while the registry is frozen.
   */
  namesForType(tag: TypeTag, matcher: TypeMatcher): readonly string[] {
    const cached = this.frozen ? this.byType.get(tag.id) : undefined;
    if (cached) return cached;

    const result: string[] = [];
    for (const name of this.names()) {
      const merged = this.getMerged(name);
      if (merged.abstract || !merged.type) continue;
      if (matcher.isAssignable(merged.type, tag)) result.push(name);
    }

    const frozenResult = Object.freeze(result);
    if (this.frozen) this.byType.set(tag.id, frozenResult);
    return frozenResult;
  }

  /**
   * Drop cached merged snapshots of every name for which `keep` is false, and
   * the by-type cache.
   */
  clearMetadataCache(keep: (name: string) => boolean = () => false): void {
    for (const [name, merged] of [...this.merged]) {
      if (keep(name)) continue;
      this.stale.add(merged);
      this.merged.delete(name);
    }
    this.byType.clear();
  }

  private mergeChain(name: string, visiting: string[]): MergedDefinition {
    const cached = this.merged.get(name);
    if (cached) return cached;

    if (visiting.includes(name)) {
      throw new DefinitionConflict(name, `parent chain loops: ${[...visiting, name].join(' -> ')}`);
    }

    const def = this.definitions.get(name);
    if (!def) throw new DefinitionNotFound(name, this.names(), visiting);

    let parent: MergedDefinition | undefined;
    if (def.parent !== undefined) {
      const parentName = this.canonicalName(def.parent);
      parent = this.mergeChain(parentName, [...visiting, name]);
    }

    const merged = mergeDefinitions(name, def, parent);
    this.merged.set(name, merged);
    return merged;
  }

  /** Invalidate `name` and, in cascade, every definition inheriting from it. */
  private reset(name: string, seen = new Set<string>()): void {
    if (seen.has(name)) return;
    seen.add(name);

    const merged = this.merged.get(name);
    if (merged) {
      this.stale.add(merged);
      this.merged.delete(name);
    }
    this.options.onReset?.(name);

    const aliases = new Set([name, ...this.aliasesOf(name)]);
    for (const [childName, child] of this.definitions) {
      if (child.parent !== undefined && aliases.has(child.parent)) {
        this.reset(childName, seen);
      }
    }
  }

  private resolvesThrough(name: string, alias: string): boolean {
    let current: string | undefined = name;
    while (current !== undefined) {
      if (current === alias) return true;
      current = this.aliases.get(current);
    }
    return false;
  }

  private logOverride(name: string, existing: ComponentDefinition, next: ComponentDefinition): void {
    const { logger } = this.options;
    const from = existing.role ?? 'application';
    const to = next.role ?? 'application';
    if (roleRank(from) < roleRank(to)) {
      logger.info(`Overriding definition '${name}' with a more internal one`, { from, to });
    } else if (!definitionsEqual(existing, next)) {
      logger.debug(`Overriding definition '${name}' with a different definition`);
    } else {
      logger.trace(`Overriding definition '${name}' with an equivalent definition`);
    }
  }
}

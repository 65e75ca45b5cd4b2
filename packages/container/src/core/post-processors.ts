import type { DefinitionRegistry } from '../definition/component-definition.js';
import type { MergedDefinition } from '../definition/merged-definition.js';
import type { ComponentFactory } from './component-factory.js';

/**
 * Hooks into the creation of every component of a container. All methods
 * are optional; returning `undefined` from a replacing hook keeps the
 * current instance.
 */
export interface InstancePostProcessor {
  /** Lower values run first. Unprioritized processors run last, in registration order. */
  readonly priority?: number;

  /** Return a value to skip the container's own instantiation entirely. */
  beforeInstantiation?(name: string, definition: MergedDefinition): unknown;

  /** Return `false` to skip property population. */
  afterInstantiation?(instance: unknown, name: string): boolean | void;

  /**
   * Produce the reference handed out to components that need this singleton
   * before it is fully initialized.
   */
  earlyReference?(instance: unknown, name: string): unknown;

  beforeInit?(instance: unknown, name: string): unknown;

  afterInit?(instance: unknown, name: string): unknown;

  beforeDestruction?(instance: unknown, name: string): void;
}

/**
 * Hooks run during refresh, after definitions are loaded and before any
 * component is created.
 */
export interface DefinitionPostProcessor {
  readonly priority?: number;

  /**
   * Registry phase: may register further definitions, including more
   * definition post-processors, which then run in the same refresh.
   */
  postProcessRegistry?(registry: DefinitionRegistry): void;

  /** Factory phase: runs once every registry phase is done. */
  postProcessFactory?(factory: ComponentFactory): void;
}

export interface InterceptionContext {
  readonly name: string;
  /** True when wrapping an early reference handed out during a cycle. */
  readonly early: boolean;
}

/**
 * Opaque capability able to substitute a component with a wrapper (proxy,
 * decorator, instrumented copy). Returning the instance unchanged means no
 * interception.
 */
export interface InstanceInterceptor {
  intercept(instance: unknown, context: InterceptionContext): unknown;
}

/**
 * Applies an interceptor once per component, whether the component is first
 * exposed early (during a reference cycle) or after initialization. The early
 * and late paths share the wrapper produced first.
 */
export class InterceptingPostProcessor implements InstancePostProcessor {
  private readonly earlyWrapped = new Map<string, unknown>();

  constructor(
    private readonly interceptor: InstanceInterceptor,
    readonly priority?: number
  ) {}

  earlyReference(instance: unknown, name: string): unknown {
    this.earlyWrapped.set(name, instance);
    return this.interceptor.intercept(instance, { name, early: true });
  }

  afterInit(instance: unknown, name: string): unknown {
    const wrappedEarly = this.earlyWrapped.has(name) && this.earlyWrapped.get(name) === instance;
    this.earlyWrapped.delete(name);
    if (wrappedEarly) return instance;
    return this.interceptor.intercept(instance, { name, early: false });
  }
}

/**
 * Stable sort by `priority` ascending; entries without one keep their
 * relative order after every prioritized entry.
 */
export function sortByPriority<T extends { readonly priority?: number }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      const pa = a.item.priority ?? Number.POSITIVE_INFINITY;
      const pb = b.item.priority ?? Number.POSITIVE_INFINITY;
      return pa === pb ? a.index - b.index : pa - pb;
    })
    .map(({ item }) => item);
}

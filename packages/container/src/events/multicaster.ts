import { sortByPriority } from '../core/post-processors.js';
import { hasMethod } from '../types/types.js';
import type { ContainerEvent } from './events.js';

export interface EventListener<E = ContainerEvent> {
  /** Lower values are notified first. Unprioritized listeners follow, in registration order. */
  readonly priority?: number;
  /** Return false to skip an event. Every event is delivered when absent. */
  supports?(event: ContainerEvent): boolean;
  onEvent(event: E): void;
}

export const isEventListener = (value: unknown): value is EventListener => hasMethod(value, 'onEvent');

/**
 * Build a listener notified only of instances of `eventClass`.
 *
 * @example
 * ```typescript
 * container.addListener(listen(RefreshedEvent, () => logger.info('ready')));
 * ```
 */
export function listen<E extends ContainerEvent>(
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  eventClass: abstract new (...args: any[]) => E,
  handler: (event: E) => void,
  options: { priority?: number } = {}
): EventListener<E> {
  return {
    priority: options.priority,
    supports: (event) => event instanceof eventClass,
    onEvent: handler,
  };
}

/**
 * Delivers events to listeners. Listeners declared as definitions are added
 * by name with a resolver, and created on first delivery.
 */
export interface EventMulticaster {
  addListener(listener: EventListener): void;
  addListenerName(name: string, resolve: () => EventListener): void;
  removeListener(listener: EventListener): void;
  removeAllListeners(): void;
  multicast(event: ContainerEvent): void;
}

export class SimpleEventMulticaster implements EventMulticaster {
  private readonly listeners: EventListener[] = [];
  private readonly named = new Map<string, () => EventListener>();
  private ordered: EventListener[] | undefined;

  addListener(listener: EventListener): void {
    if (this.listeners.includes(listener)) return;
    this.listeners.push(listener);
    this.ordered = undefined;
  }

  addListenerName(name: string, resolve: () => EventListener): void {
    this.named.set(name, resolve);
    this.ordered = undefined;
  }

  removeListener(listener: EventListener): void {
    const idx = this.listeners.indexOf(listener);
    if (idx >= 0) this.listeners.splice(idx, 1);
    this.ordered = undefined;
  }

  removeAllListeners(): void {
    this.listeners.length = 0;
    this.named.clear();
    this.ordered = undefined;
  }

  /**
   * Notify every supporting listener in priority order. A listener that
   * throws stops delivery and the error reaches the publisher.
   */
  multicast(event: ContainerEvent): void {
    for (const listener of this.resolveListeners()) {
      if (listener.supports && !listener.supports(event)) continue;
      listener.onEvent(event);
    }
  }

  private resolveListeners(): EventListener[] {
    if (this.ordered) return this.ordered;
    const resolved = [...this.listeners];
    for (const resolve of this.named.values()) {
      const listener = resolve();
      if (!resolved.includes(listener)) resolved.push(listener);
    }
    this.ordered = sortByPriority(resolved);
    return this.ordered;
  }
}

/* EventBus
 *
 * Publishing front of a container. Until a multicaster is attached, events
 * are buffered in publication order; attaching flushes the buffer, and
 * later events are delivered immediately. Every event then travels on to the
 * parent publisher, if any.
 *
 * The buffer is open from construction, so events published before the
 * first refresh are delivered when refresh attaches the multicaster.
 */

import { ContainerEvent, PayloadEvent, type EventPublisher } from './events.js';
import type { EventMulticaster } from './multicaster.js';

export class EventBus implements EventPublisher {
  private early: ContainerEvent[] | undefined = [];
  private multicaster: EventMulticaster | undefined;

  constructor(
    private readonly source: unknown,
    private readonly parent?: EventPublisher
  ) {}

  get isBuffering(): boolean {
    return this.early !== undefined;
  }

  get bufferedCount(): number {
    return this.early?.length ?? 0;
  }

  publish(event: unknown): void {
    const containerEvent = event instanceof ContainerEvent ? event : new PayloadEvent(this.source, event);

    if (this.early) {
      this.early.push(containerEvent);
    } else if (this.multicaster) {
      this.multicaster.multicast(containerEvent);
    }

    this.parent?.publish(containerEvent);
  }

  /** Deliver through `multicaster` from now on, starting with the buffered events. */
  attach(multicaster: EventMulticaster): void {
    this.multicaster = multicaster;
    const buffered = this.early ?? [];
    this.early = undefined;
    for (const event of buffered) multicaster.multicast(event);
  }

  /** Detach the multicaster and start buffering again. */
  reset(): void {
    this.multicaster = undefined;
    this.early ??= [];
  }
}

/**
 * Base class of events published through a container.
 *
 * Anything else handed to `publish()` is wrapped in a {@link PayloadEvent}.
 */
export abstract class ContainerEvent {
  /** Epoch milliseconds at construction. */
  readonly timestamp = Date.now();

  constructor(readonly source: unknown) {}
}

/** Published at the end of a successful refresh. */
export class RefreshedEvent extends ContainerEvent {
  readonly kind = 'refreshed';
}

/** Published first thing when a container closes. */
export class ClosedEvent extends ContainerEvent {
  readonly kind = 'closed';
}

export class StartedEvent extends ContainerEvent {
  readonly kind = 'started';
}

export class StoppedEvent extends ContainerEvent {
  readonly kind = 'stopped';
}

/** Arbitrary value published as an event. */
export class PayloadEvent<T = unknown> extends ContainerEvent {
  constructor(
    source: unknown,
    readonly payload: T
  ) {
    super(source);
  }
}

export interface EventPublisher {
  publish(event: unknown): void;
}

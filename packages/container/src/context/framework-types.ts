/*
 * Type tags of the container's own collaborators. Components request them
 * like any other dependency; definitions declare them to plug in listeners
 * and post-processors.
 */

import type { ComponentFactory } from '../core/component-factory.js';
import type { DefinitionPostProcessor, InstancePostProcessor } from '../core/post-processors.js';
import { typeTag } from '../core/type-tag.js';
import type { EventPublisher } from '../events/events.js';
import { isEventListener, type EventListener, type EventMulticaster } from '../events/multicaster.js';
import { hasMethod } from '../types/types.js';
import type { Container } from './container.js';
import { isMessageResolver, type MessageResolver } from './message-resolver.js';

export type Properties = Readonly<Record<string, string | undefined>>;

export const EVENT_PUBLISHER = typeTag<EventPublisher>('EventPublisher', {
  guard: (v): v is EventPublisher => hasMethod(v, 'publish'),
});

export const MESSAGE_RESOLVER = typeTag<MessageResolver>('MessageResolver', { guard: isMessageResolver });

export const CONTAINER = typeTag<Container>('Container', {
  extends: [EVENT_PUBLISHER, MESSAGE_RESOLVER],
  guard: (v): v is Container => hasMethod(v, 'refresh') && hasMethod(v, 'getInstance'),
});

export const COMPONENT_FACTORY = typeTag<ComponentFactory>('ComponentFactory', {
  guard: (v): v is ComponentFactory => hasMethod(v, 'preInstantiateSingletons'),
});

export const PROPERTIES = typeTag<Properties>('Properties', {
  guard: (v): v is Properties => typeof v === 'object' && v !== null,
});

export const LISTENER = typeTag<EventListener>('EventListener', { guard: isEventListener });

export const EVENT_MULTICASTER = typeTag<EventMulticaster>('EventMulticaster', {
  guard: (v): v is EventMulticaster => hasMethod(v, 'multicast') && hasMethod(v, 'addListener'),
});

export const DEFINITION_POST_PROCESSOR = typeTag<DefinitionPostProcessor>('DefinitionPostProcessor', {
  guard: (v): v is DefinitionPostProcessor =>
    hasMethod(v, 'postProcessRegistry') || hasMethod(v, 'postProcessFactory'),
});

const INSTANCE_HOOKS = [
  'beforeInstantiation',
  'afterInstantiation',
  'earlyReference',
  'beforeInit',
  'afterInit',
  'beforeDestruction',
] as const;

export const INSTANCE_POST_PROCESSOR = typeTag<InstancePostProcessor>('InstancePostProcessor', {
  guard: (v): v is InstancePostProcessor => INSTANCE_HOOKS.some((hook) => hasMethod(v, hook)),
});

/** Definition names that replace the container's default collaborators. */
export const MESSAGE_RESOLVER_NAME = 'messageResolver';
export const EVENT_MULTICASTER_NAME = 'eventMulticaster';
export const PROPERTIES_NAME = 'properties';

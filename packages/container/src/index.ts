export { Container, type ContainerState } from './context/container.js';
export {
  COMPONENT_FACTORY,
  CONTAINER,
  DEFINITION_POST_PROCESSOR,
  EVENT_MULTICASTER,
  EVENT_MULTICASTER_NAME,
  EVENT_PUBLISHER,
  INSTANCE_POST_PROCESSOR,
  LISTENER,
  MESSAGE_RESOLVER,
  MESSAGE_RESOLVER_NAME,
  PROPERTIES,
  PROPERTIES_NAME,
  type Properties,
} from './context/framework-types.js';
export { LifecycleProcessor } from './context/lifecycle-processor.js';
export {
  DelegatingMessageResolver,
  formatMessage,
  type MessageResolver,
} from './context/message-resolver.js';

export { ObjectDefinitionSource } from './api/object-source.js';

export {
  inject,
  injectAll,
  injectOptional,
  ref,
  value,
  type ComponentDefinition,
  type DefinitionRegistry,
  type DefinitionSource,
  type FactoryMethodRef,
  type Injection,
} from './definition/component-definition.js';
export { DefinitionStore } from './definition/definition-store.js';
export { mergeDefinitions, type MergedDefinition } from './definition/merged-definition.js';

export { ComponentFactory } from './core/component-factory.js';
export type { DependencyRequest, DependencyShape, MapKeyType } from './core/dependency-descriptor.js';
export {
  FACTORY_COMPONENT,
  FACTORY_PREFIX,
  isFactoryComponent,
  type FactoryComponent,
} from './core/factory-component.js';
export { InstanceCache } from './core/instance-cache.js';
export {
  InterceptingPostProcessor,
  type DefinitionPostProcessor,
  type InstanceInterceptor,
  type InstancePostProcessor,
  type InterceptionContext,
} from './core/post-processors.js';
export { ContextScope, type CustomScope } from './core/scope.js';
export { TagHierarchyMatcher, type TypeMatcher } from './core/type-matcher.js';
export { defineTypes, isTypeTag, typeTag, type TypeId, type TypeTag, type TypeTagOptions } from './core/type-tag.js';

export { EventBus } from './events/event-bus.js';
export {
  ClosedEvent,
  ContainerEvent,
  PayloadEvent,
  RefreshedEvent,
  StartedEvent,
  StoppedEvent,
  type EventPublisher,
} from './events/events.js';
export {
  SimpleEventMulticaster,
  listen,
  type EventListener,
  type EventMulticaster,
} from './events/multicaster.js';

export {
  createConsoleLogger,
  silentLogger,
  type ConsoleLoggerOptions,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logging/logger.js';

export { ComponentScope, Role } from './types/types.js';
export type {
  ContainerAware,
  ContainerConfig,
  Constructor,
  Disposable,
  Factory,
  InstantiateHook,
  Lifecycle,
  NameAware,
  RoleType,
  ScopeName,
  SingletonsReadyAware,
} from './types/types.js';

// Errors
export {
  AmbiguousMatchError,
  AmbiguousPrimaryError,
  AmbiguousPriorityError,
  CircularReferenceError,
  ComponentCreationError,
  ContainerError,
  ContainerStateError,
  DefinitionConflict,
  DefinitionNotFound,
  InvalidContainerConfigError,
  InvalidDefinitionError,
  MissingPropertiesError,
  NoMatchError,
  PrototypeCycleError,
  RefreshFailure,
  ScopeDisposedError,
  ScopeNotFoundError,
  TypeMismatchError,
} from './errors/errors.js';

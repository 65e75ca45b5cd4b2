import type {
  ComponentDefinition,
  DefinitionRegistry,
  DefinitionSource,
} from '../definition/component-definition.js';

/**
 * Definition source backed by a plain object literal.
 *
 * @example
 * ```typescript
 * const container = new Container({
 *   sources: [
 *     new ObjectDefinitionSource(
 *       {
 *         clock: { type: ClockT, useClass: SystemClock },
 *         scheduler: { type: SchedulerT, useClass: Scheduler, args: [inject(ClockT)] },
 *       },
 *       { aliases: { clock: ['time'] } }
 *     ),
 *   ],
 * });
 * ```
 */
export class ObjectDefinitionSource implements DefinitionSource {
  constructor(
    private readonly definitions: Readonly<Record<string, ComponentDefinition>>,
    private readonly options: { aliases?: Readonly<Record<string, readonly string[]>> } = {}
  ) {}

  loadDefinitions(registry: DefinitionRegistry): void {
    for (const [name, definition] of Object.entries(this.definitions)) {
      registry.registerDefinition(name, definition);
    }
    for (const [name, aliases] of Object.entries(this.options.aliases ?? {})) {
      for (const alias of aliases) registry.registerAlias(name, alias);
    }
  }
}

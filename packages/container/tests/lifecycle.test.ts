import { describe, expect, it } from 'vitest';

import { Container } from '../src/context/container.js';
import { typeTag } from '../src/core/type-tag.js';
import { ref, type ComponentDefinition } from '../src/definition/component-definition.js';
import { silentLogger } from '../src/logging/logger.js';
import type { Lifecycle } from '../src/types/types.js';

class Service implements Lifecycle {
  private running = false;

  constructor(
    private readonly log: string[],
    private readonly label: string,
    readonly phase?: number,
    readonly autoStartup?: boolean
  ) {}

  start(): void {
    this.running = true;
    this.log.push(`start:${this.label}`);
  }

  stop(): void {
    this.running = false;
    this.log.push(`stop:${this.label}`);
  }

  isRunning(): boolean {
    return this.running;
  }
}

const ServiceT = typeTag<Service>('Service', { instanceOf: Service });

function service(
  log: string[],
  label: string,
  options: { phase?: number; autoStartup?: boolean; dependsOn?: string } = {}
): ComponentDefinition<Service> {
  return {
    type: ServiceT,
    useFactory: (dependency?: unknown) => {
      void dependency;
      return new Service(log, label, options.phase, options.autoStartup);
    },
    args: options.dependsOn ? [ref(options.dependsOn)] : [],
  };
}

function createContainer(): Container {
  return new Container({ logger: silentLogger, properties: {} });
}

describe('Lifecycle components', () => {
  it('start by ascending phase and stop by descending phase', () => {
    const log: string[] = [];
    const container = createContainer();
    container.registerDefinition('late', service(log, 'late', { phase: 10 }));
    container.registerDefinition('early', service(log, 'early', { phase: -1 }));
    container.registerDefinition('middle', service(log, 'middle'));

    container.refresh();
    expect(log).toEqual(['start:early', 'start:middle', 'start:late']);
    expect(container.isRunning()).toBe(true);

    log.length = 0;
    container.close();
    expect(log).toEqual(['stop:late', 'stop:middle', 'stop:early']);
  });

  it('start dependencies first and stop dependents first', () => {
    const log: string[] = [];
    const container = createContainer();
    container.registerDefinition('web', service(log, 'web', { dependsOn: 'db' }));
    container.registerDefinition('db', service(log, 'db', { phase: 5 }));

    container.refresh();
    expect(log).toEqual(['start:db', 'start:web']);

    log.length = 0;
    container.close();
    expect(log).toEqual(['stop:web', 'stop:db']);
  });

  it('leaves components without autoStartup for an explicit start', () => {
    const log: string[] = [];
    const container = createContainer();
    container.registerDefinition('auto', service(log, 'auto'));
    container.registerDefinition('manual', service(log, 'manual', { autoStartup: false }));

    container.refresh();
    expect(log).toEqual(['start:auto']);

    container.stop();
    expect(container.isRunning()).toBe(false);
    expect(log).toEqual(['start:auto', 'stop:auto']);

    container.start();
    expect(log).toEqual(['start:auto', 'stop:auto', 'start:auto', 'start:manual']);
  });

  it('does not restart running components', () => {
    const log: string[] = [];
    const container = createContainer();
    container.registerDefinition('auto', service(log, 'auto'));
    container.refresh();

    container.start();

    expect(log).toEqual(['start:auto']);
  });

  it('ignores a container registered as its own singleton', () => {
    const container = createContainer();
    container.registerSingleton('self', container);

    container.refresh();
    container.start();

    expect(container.isRunning()).toBe(true);
  });
});

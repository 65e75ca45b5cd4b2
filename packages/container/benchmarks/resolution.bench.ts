/**
 * Resolution Performance Benchmark
 *
 * Measures lookups on an active container.
 *
 * Scenarios:
 * 1. Singleton by name (completed-tier hit)
 * 2. Singleton by type (candidate lookup + tie-break)
 * 3. Prototype chain (fresh instance per lookup)
 * 4. Multi-element injection (array of every candidate)
 * 5. Custom scope (ContextScope hit and miss)
 */

import { Bench } from 'tinybench';

import { Container } from '../src/context/container.js';
import { ContextScope } from '../src/core/scope.js';
import { typeTag } from '../src/core/type-tag.js';
import { inject, injectAll } from '../src/definition/component-definition.js';
import { silentLogger } from '../src/logging/logger.js';

// ==================== Test Setup ====================

class Clock {
  now(): number {
    return 42;
  }
}

class Repository {
  constructor(readonly clock: Clock) {}
}

class Service {
  constructor(
    readonly repository: Repository,
    readonly clock: Clock
  ) {}
}

interface Handler {
  handle(): number;
}

const ClockT = typeTag<Clock>('Clock', { instanceOf: Clock });
const RepositoryT = typeTag<Repository>('Repository', { instanceOf: Repository });
const ServiceT = typeTag<Service>('Service', { instanceOf: Service });
const HandlerT = typeTag<Handler>('Handler');

const container = new Container({ name: 'bench', logger: silentLogger, properties: {} });
const requestScope = new ContextScope();
container.registerScope('request', requestScope);

container.registerDefinition('clock', { type: ClockT, useClass: Clock });
container.registerDefinition('repository', { type: RepositoryT, useClass: Repository, args: [inject(ClockT)] });
container.registerDefinition('service', {
  type: ServiceT,
  useClass: Service,
  args: [inject(RepositoryT), inject(ClockT)],
  scope: 'prototype',
});
for (let i = 0; i < 10; i++) {
  container.registerDefinition(`handler${i}`, {
    type: HandlerT,
    useFactory: () => ({ handle: () => i }),
    order: 10 - i,
    primary: i === 0,
  });
}
container.registerDefinition('handlers', {
  type: typeTag<Handler[]>('HandlerList'),
  useFactory: (handlers: Handler[]) => handlers,
  args: [injectAll(HandlerT)],
  scope: 'prototype',
});
container.registerDefinition('scopedRepository', {
  type: RepositoryT,
  useClass: Repository,
  args: [inject(ClockT)],
  scope: 'request',
  autowireCandidate: false,
});

container.refresh();

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('singleton by name', () => {
  const clock = container.getInstance('clock');
  if (!(clock instanceof Clock)) throw new Error('Invalid');
});

bench.add('singleton by type', () => {
  const repository = container.getInstance(RepositoryT);
  if (repository.clock.now() !== 42) throw new Error('Invalid');
});

bench.add('primary among 10 candidates', () => {
  const handler = container.getInstance(HandlerT);
  if (handler.handle() !== 0) throw new Error('Invalid');
});

bench.add('prototype with 2 dependencies', () => {
  const service = container.getInstance(ServiceT);
  if (service.repository.clock !== service.clock) throw new Error('Invalid');
});

bench.add('array of 10 ordered candidates', () => {
  const handlers = container.getInstance('handlers');
  if (!Array.isArray(handlers) || handlers.length !== 10) throw new Error('Invalid');
});

bench.add('custom scope hit', () => {
  const repository = container.getInstance('scopedRepository');
  if (!(repository instanceof Repository)) throw new Error('Invalid');
});

bench.add('custom scope miss (new scope per lookup)', () => {
  const scope = new ContextScope();
  container.registerScope('request', scope);
  const repository = container.getInstance('scopedRepository');
  if (!(repository instanceof Repository)) throw new Error('Invalid');
  scope.dispose();
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Resolution Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.hz ? task.result.hz.toLocaleString('en-US', { maximumFractionDigits: 0 }) : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
  }))
);

container.close();

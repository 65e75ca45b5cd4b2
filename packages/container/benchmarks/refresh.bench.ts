/**
 * Refresh Performance Benchmark
 *
 * Measures a full bootstrap and shutdown of containers of growing size.
 * Every component depends on its predecessor through a constructor argument
 * and on a shared registry through a property, so both the argument and the
 * early-reference paths are exercised.
 */

import { Bench } from 'tinybench';

import { Container } from '../src/context/container.js';
import { typeTag, type TypeTag } from '../src/core/type-tag.js';
import { inject, ref } from '../src/definition/component-definition.js';
import { silentLogger } from '../src/logging/logger.js';

// ==================== Test Setup ====================

class Registry {
  readonly members: ChainLink[] = [];
}

class ChainLink {
  registry?: Registry;

  constructor(readonly previous?: ChainLink) {}

  init(): void {
    this.registry?.members.push(this);
  }
}

const RegistryT = typeTag<Registry>('Registry', { instanceOf: Registry });

function buildContainer(size: number): Container {
  const container = new Container({ name: `chain-${size}`, logger: silentLogger, properties: {} });
  container.registerDefinition('registry', {
    type: RegistryT,
    useClass: Registry,
    properties: {},
  });

  let previous: TypeTag<ChainLink> | undefined;
  for (let i = 0; i < size; i++) {
    const tag = typeTag<ChainLink>(`ChainLink${i}`, { instanceOf: ChainLink });
    container.registerDefinition(`node${i}`, {
      type: tag,
      useClass: ChainLink,
      args: previous ? [inject(previous)] : [],
      properties: { registry: ref('registry') },
      initMethod: 'init',
    });
    previous = tag;
  }
  return container;
}

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

for (const size of [10, 100, 500]) {
  bench.add(`refresh + close: ${size} components`, () => {
    const container = buildContainer(size);
    container.refresh();
    const registry = container.getInstance(RegistryT);
    if (registry.members.length !== size) throw new Error('Invalid');
    container.close();
  });
}

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Refresh Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.hz ? task.result.hz.toLocaleString('en-US', { maximumFractionDigits: 0 }) : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
  }))
);

import { describe, expect, it } from 'vitest';

import * as arbor from '../src/index.js';

describe('Public API', () => {
  it('exports the container and its building blocks', () => {
    expect(typeof arbor.Container).toBe('function');
    expect(typeof arbor.ComponentFactory).toBe('function');
    expect(typeof arbor.ObjectDefinitionSource).toBe('function');
    expect(typeof arbor.ContextScope).toBe('function');
    expect(typeof arbor.SimpleEventMulticaster).toBe('function');
    expect(typeof arbor.typeTag).toBe('function');
    expect(typeof arbor.inject).toBe('function');
    expect(typeof arbor.createConsoleLogger).toBe('function');
  });

  it('exports every error class', () => {
    expect(new arbor.NoMatchError('Clock')).toBeInstanceOf(arbor.ContainerError);
    expect(new arbor.ScopeDisposedError()).toBeInstanceOf(arbor.ContainerError);
  });

  it('wires a container end to end through the barrel', () => {
    const Greeting = arbor.typeTag<string>('Greeting');
    const container = new arbor.Container({ logger: arbor.silentLogger, properties: {} });
    container.registerDefinition('greeting', { type: Greeting, useFactory: () => 'hello' });

    container.refresh();

    expect(container.getInstance(Greeting)).toBe('hello');
    container.close();
  });
});

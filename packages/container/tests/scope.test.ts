import { describe, expect, it, vi } from 'vitest';

import { Container } from '../src/context/container.js';
import { ContextScope } from '../src/core/scope.js';
import { typeTag } from '../src/core/type-tag.js';
import { inject } from '../src/definition/component-definition.js';
import { InvalidContainerConfigError, ScopeDisposedError, ScopeNotFoundError } from '../src/errors/errors.js';
import { silentLogger } from '../src/logging/logger.js';

describe('ContextScope', () => {
  it('caches produced instances', () => {
    const scope = new ContextScope();
    const producer = vi.fn(() => ({ id: 1 }));

    const first = scope.get('a', producer);
    expect(scope.get('a', producer)).toBe(first);
    expect(producer).toHaveBeenCalledTimes(1);
    expect(scope.has('a')).toBe(true);
    expect(scope.size).toBe(1);
  });

  it('runs destruction callbacks once and rejects reuse after disposal', () => {
    const scope = new ContextScope();
    const log: string[] = [];
    scope.get('a', () => 'a');
    scope.registerDestructionCallback('a', () => log.push('a'));
    scope.registerDestructionCallback('b', () => log.push('b'));

    scope.dispose();
    scope.dispose();

    expect(log).toEqual(['a', 'b']);
    expect(scope.isDisposed).toBe(true);
    expect(scope.has('a')).toBe(false);
    expect(scope.size).toBe(0);
    expect(scope.remove('a')).toBeUndefined();
    expect(() => scope.get('a', () => 'again')).toThrow(ScopeDisposedError);
    expect(() => scope.registerDestructionCallback('c', () => undefined)).toThrow(ScopeDisposedError);
    expect(() => scope.provide('c', 1)).toThrow(ScopeDisposedError);
  });

  it('removes an instance together with its callback', () => {
    const scope = new ContextScope();
    const callback = vi.fn();
    scope.get('a', () => 'value');
    scope.registerDestructionCallback('a', callback);

    expect(scope.remove('a')).toBe('value');
    scope.dispose();

    expect(callback).not.toHaveBeenCalled();
  });

  it('provides values and destroys disposable ones', () => {
    const scope = new ContextScope();
    const first = { dispose: vi.fn() };
    const second = { close: vi.fn() };

    scope.provide('connection', first);
    scope.provide('connection', second);
    scope.provide('requestId', 'req-1');

    expect(scope.get('requestId', () => 'unused')).toBe('req-1');
    expect(scope.get('connection', () => 'unused')).toBe(second);

    scope.dispose();
    expect(first.dispose).not.toHaveBeenCalled();
    expect(second.close).toHaveBeenCalledTimes(1);
  });

  it('runs every callback and aggregates failures', () => {
    const scope = new ContextScope();
    const survivor = vi.fn();
    scope.registerDestructionCallback('a', () => {
      throw new Error('a failed');
    });
    scope.registerDestructionCallback('b', survivor);
    scope.registerDestructionCallback('c', () => {
      throw new Error('c failed');
    });

    let error: unknown;
    try {
      scope.dispose();
    } catch (e) {
      error = e;
    }

    expect(survivor).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(AggregateError);
    expect(error).toMatchObject({ message: '2 scoped component(s) failed to dispose' });
  });
});

class RequestContext {
  disposed = false;

  dispose(): void {
    this.disposed = true;
  }
}

class Handler {
  constructor(readonly context: RequestContext) {}
}

const RequestContextT = typeTag<RequestContext>('RequestContext', { instanceOf: RequestContext });
const HandlerT = typeTag<Handler>('Handler', { instanceOf: Handler });

function createContainer(): Container {
  const container = new Container({ logger: silentLogger, properties: {} });
  container.registerDefinition('requestContext', {
    type: RequestContextT,
    useClass: RequestContext,
    scope: 'request',
  });
  container.registerDefinition('handler', {
    type: HandlerT,
    useClass: Handler,
    args: [inject(RequestContextT)],
    scope: 'prototype',
  });
  return container;
}

describe('Custom scopes in a container', () => {
  it('fails lookups of components whose scope is not registered', () => {
    const container = createContainer();
    container.refresh();

    expect(() => container.getInstance(HandlerT)).toThrow(ScopeNotFoundError);
  });

  it('shares instances within a scope and destroys them with it', () => {
    const container = createContainer();
    const first = new ContextScope();
    container.registerScope('request', first);
    container.refresh();

    const a = container.getInstance(HandlerT);
    const b = container.getInstance(HandlerT);
    expect(a).not.toBe(b);
    expect(a.context).toBe(b.context);

    const second = new ContextScope();
    container.registerScope('request', second);
    const c = container.getInstance(HandlerT);
    expect(c.context).not.toBe(a.context);

    first.dispose();
    expect(a.context.disposed).toBe(true);
    expect(c.context.disposed).toBe(false);
  });

  it('refuses to replace the built-in scopes', () => {
    const container = createContainer();

    expect(() => container.registerScope('singleton', new ContextScope())).toThrow(InvalidContainerConfigError);
    expect(() => container.registerScope('prototype', new ContextScope())).toThrow(InvalidContainerConfigError);
  });
});

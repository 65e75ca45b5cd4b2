import { describe, expect, it, vi } from 'vitest';

import { InstanceCache } from '../src/core/instance-cache.js';
import {
  CircularReferenceError,
  ComponentCreationError,
  DefinitionConflict,
  PrototypeCycleError,
} from '../src/errors/errors.js';

const ignoreErrors = () => undefined;

describe('InstanceCache singletons', () => {
  it('stores created singletons in completion order', () => {
    const cache = new InstanceCache();
    const a = cache.createSingleton('a', () => ({ id: 'a' }));
    cache.createSingleton('b', () => ({ id: 'b' }));

    expect(cache.getSingleton('a')).toBe(a);
    expect(cache.containsSingleton('a')).toBe(true);
    expect(cache.singletonNames()).toEqual(['a', 'b']);
    expect(cache.singletonCount).toBe(2);
    expect(cache.getSingleton('missing')).toBeUndefined();
  });

  it('reports re-entrant creation as a circular reference', () => {
    const cache = new InstanceCache();
    let error: unknown;

    try {
      cache.createSingleton('a', () => cache.createSingleton('b', () => cache.createSingleton('a', () => 1)));
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(CircularReferenceError);
    expect(error).toMatchObject({ cycle: ['a', 'b', 'a'] });
    expect(cache.isCurrentlyInCreation('a')).toBe(false);
    expect(cache.containsSingleton('b')).toBe(false);
  });

  it('hands out one early reference per singleton in creation', () => {
    const cache = new InstanceCache();
    const raw = { id: 'a' };
    const producer = vi.fn(() => ({ wrapped: raw }));

    const result = cache.createSingleton('a', (handle) => {
      expect(cache.hasExposedInstance('a')).toBe(false);
      handle.exposeEarlyReference(producer);
      expect(cache.hasExposedInstance('a')).toBe(true);
      expect(cache.getSingleton('a', false)).toBeUndefined();

      const first = cache.getSingleton('a');
      expect(first).toEqual({ wrapped: raw });
      expect(cache.getSingleton('a')).toBe(first);
      expect(cache.earlyReferenceExposed('a')).toBe(true);
      return raw;
    });

    expect(result).toBe(raw);
    expect(producer).toHaveBeenCalledTimes(1);
    expect(cache.getSingleton('a')).toBe(raw);
    expect(cache.earlyReferenceExposed('a')).toBe(false);
  });

  it('leaves nothing behind when creation fails', () => {
    const cache = new InstanceCache();

    expect(() =>
      cache.createSingleton('a', (handle) => {
        handle.exposeEarlyReference(() => 'early');
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(cache.containsSingleton('a')).toBe(false);
    expect(cache.hasExposedInstance('a')).toBe(false);
    expect(cache.isCurrentlyInCreation('a')).toBe(false);
  });

  it('rejects a second registration under the same name', () => {
    const cache = new InstanceCache();
    cache.registerSingleton('a', 1);

    expect(() => cache.registerSingleton('a', 2)).toThrow(DefinitionConflict);
    expect(cache.getSingleton('a')).toBe(1);
  });
});

describe('InstanceCache prototypes', () => {
  it('detects prototype cycles', () => {
    const cache = new InstanceCache();
    cache.beginPrototype('p');
    cache.beginPrototype('q');

    expect(cache.isCurrentlyInCreation('q')).toBe(true);
    expect(() => cache.beginPrototype('p')).toThrow(PrototypeCycleError);

    cache.endPrototype('q');
    cache.endPrototype('p');
    expect(() => cache.beginPrototype('p')).not.toThrow();
  });
});

describe('InstanceCache dependencies', () => {
  it('tracks direct and transitive dependents', () => {
    const cache = new InstanceCache();
    cache.registerDependent('db', 'repo');
    cache.registerDependent('repo', 'service');
    cache.registerDependent('db', 'db');

    expect(cache.dependentsOf('db')).toEqual(['repo']);
    expect(cache.dependenciesOf('repo')).toEqual(['db']);
    expect(cache.isDependent('db', 'service')).toBe(true);
    expect(cache.isDependent('service', 'db')).toBe(false);
    expect(cache.isDependent('db', 'db')).toBe(false);
  });

  it('destroys dependents before their dependencies', () => {
    const cache = new InstanceCache();
    const log: string[] = [];
    for (const name of ['service', 'repo', 'db']) {
      cache.registerSingleton(name, { name });
      cache.registerDisposable(name, () => log.push(name));
    }
    cache.registerDependent('db', 'repo');
    cache.registerDependent('repo', 'service');

    cache.destroySingletons(ignoreErrors);

    expect(log).toEqual(['service', 'repo', 'db']);
    expect(cache.singletonCount).toBe(0);
  });

  it('destroys a single singleton with its dependents', () => {
    const cache = new InstanceCache();
    const log: string[] = [];
    for (const name of ['db', 'repo', 'other']) {
      cache.registerSingleton(name, { name });
      cache.registerDisposable(name, () => log.push(name));
    }
    cache.registerDependent('db', 'repo');

    cache.destroySingleton('db', ignoreErrors);

    expect(log).toEqual(['repo', 'db']);
    expect(cache.singletonNames()).toEqual(['other']);
    expect(cache.dependentsOf('db')).toEqual([]);
  });

  it('reports destruction errors and keeps going', () => {
    const cache = new InstanceCache();
    const onError = vi.fn();
    const failure = new Error('dispose failed');
    const disposeB = vi.fn();
    cache.registerDisposable('a', () => {
      throw failure;
    });
    cache.registerDisposable('b', disposeB);

    cache.destroySingletons(onError);

    expect(onError).toHaveBeenCalledWith('a', failure);
    expect(disposeB).toHaveBeenCalledTimes(1);
  });

  it('refuses to create singletons while destroying', () => {
    const cache = new InstanceCache();
    const onError = vi.fn();
    cache.registerDisposable('a', () => {
      cache.createSingleton('late', () => 1);
    });

    cache.destroySingletons(onError);

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toBeInstanceOf(ComponentCreationError);
    expect(cache.containsSingleton('late')).toBe(false);
  });
});

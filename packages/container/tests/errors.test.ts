import { describe, expect, it } from 'vitest';

import {
  AmbiguousPriorityError,
  CircularReferenceError,
  ComponentCreationError,
  ContainerError,
  ContainerStateError,
  DefinitionNotFound,
  MissingPropertiesError,
  NoMatchError,
  RefreshFailure,
} from '../src/errors/errors.js';

describe('Errors', () => {
  describe('DefinitionNotFound', () => {
    it('lists up to ten registered names', () => {
      const error = new DefinitionNotFound('mailer', ['db', 'cache']);

      expect(error.message).toBe(
        ["No definition named 'mailer'.", '', 'Registered definitions:', '  - db', '  - cache'].join('\n')
      );
    });

    it('reports only the count beyond ten names', () => {
      const names = Array.from({ length: 11 }, (_, i) => `c${i}`);
      const error = new DefinitionNotFound('mailer', names);

      expect(error.message.split('\n')).toEqual(["No definition named 'mailer'.", '', '11 definitions are registered.']);
    });

    it('shows the resolution path ending at the missing name', () => {
      const error = new DefinitionNotFound('db', [], ['app', 'repo']);

      expect(error.message).toContain('  app → repo → db');
      expect(error.resolutionPath).toEqual(['app', 'repo']);
    });
  });

  it('names each error after its class', () => {
    expect(new NoMatchError('Clock').name).toBe('NoMatchError');
    expect(new ContainerStateError('main', 'closed', 'refresh').name).toBe('ContainerStateError');
    expect(new MissingPropertiesError(['A']).name).toBe('MissingPropertiesError');
  });

  it('shares ContainerError as the base class', () => {
    const errors: Error[] = [
      new NoMatchError('Clock'),
      new CircularReferenceError(['a', 'b', 'a']),
      new AmbiguousPriorityError('Clock', ['x', 'y'], 1),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(ContainerError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('keeps the original error as the cause', () => {
    const original = new Error('boom');

    const creation = new ComponentCreationError('svc', original, ['app', 'svc']);
    const refresh = new RefreshFailure('main', creation);

    expect(creation.cause).toBe(original);
    expect(creation.message).toContain('  Error: boom');
    expect(refresh.cause).toBe(creation);
    expect(refresh.containerName).toBe('main');
  });

  it('explains a circular reference with its cycle', () => {
    const error = new CircularReferenceError(['a', 'b', 'a']);

    expect(error.cycle).toEqual(['a', 'b', 'a']);
    expect(error.message.split('\n').slice(0, 3)).toEqual(['Circular reference detected:', '', '  a → b → a']);
    expect(error.message).toContain("'a' is requested while it is still being constructed.");
  });

  it('reports the shared priority of ambiguous candidates', () => {
    const error = new AmbiguousPriorityError('Clock', ['x', 'y'], 3);

    expect(error.message.split('\n')[0]).toBe("Components of type 'Clock' share the highest priority (3): x, y");
    expect(error.candidates).toEqual(['x', 'y']);
    expect(error.priority).toBe(3);
  });
});

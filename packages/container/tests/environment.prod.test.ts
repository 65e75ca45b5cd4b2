import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

describe('Production error messages', () => {
  let previous: string | undefined;

  beforeEach(() => {
    previous = process.env.NODE_ENV;
    process.env.NODE_ENV = 'production';
    vi.resetModules();
  });

  afterEach(() => {
    if (previous === undefined) delete process.env.NODE_ENV;
    else process.env.NODE_ENV = previous;
    vi.resetModules();
  });

  it('collapse to a single line', async () => {
    const errors = await import('../src/errors/errors.js');

    expect(new errors.DefinitionNotFound('x', ['a', 'b']).message).toBe("No definition named 'x'.");
    expect(new errors.CircularReferenceError(['a', 'b', 'a']).message).toBe('Circular reference detected: a → b → a');
    expect(new errors.ComponentCreationError('svc', new Error('fail')).message).toBe(
      "Error creating component 'svc': Error: fail"
    );
    expect(new errors.InvalidContainerConfigError('bad').message).toBe('Invalid container configuration: bad');
    expect(new errors.ContainerStateError('main', 'closed', 'refresh').message).toBe(
      "Cannot refresh container 'main' in state 'closed'"
    );
  });
});

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);

const chainLines = (path: readonly string[], target?: string): string[] => {
  if (path.length === 0) return [];
  const chain = target ? [...path, target].join(' → ') : path.join(' → ');
  return ['Resolution path:', `  ${chain}`, ''];
};

/**
 * Base class of every error raised by the container.
 *
 * `resolutionPath` holds the component names being created when the error
 * surfaced, outermost first.
 */
export abstract class ContainerError extends Error {
  readonly resolutionPath: readonly string[];

  protected constructor(message: string, resolutionPath: readonly string[] = [], cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.resolutionPath = resolutionPath;
  }
}

/**
 * A definition name collides with an existing definition or alias, or a
 * parent chain loops back on itself.
 */
export class DefinitionConflict extends ContainerError {
  constructor(
    public readonly componentName: string,
    public readonly reason: string
  ) {
    super(
      format(`Definition conflict for '${componentName}': ${reason}`, [
        `Definition conflict for '${componentName}'.`,
        '',
        `  ${reason}`,
        '',
        'To fix this:',
        `  1. Rename one of the conflicting definitions`,
        `  2. Or enable allowDefinitionOverriding on the container`,
      ])
    );
  }
}

export class DefinitionNotFound extends ContainerError {
  constructor(
    public readonly componentName: string,
    public readonly available: readonly string[] = [],
    resolutionPath: readonly string[] = []
  ) {
    const parts: string[] = [`No definition named '${componentName}'.`, ''];
    parts.push(...chainLines(resolutionPath, componentName));
    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered definitions:');
      available.forEach((n) => parts.push(`  - ${n}`));
    } else if (available.length > 10) {
      parts.push(`${available.length} definitions are registered.`);
    }
    super(format(`No definition named '${componentName}'.`, parts), resolutionPath);
  }
}

export class InvalidDefinitionError extends ContainerError {
  constructor(
    public readonly componentName: string,
    public readonly reason: string
  ) {
    super(
      format(`Invalid definition '${componentName}': ${reason}`, [
        `Invalid definition '${componentName}'.`,
        '',
        `  ${reason}`,
        '',
        'A definition needs exactly one of useClass, useFactory or factoryMethod,',
        'unless it is abstract or inherits one from its parent.',
      ])
    );
  }
}

/**
 * A singleton was requested again while its constructor arguments were still
 * being resolved. No partial instance exists yet, so the cycle cannot be
 * broken.
 */
export class CircularReferenceError extends ContainerError {
  constructor(
    public readonly cycle: readonly string[],
    detail?: string
  ) {
    const cycleStr = cycle.join(' → ');
    super(
      format(`Circular reference detected: ${cycleStr}`, [
        'Circular reference detected:',
        '',
        `  ${cycleStr}`,
        '',
        ...(detail ? [detail, ''] : []),
        `'${cycle[cycle.length - 1]}' is requested while it is still being constructed.`,
        '',
        'Solutions:',
        `  1. Move one side of the cycle from a constructor argument to a property`,
        `  2. Extract the shared logic into a separate component`,
        `  3. Mark one side lazy and look it up on demand`,
      ]),
      cycle
    );
  }
}

export class PrototypeCycleError extends ContainerError {
  constructor(public readonly cycle: readonly string[]) {
    const cycleStr = cycle.join(' → ');
    super(
      format(`Prototype cycle detected: ${cycleStr}`, [
        'Prototype cycle detected:',
        '',
        `  ${cycleStr}`,
        '',
        'Prototype components are never cached, so a cycle through one can never',
        'be closed. Make one participant a singleton or break the cycle.',
      ]),
      cycle
    );
  }
}

export class NoMatchError extends ContainerError {
  constructor(
    public readonly typeLabel: string,
    resolutionPath: readonly string[] = [],
    public readonly declaringComponent?: string
  ) {
    const parts = [`No component of type '${typeLabel}' is available.`, ''];
    parts.push(...chainLines(resolutionPath));
    if (declaringComponent) parts.push(`Required by '${declaringComponent}'.`, '');
    parts.push(
      'To fix this:',
      `  1. Register a definition whose type is assignable to '${typeLabel}'`,
      `  2. Check that the candidate is not excluded with autowireCandidate: false`,
      `  3. Mark the dependency as optional if it may be absent`
    );
    super(format(`No component of type '${typeLabel}' is available.`, parts), resolutionPath);
  }
}

abstract class AmbiguityError extends ContainerError {
  protected constructor(
    public readonly typeLabel: string,
    public readonly candidates: readonly string[],
    headline: string,
    hints: string[],
    resolutionPath: readonly string[]
  ) {
    super(
      format(headline, [
        headline,
        '',
        'Candidates:',
        ...candidates.map((c) => `  - ${c}`),
        '',
        ...chainLines(resolutionPath),
        'To fix this:',
        ...hints,
      ]),
      resolutionPath
    );
  }
}

export class AmbiguousPrimaryError extends AmbiguityError {
  constructor(typeLabel: string, candidates: readonly string[], resolutionPath: readonly string[] = []) {
    super(
      typeLabel,
      candidates,
      `More than one primary component of type '${typeLabel}': ${candidates.join(', ')}`,
      [`  1. Keep primary: true on exactly one of them`],
      resolutionPath
    );
  }
}

export class AmbiguousPriorityError extends AmbiguityError {
  constructor(
    typeLabel: string,
    candidates: readonly string[],
    public readonly priority: number,
    resolutionPath: readonly string[] = []
  ) {
    super(
      typeLabel,
      candidates,
      `Components of type '${typeLabel}' share the highest priority (${priority}): ${candidates.join(', ')}`,
      [`  1. Give the candidates distinct priority values`, `  2. Or mark one as primary`],
      resolutionPath
    );
  }
}

export class AmbiguousMatchError extends AmbiguityError {
  constructor(typeLabel: string, candidates: readonly string[], resolutionPath: readonly string[] = []) {
    super(
      typeLabel,
      candidates,
      `Expected a single component of type '${typeLabel}' but found ${candidates.length}: ${candidates.join(', ')}`,
      [
        `  1. Mark one candidate as primary`,
        `  2. Give the candidates distinct priority values`,
        `  3. Name the injection point after the wanted component`,
        `  4. Request every candidate with a multi-element shape`,
      ],
      resolutionPath
    );
  }
}

export class TypeMismatchError extends ContainerError {
  constructor(
    public readonly componentName: string,
    public readonly expected: string,
    public readonly actual: string,
    resolutionPath: readonly string[] = []
  ) {
    super(
      format(`Component '${componentName}' is not of type '${expected}' (got ${actual})`, [
        `Component '${componentName}' is not of type '${expected}'.`,
        '',
        `  Produced value: ${actual}`,
        '',
        ...chainLines(resolutionPath),
        'An instance post-processor may have replaced the instance with a wrapper',
        'that no longer satisfies the requested type.',
      ]),
      resolutionPath
    );
  }
}

/**
 * User code (constructor, factory, init method, post-processor) threw while
 * a component was being created.
 */
export class ComponentCreationError extends ContainerError {
  constructor(
    public readonly componentName: string,
    cause: unknown,
    resolutionPath: readonly string[] = []
  ) {
    super(
      format(`Error creating component '${componentName}': ${describeCause(cause)}`, [
        `Error creating component '${componentName}'.`,
        '',
        ...chainLines(resolutionPath),
        `  ${describeCause(cause)}`,
        '',
        "See 'cause' for the original error.",
      ]),
      resolutionPath,
      cause
    );
  }
}

export class RefreshFailure extends ContainerError {
  constructor(
    public readonly containerName: string,
    cause: unknown
  ) {
    super(
      format(`Refresh of container '${containerName}' failed: ${describeCause(cause)}`, [
        `Refresh of container '${containerName}' failed.`,
        '',
        `  ${describeCause(cause)}`,
        '',
        'Every singleton created during the attempt has been destroyed.',
      ]),
      [],
      cause
    );
  }
}

export class ContainerStateError extends ContainerError {
  constructor(
    public readonly containerName: string,
    public readonly state: string,
    public readonly operation: string
  ) {
    super(
      format(`Cannot ${operation} container '${containerName}' in state '${state}'`, [
        `Cannot ${operation} container '${containerName}' in state '${state}'.`,
        '',
        'A container is refreshed once and closed once. Components can only be',
        'looked up while it is active.',
      ])
    );
  }
}

export class MissingPropertiesError extends ContainerError {
  constructor(public readonly missing: readonly string[]) {
    super(
      format(`Missing required properties: ${missing.join(', ')}`, [
        'Missing required properties:',
        ...missing.map((m) => `  - ${m}`),
        '',
        'Provide them through ContainerConfig.properties or the environment.',
      ])
    );
  }
}

export class ScopeNotFoundError extends ContainerError {
  constructor(
    public readonly scopeName: string,
    public readonly componentName: string
  ) {
    super(
      format(`No scope '${scopeName}' registered for '${componentName}'`, [
        `No scope '${scopeName}' registered for component '${componentName}'.`,
        '',
        `Register it first: container.registerScope('${scopeName}', new ContextScope())`,
      ])
    );
  }
}

export class ScopeDisposedError extends ContainerError {
  constructor() {
    super(
      format('Scope has been disposed.', [
        'Scope disposed',
        '',
        'Scope has been disposed. Do not resolve scoped components after dispose().',
      ])
    );
  }
}

export class InvalidContainerConfigError extends ContainerError {
  constructor(public readonly reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
  }
}

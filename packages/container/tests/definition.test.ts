import { describe, expect, it } from 'vitest';

import { typeTag } from '../src/core/type-tag.js';
import {
  definitionsEqual,
  inject,
  ref,
  validateDefinition,
  value,
  type ComponentDefinition,
} from '../src/definition/component-definition.js';
import { mergeDefinitions } from '../src/definition/merged-definition.js';
import { DefinitionConflict, InvalidDefinitionError } from '../src/errors/errors.js';

class Widget {}
const WidgetT = typeTag<Widget>('Widget', { instanceOf: Widget });

describe('validateDefinition', () => {
  it('accepts a plain class definition', () => {
    expect(() => validateDefinition('widget', { type: WidgetT, useClass: Widget })).not.toThrow();
  });

  it('accepts abstract templates and children without a strategy', () => {
    expect(() => validateDefinition('base', { abstract: true })).not.toThrow();
    expect(() => validateDefinition('child', { parent: 'base' })).not.toThrow();
  });

  it.each<[string, string, ComponentDefinition]>([
    ['empty name', '', { useClass: Widget }],
    ['blank name', '   ', { useClass: Widget }],
  ])('rejects %s', (_label, name, def) => {
    expect(() => validateDefinition(name, def)).toThrow(InvalidDefinitionError);
  });

  it.each<[string, ComponentDefinition, RegExp]>([
    ['two strategies', { useClass: Widget, useFactory: () => new Widget() }, /mutually exclusive/],
    ['no strategy', { type: WidgetT }, /no construction strategy/],
    ['a non-function factory', { useFactory: 'make' as never }, /useFactory must be a function/],
    ['an incomplete factory method', { factoryMethod: { component: 'config', method: '' } }, /needs both/],
    ['a non-tag type', { type: { kind: 'x' } as never, useClass: Widget }, /type must be a type tag/],
    ['an empty scope', { useClass: Widget, scope: '' }, /scope must be a non-empty string/],
    ['a NaN priority', { useClass: Widget, priority: Number.NaN }, /priority must be a finite number/],
    ['an infinite order', { useClass: Widget, order: Infinity }, /order must be a finite number/],
    ['an empty reference', { useClass: Widget, args: [ref('')] }, /argument 0 references an empty component name/],
    [
      'an injection without a tag',
      { useClass: Widget, properties: { x: { kind: 'inject', request: { type: {} as never } } } },
      /property 'x' must inject a type tag/,
    ],
  ])('rejects %s', (_label, def, message) => {
    expect(() => validateDefinition('widget', def)).toThrow(message);
  });
});

describe('validateDefinition parent checks', () => {
  it('reports a definition naming itself as parent as a parent loop', () => {
    expect(() => validateDefinition('widget', { parent: 'widget' })).toThrow(DefinitionConflict);
    expect(() => validateDefinition('widget', { parent: 'widget' })).toThrow(
      'parent chain loops: widget -> widget'
    );
  });
});

describe('mergeDefinitions', () => {
  it('fills defaults for a standalone definition', () => {
    const merged = mergeDefinitions('widget', { type: WidgetT, useClass: Widget });

    expect(merged.scope).toBe('singleton');
    expect(merged.lazy).toBe(false);
    expect(merged.primary).toBe(false);
    expect(merged.autowireCandidate).toBe(true);
    expect(merged.role).toBe('application');
    expect(merged.dependsOn).toEqual([]);
    expect(merged.origin).toEqual({ kind: 'local' });
    expect(merged.strategy).toEqual({ kind: 'class', useClass: Widget });
    expect(Object.isFrozen(merged)).toBe(true);
  });

  it('merges a child over its parent', () => {
    const base = mergeDefinitions('base', {
      abstract: true,
      type: WidgetT,
      scope: 'prototype',
      initMethod: 'init',
      args: [value('x'), value('y')],
      properties: { a: value(1), b: value(2) },
    });
    const child = mergeDefinitions(
      'child',
      { parent: 'base', useClass: Widget, args: [value('z')], properties: { b: value(3) } },
      base
    );

    expect(base.abstract).toBe(true);
    expect(base.strategy).toEqual({ kind: 'none' });
    expect(child.abstract).toBe(false);
    expect(child.type).toBe(WidgetT);
    expect(child.scope).toBe('prototype');
    expect(child.initMethod).toBe('init');
    expect(child.args).toEqual([value('z'), value('y')]);
    expect(child.properties).toEqual({ a: value(1), b: value(3) });
    expect(child.origin).toEqual({ kind: 'inherited', parentName: 'base' });
  });

  it('inherits the construction strategy', () => {
    const base = mergeDefinitions('base', { type: WidgetT, useClass: Widget, abstract: true });
    const child = mergeDefinitions('child', { parent: 'base', primary: true }, base);

    expect(child.strategy).toEqual({ kind: 'class', useClass: Widget });
    expect(child.primary).toBe(true);
  });

  it('requires a type on concrete definitions', () => {
    expect(() => mergeDefinitions('widget', { useClass: Widget })).toThrow(/needs a type tag/);
  });

  it('requires a strategy somewhere in the chain', () => {
    const base = mergeDefinitions('base', { abstract: true, type: WidgetT });

    expect(() => mergeDefinitions('child', { parent: 'base' }, base)).toThrow(
      /no construction strategy on the definition or its parents/
    );
  });
});

describe('definitionsEqual', () => {
  it('compares structurally', () => {
    const make = (): ComponentDefinition => ({
      type: WidgetT,
      useClass: Widget,
      args: [ref('clock'), inject(WidgetT)],
      properties: { size: value(3) },
      dependsOn: ['clock'],
    });

    expect(definitionsEqual(make(), make())).toBe(true);
    expect(definitionsEqual(make(), { ...make(), priority: 1 })).toBe(false);
    expect(definitionsEqual(make(), { ...make(), args: [ref('timer'), inject(WidgetT)] })).toBe(false);
    expect(definitionsEqual(make(), { ...make(), properties: { size: value(4) } })).toBe(false);
    expect(definitionsEqual(make(), { ...make(), dependsOn: [] })).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';

import { TagHierarchyMatcher } from '../src/core/type-matcher.js';
import { defineTypes, isTypeTag, typeTag } from '../src/core/type-tag.js';

class Animal {}
class Dog extends Animal {}

describe('typeTag', () => {
  it('creates frozen tags with unique ids', () => {
    const a = typeTag('Animal');
    const b = typeTag('Animal');

    expect(a.id).not.toBe(b.id);
    expect(a.label).toBe('Animal');
    expect(a.kind).toBe('type');
    expect(a.supertypes).toEqual([]);
    expect(a.guard).toBeUndefined();
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('defaults the label', () => {
    expect(typeTag().label).toBe('Type');
  });

  it('builds a guard from instanceOf', () => {
    const AnimalT = typeTag<Animal>('Animal', { instanceOf: Animal });

    expect(AnimalT.guard?.(new Dog())).toBe(true);
    expect(AnimalT.guard?.({})).toBe(false);
  });

  it('prefers an explicit guard over instanceOf', () => {
    const T = typeTag<Animal>('Animal', {
      instanceOf: Animal,
      guard: (v): v is Animal => v === 'animal',
    });

    expect(T.guard?.('animal')).toBe(true);
    expect(T.guard?.(new Animal())).toBe(false);
  });

  it('rejects supertypes that are not tags', () => {
    expect(() => typeTag('Broken', { extends: [{} as never] })).toThrow(TypeError);
  });
});

describe('isTypeTag', () => {
  it('recognizes tags only', () => {
    expect(isTypeTag(typeTag('A'))).toBe(true);
    expect(isTypeTag(null)).toBe(false);
    expect(isTypeTag('type_1')).toBe(false);
    expect(isTypeTag({ kind: 'type', id: 'x', label: 'x' })).toBe(false);
  });
});

describe('defineTypes', () => {
  it('prefixes labels and shares supertypes', () => {
    const Base = typeTag('Repository');
    const types = defineTypes(
      'User',
      { Store: null as unknown as Animal, Cache: null as unknown as Dog },
      { extends: [Base] }
    );

    expect(types.Store.label).toBe('UserStore');
    expect(types.Cache.label).toBe('UserCache');
    expect(types.Store.supertypes).toEqual([Base]);
  });
});

describe('TagHierarchyMatcher', () => {
  const Base = typeTag('Base');
  const Left = typeTag('Left', { extends: [Base] });
  const Right = typeTag('Right', { extends: [Base] });
  const Bottom = typeTag('Bottom', { extends: [Left, Right] });
  const Other = typeTag('Other');

  it('follows supertypes transitively', () => {
    const matcher = new TagHierarchyMatcher();

    expect(matcher.isAssignable(Bottom, Bottom)).toBe(true);
    expect(matcher.isAssignable(Bottom, Left)).toBe(true);
    expect(matcher.isAssignable(Bottom, Base)).toBe(true);
    expect(matcher.isAssignable(Base, Bottom)).toBe(false);
    expect(matcher.isAssignable(Bottom, Other)).toBe(false);
  });

  it('answers repeated queries consistently', () => {
    const matcher = new TagHierarchyMatcher();

    expect(matcher.isAssignable(Right, Base)).toBe(true);
    expect(matcher.isAssignable(Right, Base)).toBe(true);
    expect(matcher.isAssignable(Right, Left)).toBe(false);
    expect(matcher.isAssignable(Right, Left)).toBe(false);
  });

  it('checks instances through the guard', () => {
    const matcher = new TagHierarchyMatcher();
    const DogT = typeTag<Dog>('Dog', { instanceOf: Dog });

    expect(matcher.isInstance(new Dog(), DogT)).toBe(true);
    expect(matcher.isInstance(new Animal(), DogT)).toBe(false);
    expect(matcher.isInstance(null, Base)).toBe(true);
    expect(matcher.isInstance(undefined, Base)).toBe(false);
  });
});

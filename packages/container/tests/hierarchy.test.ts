import { describe, expect, it } from 'vitest';

import { Container } from '../src/context/container.js';
import { typeTag } from '../src/core/type-tag.js';
import { injectAll, ref } from '../src/definition/component-definition.js';
import { silentLogger } from '../src/logging/logger.js';

class Store {
  constructor(readonly id: string) {}
}

class Consumer {
  constructor(readonly dependency: unknown) {}
}

const StoreT = typeTag<Store>('Store', { instanceOf: Store });
const ConsumerT = typeTag<Consumer>('Consumer', { instanceOf: Consumer });

function store(id: string, extra: { primary?: boolean } = {}) {
  return { type: StoreT, useFactory: () => new Store(id), ...extra };
}

function family(): { parent: Container; child: Container } {
  const parent = new Container({ name: 'parent', logger: silentLogger, properties: {} });
  const child = new Container({ name: 'child', parent, logger: silentLogger, properties: {} });
  return { parent, child };
}

describe('Container hierarchy', () => {
  it('resolves parent components from the child', () => {
    const { parent, child } = family();
    parent.registerDefinition('shared', store('parent'));
    child.registerDefinition('user', { type: ConsumerT, useClass: Consumer, args: [ref('shared')] });
    parent.refresh();
    child.refresh();

    const user = child.getInstance(ConsumerT);

    expect(user.dependency).toBe(parent.getInstance('shared'));
    expect(child.getInstance(StoreT).id).toBe('parent');
    expect(child.containsComponent('shared')).toBe(true);
    expect(parent.containsComponent('user')).toBe(false);
  });

  it('shadows a parent component with a local one of the same name', () => {
    const { parent, child } = family();
    parent.registerDefinition('store', store('parent'));
    child.registerDefinition('store', store('child'));
    parent.refresh();
    child.refresh();

    expect(child.getInstance(StoreT).id).toBe('child');
    expect(child.getInstance('store')).toBe(child.getInstancesOfType(StoreT).get('store'));
    expect(parent.getInstance(StoreT).id).toBe('parent');
  });

  it('prefers a local primary over an inherited one', () => {
    const { parent, child } = family();
    parent.registerDefinition('parentStore', store('parent', { primary: true }));
    child.registerDefinition('childStore', store('child', { primary: true }));
    parent.refresh();
    child.refresh();

    expect(child.getInstance(StoreT).id).toBe('child');
  });

  it('orders local components before inherited ones in multi-element injection', () => {
    const { parent, child } = family();
    parent.registerDefinition('p1', store('p1'));
    child.registerDefinition('c1', store('c1'));
    child.registerDefinition('all', { type: ConsumerT, useClass: Consumer, args: [injectAll(StoreT)] });
    parent.refresh();
    child.refresh();

    const all = child.getInstance(ConsumerT).dependency;

    expect(Array.isArray(all)).toBe(true);
    const ids = Array.isArray(all) ? all.map((s) => (s instanceof Store ? s.id : undefined)) : [];
    expect(ids).toEqual(['c1', 'p1']);
  });

  it('leaves the parent running when the child closes', () => {
    const { parent, child } = family();
    parent.registerDefinition('shared', store('parent'));
    parent.refresh();
    child.refresh();

    child.close();

    expect(child.getState()).toBe('closed');
    expect(parent.getState()).toBe('active');
    expect(parent.getInstance(StoreT).id).toBe('parent');
  });

  it('refreshes and publishes in a child whose parent is closed', () => {
    const { parent, child } = family();
    parent.refresh();
    parent.close();
    child.registerDefinition('local', store('child'));

    child.refresh();
    child.publish('still delivered');

    expect(child.getState()).toBe('active');
    expect(child.getInstance(StoreT).id).toBe('child');
  });
});

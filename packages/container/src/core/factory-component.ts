/*
 * Factory components
 * ------------------
 * A component whose declared type extends FACTORY_COMPONENT is not handed
 * out itself: lookups of its name answer the object returned by
 * `getObject()`, and type matching goes by `getObjectType()`. Prefixing the
 * name with `&` reaches the factory.
 *
 *   container.getInstance('connection')   // product
 *   container.getInstance('&connection')  // the factory component
 */

import { typeTag, type TypeTag } from './type-tag.js';
import { hasMethod } from '../types/types.js';

export interface FactoryComponent<T = unknown> {
  getObject(): T;
  /** Type of the products, or undefined while it cannot be told yet. */
  getObjectType(): TypeTag<T> | undefined;
  /** Whether every lookup shares one product. @default true */
  isSingleton?(): boolean;
}

export const FACTORY_PREFIX = '&';

export const isFactoryComponent = (value: unknown): value is FactoryComponent =>
  hasMethod(value, 'getObject') && hasMethod(value, 'getObjectType');

export const FACTORY_COMPONENT = typeTag<FactoryComponent>('FactoryComponent', { guard: isFactoryComponent });

export const isFactoryReference = (name: string): boolean => name.startsWith(FACTORY_PREFIX);

/** `name` without any leading `&`. */
export function stripFactoryPrefix(name: string): string {
  let out = name;
  while (out.startsWith(FACTORY_PREFIX)) out = out.slice(FACTORY_PREFIX.length);
  return out;
}

import { hasMethod } from '../types/types.js';

/**
 * Resolves message codes into text. Catalog-backed implementations are
 * provided by the application as a `messageResolver` definition.
 */
export interface MessageResolver {
  resolveMessage(code: string, args?: readonly unknown[], fallback?: string): string | undefined;
}

export const isMessageResolver = (value: unknown): value is MessageResolver => hasMethod(value, 'resolveMessage');

/**
 * Replace `{0}`, `{1}`, ... with the matching argument. Placeholders without
 * an argument stay as they are.
 */
export function formatMessage(template: string, args: readonly unknown[] = []): string {
  return template.replace(/\{(\d+)\}/g, (match, index: string) => {
    const i = Number(index);
    return i < args.length ? String(args[i]) : match;
  });
}

/**
 * Default resolver of a container without a `messageResolver` definition:
 * asks the parent container, then falls back to the formatted fallback.
 */
export class DelegatingMessageResolver implements MessageResolver {
  constructor(private readonly parent?: MessageResolver) {}

  resolveMessage(code: string, args: readonly unknown[] = [], fallback?: string): string | undefined {
    const fromParent = this.parent?.resolveMessage(code, args);
    if (fromParent !== undefined) return fromParent;
    return fallback === undefined ? undefined : formatMessage(fallback, args);
  }
}

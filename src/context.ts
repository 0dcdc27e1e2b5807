import { AsyncLocalStorage } from 'node:async_hooks';
import type { ContextKey } from './types';

/**
 * A private context key. Two keys minted with the same name are still distinct,
 * and lookups through a `Key<T>` come back typed as `T | undefined`.
 */
export class Key<T> {
  /** Only carries `T` for the type checker. */
  private readonly _type?: T;

  constructor(readonly name: string) {
    Object.freeze(this);
  }

  toString(): string {
    return `Key(${this.name})`;
  }
}

/** Mint a new private key. */
export function createContextKey<T>(name: string): Key<T> {
  return new Key<T>(name);
}

/** SameValueZero, the equality `Map` uses. */
function sameKey(a: ContextKey, b: ContextKey): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Immutable key/value chain threaded through a call chain. Every `withValue`
 * returns a new handle; the receiver never changes.
 */
export class Context {
  private constructor(
    private readonly parent: Context | null,
    private readonly key: ContextKey | null,
    private readonly val: unknown,
  ) {
    Object.freeze(this);
  }

  /** The empty root context. */
  static readonly BACKGROUND: Context = new Context(null, null, undefined);

  /**
   * Bind `key` to `value` in a new child context. A newer binding shadows an
   * older one for the same key.
   */
  withValue<T>(key: Key<T>, value: T): Context;
  withValue(key: ContextKey, value: unknown): Context;
  withValue(key: ContextKey, value: unknown): Context {
    return new Context(this, key, value);
  }

  /** Value of the nearest binding for `key`, or `undefined` when there is none. */
  value<T>(key: Key<T>): T | undefined;
  value(key: ContextKey): unknown;
  value(key: ContextKey): unknown {
    for (let c: Context | null = this; c !== null; c = c.parent) {
      if (c.key !== null && sameKey(c.key, key)) return c.val;
    }
    return undefined;
  }
}

/** The shared empty root context. */
export function background(): Context {
  return Context.BACKGROUND;
}

/* ----------------------------- Ambient context ----------------------------- */

const storage = new AsyncLocalStorage<Context>();

/**
 * Run `fn` with `ctx` as the current context. The binding follows async
 * continuations started inside `fn` and ends when it returns.
 */
export function runWithContext<R>(ctx: Context, fn: () => R): R {
  return storage.run(ctx, fn);
}

/** The context installed by the innermost `runWithContext`, else the background. */
export function currentContext(): Context {
  return storage.getStore() ?? Context.BACKGROUND;
}

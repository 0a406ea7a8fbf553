/**
 * Append-only arenas addressed by typed integer handles.
 *
 * Everything the IR builder creates (types, functions, basic blocks,
 * variables, source files) lives in one of these stores. Entries are never
 * removed or moved, so a handle stays valid for the lifetime of the store
 * that issued it. Handles are plain numbers at runtime; the brand only keeps
 * a `FunId` from being passed where a `TypeId` is expected.
 */

import { IrInvariantError } from "../errors/invariant.ts";

declare const indexBrand: unique symbol;

/** Handle of a `T` stored in an {@link Arena} or {@link Interner}. */
export type Index<T> = number & { readonly [indexBrand]: T };

/** Brand a raw number as a handle. Only stores and fixed constants call this. */
export function indexFromRaw<T>(raw: number): Index<T> {
  return raw as Index<T>;
}

export class Arena<T> {
  private readonly items: T[] = [];

  constructor(private readonly what: string) {}

  insert(item: T): Index<T> {
    this.items.push(item);
    return indexFromRaw<T>(this.items.length - 1);
  }

  /** Dereference a handle. The returned object may be mutated in place. */
  get(index: Index<T>): T {
    if (!this.has(index)) {
      throw new IrInvariantError(`${this.what} handle ${index} is not owned by this arena`);
    }
    return this.items[index];
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  get length(): number {
    return this.items.length;
  }

  *entries(): IterableIterator<[Index<T>, T]> {
    for (let i = 0; i < this.items.length; i++) {
      yield [indexFromRaw<T>(i), this.items[i]];
    }
  }
}

/**
 * An arena that hands out one handle per distinct value.
 * `key` maps a value to a string that is equal exactly when two values
 * should share a handle.
 */
export class Interner<T> {
  private readonly values: Arena<T>;
  private readonly byKey = new Map<string, Index<T>>();

  constructor(
    what: string,
    private readonly key: (value: T) => string
  ) {
    this.values = new Arena<T>(what);
  }

  insert(value: T): Index<T> {
    const k = this.key(value);
    const existing = this.byKey.get(k);
    if (existing !== undefined) return existing;
    const id = this.values.insert(value);
    this.byKey.set(k, id);
    return id;
  }

  /**
   * Store `value` under a handle of its own, even when an equal value is
   * already interned. Later `insert` calls never return this handle.
   */
  append(value: T): Index<T> {
    return this.values.insert(value);
  }

  /** Look up a value without inserting it. */
  find(value: T): Index<T> | undefined {
    return this.byKey.get(this.key(value));
  }

  get(index: Index<T>): T {
    return this.values.get(index);
  }

  has(index: number): boolean {
    return this.values.has(index);
  }

  get length(): number {
    return this.values.length;
  }

  entries(): IterableIterator<[Index<T>, T]> {
    return this.values.entries();
  }
}

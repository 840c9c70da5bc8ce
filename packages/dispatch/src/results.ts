/**
 * Return values recorded per handler identity during one traversal.
 */

export type Guard<T> = (value: unknown) => value is T;

interface Entry {
  readonly handler: string;
  readonly value: unknown;
}

export class ResultStore {
  private readonly entries: Entry[] = [];
  private readonly byHandler = new Map<string, unknown[]>();

  /** Record a handler's return value; `undefined` means "no result". */
  add(handler: string, value: unknown): void {
    if (value === undefined) return;
    this.entries.push({ handler, value });
    const list = this.byHandler.get(handler);
    if (list) list.push(value);
    else this.byHandler.set(handler, [value]);
  }

  /** Most recent result of `handler`. */
  last(handler: string): unknown;
  last<T>(handler: string, guard: Guard<T>): T | undefined;
  last<T>(handler: string, guard?: Guard<T>): unknown {
    const list = this.byHandler.get(handler) ?? [];
    for (let i = list.length - 1; i >= 0; i--) {
      if (!guard || guard(list[i])) return list[i];
    }
    return undefined;
  }

  /** Every result of `handler`, oldest first. */
  all(handler: string): readonly unknown[];
  all<T>(handler: string, guard: Guard<T>): T[];
  all<T>(handler: string, guard?: Guard<T>): readonly unknown[] {
    const list = this.byHandler.get(handler) ?? [];
    return guard ? list.filter(guard) : list.slice();
  }

  /** Most recent result of any handler that passes `guard`. */
  latest<T>(guard: Guard<T>): T | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const value = this.entries[i].value;
      if (guard(value)) return value;
    }
    return undefined;
  }

  /** Every result of any handler that passes `guard`, oldest first. */
  every<T>(guard: Guard<T>): T[] {
    const values: T[] = [];
    for (const entry of this.entries) {
      const value = entry.value;
      if (guard(value)) values.push(value);
    }
    return values;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
    this.byHandler.clear();
  }
}

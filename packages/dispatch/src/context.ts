/**
 * Keyed store shared by the handlers of one traversal.
 *
 * `State` types the single values, `Lists` the append-only lists. A store
 * lives as long as the top-level traversal that created it, unless a caller
 * passes its own store to several traversals.
 */

export class DispatchContext<
  State extends object = Record<string, unknown>,
  Lists extends object = Record<string, unknown>,
> {
  private values: Partial<State> = {};
  private lists: { [K in keyof Lists]?: Lists[K][] } = {};

  get<K extends keyof State>(key: K): State[K] | undefined {
    return this.values[key];
  }

  getOrDefault<K extends keyof State>(key: K, fallback: State[K]): State[K] {
    const value = this.values[key];
    return value === undefined ? fallback : value;
  }

  set<K extends keyof State>(key: K, value: State[K]): void {
    this.values[key] = value;
  }

  has(key: keyof State): boolean {
    return Object.hasOwn(this.values, key);
  }

  remove(key: keyof State): boolean {
    const had = this.has(key);
    delete this.values[key];
    return had;
  }

  /** The stored value, or the factory's result after storing it. */
  getOrAdd<K extends keyof State>(key: K, factory: () => State[K]): State[K] {
    const existing = this.values[key];
    if (existing !== undefined) return existing;
    const created = factory();
    this.values[key] = created;
    return created;
  }

  addToList<K extends keyof Lists>(key: K, item: Lists[K]): void {
    const list = this.lists[key];
    if (list) {
      list.push(item);
    } else {
      this.lists[key] = [item];
    }
  }

  getList<K extends keyof Lists>(key: K): readonly Lists[K][] {
    return this.lists[key] ?? [];
  }

  clear(): void {
    this.values = {};
    this.lists = {};
  }
}

/** Freezes a plain data structure in place, nested objects and arrays included. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}

/** A Map whose entries are fixed once constructed; writes throw. */
export class FrozenMap<K, V> extends Map<K, V> {
  private readonly sealed: boolean;

  constructor(entries: Iterable<readonly [K, V]>) {
    // Map's constructor fills itself through set() before sealed is assigned
    super(entries);
    this.sealed = true;
    Object.freeze(this);
  }

  set(key: K, value: V): this {
    if (this.sealed) throw new TypeError('Cannot modify a frozen map');
    return super.set(key, value);
  }

  delete(key: K): boolean {
    if (this.sealed) throw new TypeError('Cannot modify a frozen map');
    return super.delete(key);
  }

  clear(): void {
    if (this.sealed) throw new TypeError('Cannot modify a frozen map');
    super.clear();
  }
}

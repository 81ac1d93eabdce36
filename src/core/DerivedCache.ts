/**
 * Lazily built value with an explicit Absent/Cached lifecycle.
 *
 * Absent -> Cached on the first get(); Cached -> Absent on invalidate().
 * A build that throws leaves the slot Absent.
 */

export type CacheState = 'absent' | 'cached';

type Slot<T> = { state: 'absent' } | { state: 'cached'; value: T };

export class DerivedCache<T> {
  private slot: Slot<T> = { state: 'absent' };
  private readonly build: () => T;
  private readonly release?: (value: T) => void;

  /**
   * @param build Produces the value on a cache miss
   * @param release Frees a value as it leaves the cache
   */
  constructor(build: () => T, release?: (value: T) => void) {
    this.build = build;
    this.release = release;
  }

  get state(): CacheState {
    return this.slot.state;
  }

  get(): T {
    if (this.slot.state === 'cached') {
      return this.slot.value;
    }
    const value = this.build();
    this.slot = { state: 'cached', value };
    return value;
  }

  /**
   * Returns the cached value without building one.
   */
  peek(): T | undefined {
    return this.slot.state === 'cached' ? this.slot.value : undefined;
  }

  /**
   * Drops the cached value, releasing it first.
   * @returns whether a value was dropped
   */
  invalidate(): boolean {
    if (this.slot.state === 'absent') {
      return false;
    }
    const { value } = this.slot;
    this.slot = { state: 'absent' };
    this.release?.(value);
    return true;
  }
}

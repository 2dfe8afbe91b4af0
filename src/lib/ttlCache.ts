interface CacheEntry<T> {
  readonly value: T;
  readonly capturedAt: number;
}

export interface TtlCache<T> {
  /** Returns the cached value, or `undefined` when empty or older than the TTL. */
  get: () => T | undefined;
  set: (value: T) => void;
  invalidate: () => void;
}

export function createTtlCache<T>(ttlMs: number, now: () => number = Date.now): TtlCache<T> {
  let entry: CacheEntry<T> | null = null;

  return {
    get: () => {
      if (!entry) {
        return undefined;
      }

      if (now() - entry.capturedAt >= ttlMs) {
        entry = null;
        return undefined;
      }

      return entry.value;
    },
    set: (value) => {
      entry = { value, capturedAt: now() };
    },
    invalidate: () => {
      entry = null;
    },
  };
}

type Entry<T> = { value: T; expiresAt: number };

export type TtlCacheOptions = {
  ttlMs: number;
  now?: () => number;
};

export const createTtlCache = <T>(options: TtlCacheOptions) => {
  const now = options.now ?? Date.now;
  const entries = new Map<string, Entry<T>>();
  const inflight = new Map<string, Promise<T>>();

  const get = (key: string): T | null => {
    const existing = entries.get(key);
    if (!existing) {
      return null;
    }
    if (existing.expiresAt <= now()) {
      entries.delete(key);
      return null;
    }
    return existing.value;
  };

  const set = (key: string, value: T) => {
    entries.set(key, { value, expiresAt: now() + options.ttlMs });
  };

  /** Returns the cached value or loads it; concurrent misses for one key share a single load. */
  const getOrLoad = async (key: string, loader: () => Promise<T>): Promise<T> => {
    const cached = get(key);
    if (cached !== null) {
      return cached;
    }
    const pending = inflight.get(key);
    if (pending) {
      return pending;
    }

    const loadPromise = (async () => {
      const value = await loader();
      set(key, value);
      return value;
    })();

    inflight.set(key, loadPromise);
    try {
      return await loadPromise;
    } finally {
      inflight.delete(key);
    }
  };

  const clear = () => {
    entries.clear();
  };

  return { get, set, getOrLoad, clear };
};

export type TtlCache<T> = ReturnType<typeof createTtlCache<T>>;

/**
 * chatport - Keyed State Store
 * Retains per-item state across frames, matched by key instead of position
 *
 * A positional diff throws away state whenever an item is inserted or removed
 * above it. Matching by key keeps expensive per-item state (decoded images,
 * running animations) attached to the same logical item while the list grows,
 * shrinks or reorders.
 */

import type { KeyedEntry, ViewportEntry } from "../types";

// =============================================================================
// Types
// =============================================================================

export interface KeyedStateHooks<T, K, S> {
  /** Build state for a key that was not present last frame */
  create: (item: T, key: K) => S;

  /** Re-sync reused state with this frame's item */
  sync?: (state: S, item: T, key: K) => void;
}

export interface KeyedDiff<S, K> {
  /** New entries, in the order of the incoming item list */
  entries: KeyedEntry<S, K>[];

  /** Previous entries whose key is absent this frame */
  dropped: KeyedEntry<S, K>[];
}

export interface KeyedStoreHooks<T, K, S> extends KeyedStateHooks<T, K, S> {
  /** Release state whose key disappeared */
  dispose?: (state: S, key: K) => void;
}

export interface KeyedStore<T, K, S> {
  /** Diff against the previous frame and keep the result */
  reconcile: (next: readonly ViewportEntry<T, K>[]) => KeyedEntry<S, K>[];

  /** State currently retained for `key` */
  get: (key: K) => S | undefined;

  /** Entries of the last reconcile, in order */
  entries: () => readonly KeyedEntry<S, K>[];

  size: () => number;

  /** Dispose all retained state */
  clear: () => void;
}

// =============================================================================
// Diff
// =============================================================================

/**
 * Match `next` against `previous` by key.
 *
 * Old entries go into a map (a duplicated old key keeps the last one and the
 * earlier ones are dropped); each new key then takes its old state out of the
 * map or gets fresh state. Reused state objects are the same instances, only
 * their position changes.
 *
 * Keys must be unique within `next`. A duplicate is a caller error: the first
 * occurrence takes the old state and later ones get fresh state.
 */
export const diffKeyed = <T, K, S>(
  previous: readonly KeyedEntry<S, K>[],
  next: readonly ViewportEntry<T, K>[],
  hooks: KeyedStateHooks<T, K, S>,
): KeyedDiff<S, K> => {
  const retained = new Map<K, KeyedEntry<S, K>>();
  const dropped: KeyedEntry<S, K>[] = [];
  for (const entry of previous) {
    const shadowed = retained.get(entry.key);
    if (shadowed) dropped.push(shadowed);
    retained.set(entry.key, entry);
  }

  const entries = next.map(({ item, key }): KeyedEntry<S, K> => {
    const hit = retained.get(key);
    if (hit) {
      retained.delete(key);
      hooks.sync?.(hit.state, item, key);
      return { key, state: hit.state };
    }
    return { key, state: hooks.create(item, key) };
  });

  dropped.push(...retained.values());

  return { entries, dropped };
};

/** First key that occurs twice in `next`, if any */
export const findDuplicateKey = <T, K>(
  next: readonly ViewportEntry<T, K>[],
): { key: K } | null => {
  const seen = new Set<K>();
  for (const { key } of next) {
    if (seen.has(key)) return { key };
    seen.add(key);
  }
  return null;
};

// =============================================================================
// Store
// =============================================================================

/**
 * Create a keyed state store holding the previous frame's entries
 */
export const createKeyedStore = <T, K, S>(
  hooks: KeyedStoreHooks<T, K, S>,
): KeyedStore<T, K, S> => {
  let current: KeyedEntry<S, K>[] = [];
  let index = new Map<K, S>();

  const reconcile = (
    next: readonly ViewportEntry<T, K>[],
  ): KeyedEntry<S, K>[] => {
    const duplicate = findDuplicateKey(next);
    if (duplicate) {
      console.warn(
        `[chatport] Duplicate item key in one frame: ${String(duplicate.key)}`,
      );
    }

    const { entries, dropped } = diffKeyed(current, next, hooks);

    if (hooks.dispose) {
      for (const entry of dropped) {
        hooks.dispose(entry.state, entry.key);
      }
    }

    current = entries;
    index = new Map();
    for (const entry of entries) {
      index.set(entry.key, entry.state);
    }
    return entries;
  };

  const clear = (): void => {
    if (hooks.dispose) {
      for (const entry of current) {
        hooks.dispose(entry.state, entry.key);
      }
    }
    current = [];
    index = new Map();
  };

  return {
    reconcile,
    get: (key) => index.get(key),
    entries: () => current,
    size: () => current.length,
    clear,
  };
};

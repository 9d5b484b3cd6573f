/**
 * Inserts or updates {`@link` key} in {`@link` map} (refreshing insertion order)
 * and evicts the oldest entry when size would exceed {`@link` maxEntries}.
 * No-op when maxEntries ≤ 0.
 */
export const setBoundedMapValue = <K, V>(map: Map<K, V>, key: K, value: V, maxEntries: number) => {
    if (maxEntries <= 0) {
        return;
    }

    if (map.has(key)) {
        map.delete(key);
    }
    map.set(key, value);
    while (map.size > maxEntries) {
        const oldest = map.keys().next();
        if (oldest.done) {
            break;
        }
        map.delete(oldest.value);
    }
};

/**
 * Deletes every entry whose value fails {`@link` keep}. Returns the removed keys
 * in insertion order.
 */
export const pruneMapEntries = <K, V>(map: Map<K, V>, keep: (value: V) => boolean): K[] => {
    const removed: K[] = [];
    for (const [key, value] of map.entries()) {
        if (!keep(value)) {
            removed.push(key);
        }
    }
    for (const key of removed) {
        map.delete(key);
    }
    return removed;
};

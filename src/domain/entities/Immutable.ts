/**
 * Recursively freezes a plain data record so stage artifacts cannot be mutated
 * after they are produced or read back from the cache.
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

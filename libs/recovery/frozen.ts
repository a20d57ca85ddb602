/**
 * Freeze a value and everything reachable from it.
 * Only for values the engine owns outright; never pass caller objects.
 */
export function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
    }
    return value;
}

/**
 * Detached, deeply frozen copy of a caller-supplied value.
 *
 * @throws DataCloneError when the value holds functions or other
 *         non-cloneable data
 */
export function frozenCopy<T>(value: T): T {
    return deepFreeze(structuredClone(value));
}

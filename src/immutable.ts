/**
 * Freeze `value` and everything reachable from it. Nodes that are already
 * frozen are still descended into, since a shallow freeze leaves children open.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
    if (typeof value === 'object' && value !== null && !seen.has(value)) {
        seen.add(value);
        Object.freeze(value);
        for (const key of Object.keys(value)) {
            deepFreeze(Reflect.get(value, key), seen);
        }
    }
    return value;
}

import { deserialize, hasSerializer, isClassInstance, serialize } from "./serializer";

/**
 * Deep clone that rebuilds class instances through their registered
 * serializer. Instances of unregistered classes are shared, not copied.
 */
export function cloneAware<T>(value: T): T;
export function cloneAware(value: unknown): unknown {
    if (typeof value !== "object" || value === null) {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item: unknown) => cloneAware(item));
    }
    if (isClassInstance(value)) {
        return hasSerializer(value) ? deserialize(cloneAware(serialize(value))) : value;
    }
    const copy: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
        copy[key] = cloneAware(field);
    }
    return copy;
}

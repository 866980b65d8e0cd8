/**
 * Default reducer: the update wins.
 */
export function replaceReducer<T>(_current: T, update: T): T {
    return update;
}

/**
 * Concatenates the update onto the current sequence, keeping order.
 * Used for message histories.
 */
export function appendReducer<T>(current: T[], update: T[]): T[] {
    if (!Array.isArray(current) || !Array.isArray(update)) {
        throw new TypeError(
            `append reducer expects two arrays, got ${describeKind(current)} and ${describeKind(update)}`,
        );
    }
    return [...current, ...update];
}

function describeKind(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (Array.isArray(value)) {
        return "array";
    }
    return typeof value;
}

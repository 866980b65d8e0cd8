import { z } from "zod";
import { STATE_MERGE } from "../graphs/registry";
import { SchemaError } from "../errors";
import { isPlainRecord } from "./serializer";

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
}

function undeclaredKey(schema: z.ZodObject, value: Record<string, unknown>): string | undefined {
    return Object.keys(value).find((key) => !Object.hasOwn(schema.shape, key));
}

/**
 * Validates a complete state against the graph's schema.
 *
 * @throws {SchemaError} If a field is undeclared, or a declared field is missing or holds a value the schema rejects
 */
export function parseState<S extends Record<string, unknown>>(schema: z.ZodObject, value: unknown, source = "state"): S {
    const extra = isPlainRecord(value) ? undeclaredKey(schema, value) : undefined;
    if (extra !== undefined) {
        throw new SchemaError(`Invalid ${source}: undeclared field "${extra}"`, {
            context: { source, key: extra },
        });
    }
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new SchemaError(`Invalid ${source}: ${formatIssues(result.error)}`, {
            cause: result.error,
            context: { source },
        });
    }
    return result.data as S;
}

/**
 * Applies a partial update to a state through each field's reducer.
 *
 * - Keys absent from `changes` are left untouched.
 * - A field with a reducer registered in {@link STATE_MERGE} becomes
 *   `merge(current, update)`; any other field is replaced.
 * - An optional field that has no current value takes the update as is.
 * - The merged object is validated against the schema before it is returned.
 *
 * Neither `base` nor `changes` is mutated.
 *
 * @param source - Who produced the update, used in error messages (usually a node name)
 * @throws {SchemaError} If `changes` is not an object, names an undeclared field, or yields an invalid state
 * @throws {TypeError} If a reducer rejects the values it was given
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   count: z.number(),
 *   log: z.array(z.string()).register(STATE_MERGE, { merge: appendReducer }),
 * });
 * mergeState(schema, { count: 1, log: ["a"] }, { count: 2, log: ["b"] });
 * // { count: 2, log: ["a", "b"] }
 * ```
 */
export function mergeState<S extends Record<string, unknown>>(
    schema: z.ZodObject,
    base: S,
    changes: Partial<S>,
    source = "update",
): S {
    if (!isPlainRecord(changes)) {
        throw new SchemaError(`Update from ${source} must be a plain object`, { context: { source } });
    }
    const extra = undeclaredKey(schema, changes);
    if (extra !== undefined) {
        throw new SchemaError(`Update from ${source} sets undeclared field "${extra}"`, {
            context: { source, key: extra },
        });
    }
    const acc: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(changes)) {
        const field: z.ZodType = schema.shape[key];
        const reducer = STATE_MERGE.get(field);
        if (reducer === undefined || acc[key] === undefined) {
            acc[key] = value;
            continue;
        }
        acc[key] = reducer.merge(acc[key], value);
    }
    return parseState<S>(schema, acc, `state after ${source}`);
}

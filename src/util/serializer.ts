import {
    AgentMessage,
    SystemMessage,
    ToolError,
    ToolRequest,
    ToolResponse,
    UserMessage,
} from "../messages";

const CLASS_NAME_KEY = "__className";

type SerializedObject = { [CLASS_NAME_KEY]: string; [key: string]: unknown };

export interface Serializer<T, S extends Record<string, unknown>> {
    serialize(value: T): S;
    deserialize(value: S): T;
}

type ClassConstructor<T> = new (...args: never[]) => T;

const SERIALIZERS = new Map<string, Serializer<unknown, Record<string, unknown>>>();

/**
 * Registers how instances of a class are turned into plain data and back.
 * Registered instances are copied into each node's state snapshot and can be
 * stored by `SQLiteCheckpointer`; instances of other classes are shared
 * between snapshots and cannot be stored durably.
 */
export function registerSerializer<T, S extends Record<string, unknown>>(
    constructor: ClassConstructor<T>,
    serializer: Serializer<T, S>,
): void {
    SERIALIZERS.set(constructor.name, serializer);
}

function prototypeOf(value: unknown): unknown {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return undefined;
    }
    return Object.getPrototypeOf(value);
}

/**
 * True for objects built by a class (other than `Object`); arrays excluded.
 */
export function isClassInstance(value: unknown): value is object {
    const prototype = prototypeOf(value);
    return prototype !== undefined && prototype !== null && prototype !== Object.prototype;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
    const prototype = prototypeOf(value);
    return prototype === null || prototype === Object.prototype;
}

function isSerializedObject(value: Record<string, unknown>): value is SerializedObject {
    return typeof value[CLASS_NAME_KEY] === "string";
}

export function hasSerializer(value: object): boolean {
    return SERIALIZERS.has(value.constructor.name);
}

export function serialize(value: object): SerializedObject {
    const className = value.constructor.name;
    const serializer = SERIALIZERS.get(className);
    if (!serializer) {
        throw new Error(`No serializer registered for ${className}`);
    }
    return {
        ...serializer.serialize(value),
        [CLASS_NAME_KEY]: className,
    };
}

export function deserialize(value: SerializedObject): unknown {
    const { [CLASS_NAME_KEY]: className, ...rest } = value;
    const serializer = SERIALIZERS.get(className);
    if (!serializer) {
        throw new Error(`No serializer registered for ${className}`);
    }
    return serializer.deserialize(rest);
}

/**
 * Converts a value into JSON-safe data, tagging registered class instances
 * with their class name so {@link decodeValue} can rebuild them.
 */
export function encodeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(encodeValue);
    }
    if (isClassInstance(value)) {
        const encoded: Record<string, unknown> = {};
        for (const [key, field] of Object.entries(serialize(value))) {
            encoded[key] = encodeValue(field);
        }
        return encoded;
    }
    if (isPlainRecord(value)) {
        const encoded: Record<string, unknown> = {};
        for (const [key, field] of Object.entries(value)) {
            encoded[key] = encodeValue(field);
        }
        return encoded;
    }
    return value;
}

export function decodeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(decodeValue);
    }
    if (isPlainRecord(value)) {
        const decoded: Record<string, unknown> = {};
        for (const [key, field] of Object.entries(value)) {
            decoded[key] = decodeValue(field);
        }
        return isSerializedObject(decoded) ? deserialize(decoded) : decoded;
    }
    return value;
}

registerSerializer(Date, {
    serialize: (value) => ({ iso: value.toISOString() }),
    deserialize: (value) => new Date(value.iso),
});
registerSerializer<Map<unknown, unknown>, { entries: Array<[unknown, unknown]> }>(Map, {
    serialize: (value) => ({ entries: [...value.entries()] }),
    deserialize: (value) => new Map(value.entries),
});
registerSerializer<Set<unknown>, { values: unknown[] }>(Set, {
    serialize: (value) => ({ values: [...value] }),
    deserialize: (value) => new Set(value.values),
});
registerSerializer(SystemMessage, {
    serialize: (value) => ({ text: value.text }),
    deserialize: (value) => new SystemMessage(value.text),
});
registerSerializer(UserMessage, {
    serialize: (value) => ({ text: value.text }),
    deserialize: (value) => new UserMessage(value.text),
});
registerSerializer(AgentMessage, {
    serialize: (value) => ({ text: value.text }),
    deserialize: (value) => new AgentMessage(value.text),
});
registerSerializer(ToolRequest, {
    serialize: (value) => ({ toolUseId: value.toolUseId, toolName: value.toolName, input: value.input }),
    deserialize: (value) => new ToolRequest(value.toolUseId, value.toolName, value.input),
});
registerSerializer(ToolResponse, {
    serialize: (value) => ({ toolUseId: value.toolUseId, toolName: value.toolName, output: value.output }),
    deserialize: (value) => new ToolResponse(value.toolUseId, value.toolName, value.output),
});
registerSerializer(ToolError, {
    serialize: (value) => ({ toolUseId: value.toolUseId, toolName: value.toolName, error: value.error }),
    deserialize: (value) => new ToolError(value.toolUseId, value.toolName, value.error),
});

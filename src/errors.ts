interface GraphErrorOptions {
    code?: string;
    cause?: unknown;
    context?: Record<string, unknown>;
}

/**
 * Base class for every failure the engine reports to callers.
 * Carries a stable `code` and optional structured context for logging.
 */
export class GraphError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, options: GraphErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = this.constructor.name;
        this.code = options.code ?? "GRAPH_ERROR";
        this.context = options.context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            ...(this.context ? { context: this.context } : {}),
        };
    }
}

/**
 * A state update (or a full state) does not match the graph's schema.
 */
export class SchemaError extends GraphError {
    constructor(message: string, options: Omit<GraphErrorOptions, "code"> = {}) {
        super(message, { ...options, code: "SCHEMA_ERROR" });
    }
}

/**
 * A branch function returned a key that its mapping does not contain.
 */
export class RoutingError extends GraphError {
    constructor(
        public readonly from: string,
        public readonly key: unknown,
        public readonly validKeys: readonly string[],
    ) {
        super(
            `Branch from ${from} returned ${JSON.stringify(key)}, expected one of: ${validKeys.join(", ")}`,
            { code: "ROUTING_ERROR", context: { from, key, validKeys } },
        );
    }
}

/**
 * The graph definition is not runnable. Raised by `compile()` only.
 */
export class GraphIntegrityError extends GraphError {
    constructor(message: string) {
        super(message, { code: "GRAPH_INTEGRITY_ERROR" });
    }
}

/**
 * A node's step function failed. `state` is the state of the thread's last
 * good checkpoint, which is left in place so the step can be retried.
 */
export class NodeExecutionError extends GraphError {
    constructor(
        public readonly node: string,
        public readonly threadId: string,
        public readonly state: Readonly<Record<string, unknown>>,
        cause: unknown,
    ) {
        super(`Node ${node} failed on thread ${threadId}: ${describeError(cause)}`, {
            code: "NODE_EXECUTION_ERROR",
            cause,
            context: { node, threadId },
        });
    }
}

export class CheckpointError extends GraphError {
    constructor(message: string, options: Omit<GraphErrorOptions, "code"> = {}) {
        super(message, { ...options, code: "CHECKPOINT_ERROR" });
    }
}

export class RecursionLimitError extends GraphError {
    constructor(public readonly limit: number, threadId: string) {
        super(`Recursion limit of ${limit} steps reached on thread ${threadId} without reaching END`, {
            code: "RECURSION_LIMIT",
            context: { limit, threadId },
        });
    }
}

export class GraphCancelledError extends GraphError {
    constructor(threadId: string, cause?: unknown) {
        super(`Run on thread ${threadId} was cancelled`, {
            code: "CANCELLED",
            cause,
            context: { threadId },
        });
    }
}

export class ConfigError extends GraphError {
    constructor(message: string) {
        super(message, { code: "CONFIG_ERROR" });
    }
}

/**
 * Thrown by a node to pause the run. Not a failure: the runner catches it,
 * checkpoints the thread as interrupted and returns to the caller.
 */
export class GraphInterrupt extends Error {
    constructor(public readonly node: string, public readonly reason?: string) {
        super(`Graph execution interrupted at ${node}${reason ? `: ${reason}` : ""}`);
        this.name = "GraphInterrupt";
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

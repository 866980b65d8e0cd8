export type ToolUseKind = "tool_request" | "tool_response" | "tool_error";

export interface ToolUseJSON {
    kind: ToolUseKind;
    toolUseId: string;
    toolName: string;
    payload: unknown;
}

/**
 * Common shape of the three tool messages. `toolUseId` ties a response or
 * an error back to the request that caused it.
 */
export abstract class ToolUse {
    abstract readonly kind: ToolUseKind;

    constructor(
        public readonly toolUseId: string,
        public readonly toolName: string,
    ) { }

    protected abstract payload(): unknown;

    toJSON(): ToolUseJSON {
        return { kind: this.kind, toolUseId: this.toolUseId, toolName: this.toolName, payload: this.payload() };
    }
}

/**
 * A call an agent wants made. Pending requests sit at the tail of the
 * message history until a tool node answers them.
 *
 * @example
 * ```typescript
 * new ToolRequest("call_1", "search", { query: "weather in Paris" });
 * ```
 */
export class ToolRequest<T = unknown> extends ToolUse {
    readonly kind = "tool_request";

    constructor(toolUseId: string, toolName: string, public readonly input: T) {
        super(toolUseId, toolName);
    }

    protected payload(): unknown {
        return this.input;
    }
}

export class ToolResponse<T = unknown> extends ToolUse {
    readonly kind = "tool_response";

    constructor(toolUseId: string, toolName: string, public readonly output: T) {
        super(toolUseId, toolName);
    }

    protected payload(): unknown {
        return this.output;
    }
}

/**
 * The result entry for a call that failed. Recorded in place of a response
 * so that the graph can route on it rather than abort.
 */
export class ToolError extends ToolUse {
    readonly kind = "tool_error";

    constructor(toolUseId: string, toolName: string, public readonly error: string) {
        super(toolUseId, toolName);
    }

    protected payload(): unknown {
        return this.error;
    }
}

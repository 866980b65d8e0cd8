import { type NodeLike } from "./types";
import { type NodeContext } from "../graphs/runtime-context";
import { END } from "../graphs/constants";
import { type ModelMessages, ToolError, ToolRequest, ToolResponse } from "../messages";
import { type ToolImplementation } from "../tools";
import { Semaphore } from "../util/semaphore";
import { describeError } from "../errors";

/** The part of a state a tool node reads and writes. */
export type ToolState = {
    messages: ModelMessages[];
};

export interface ToolNodeOptions {
    /** How many calls run at once. Defaults to all of them. */
    maxConcurrency?: number;
}

/**
 * The tool calls still waiting for an answer: the run of {@link ToolRequest}
 * messages at the end of the history, in the order they were made.
 */
export function pendingToolRequests(messages: readonly ModelMessages[]): ToolRequest[] {
    const pending: ToolRequest[] = [];
    for (let index = messages.length - 1; index >= 0; index--) {
        const message = messages[index];
        if (!(message instanceof ToolRequest)) {
            break;
        }
        pending.unshift(message);
    }
    return pending;
}

/**
 * Branch function for the agent/tools cycle: go to `"tools"` while calls are
 * pending, otherwise finish.
 *
 * @example
 * ```typescript
 * builder.addConditionalEdges("agent", toolsCondition, { tools: "tools", [END]: END });
 * ```
 */
export function toolsCondition(state: ToolState): "tools" | typeof END {
    return pendingToolRequests(state.messages).length > 0 ? "tools" : END;
}

/**
 * Runs every pending tool call and appends one result message per call.
 *
 * Results come back in request order and carry the request's `toolUseId`.
 * A call that fails (unknown tool, input rejected by the tool's schema, or
 * an error thrown by the tool) yields a {@link ToolError} instead of a
 * {@link ToolResponse}; the other calls of the same batch are unaffected.
 *
 * The state field must be declared with the append reducer so the results
 * land after the requests.
 *
 * @example
 * ```typescript
 * const search = tool(
 *   defineTool("search", "Search the web", z.object({ query: z.string() })),
 *   async ({ query }) => ({ results: await searchClient.find(query) }),
 * );
 * builder.addNode("tools", new ToolNode([search]));
 * ```
 */
export class ToolNode implements NodeLike<ToolState> {
    private readonly toolMap = new Map<string, ToolImplementation>();

    constructor(tools: readonly ToolImplementation[], private readonly options: ToolNodeOptions = {}) {
        for (const tool of tools) {
            if (this.toolMap.has(tool.name)) {
                throw new Error(`Tool ${tool.name} is registered twice`);
            }
            this.toolMap.set(tool.name, tool);
        }
    }

    async run(state: ToolState, context: NodeContext): Promise<Partial<ToolState>> {
        const requests = pendingToolRequests(state.messages);
        if (requests.length === 0) {
            return {};
        }
        const semaphore = new Semaphore(this.options.maxConcurrency ?? requests.length);
        const results = await Promise.all(
            requests.map((request) => semaphore.run(() => this.dispatch(request, context))),
        );
        return { messages: results };
    }

    private async dispatch(request: ToolRequest, context: NodeContext): Promise<ToolResponse | ToolError> {
        const tool = this.toolMap.get(request.toolName);
        if (!tool) {
            return new ToolError(request.toolUseId, request.toolName, `Tool ${request.toolName} not found`);
        }
        const parsed = tool.schema.safeParse(request.input);
        if (!parsed.success) {
            const details = parsed.error.issues.map((issue) => issue.message).join("; ");
            return new ToolError(request.toolUseId, request.toolName, `Invalid input for tool ${request.toolName}: ${details}`);
        }
        try {
            const output = await tool.func(parsed.data, context);
            return new ToolResponse(request.toolUseId, request.toolName, output);
        } catch (error) {
            context.logger.warn({ tool: request.toolName, toolUseId: request.toolUseId, err: error }, "Tool call failed");
            return new ToolError(request.toolUseId, request.toolName, describeError(error));
        }
    }
}

import { z } from "zod";
import { type NodeContext } from "./graphs/runtime-context";

export interface ToolDefinition<T = unknown> {
    name: string;
    description?: string;
    schema: z.ZodType<T>;
}

export function defineTool<T>(
    name: string,
    description: string,
    schema: z.ZodType<T>,
): ToolDefinition<T> {
    return {
        name,
        description,
        schema,
    };
}

/**
 * A tool a {@link ToolNode} can dispatch to. `func` receives the input
 * already validated against `schema`.
 */
export interface ToolImplementation<T = unknown, K = unknown> extends ToolDefinition<T> {
    func(input: T, context: NodeContext): K | Promise<K>;
}

export function tool<T, K>(
    toolDefinition: ToolDefinition<T>,
    func: (input: T, context: NodeContext) => K | Promise<K>,
): ToolImplementation<T, K> {
    return {
        ...toolDefinition,
        func,
    };
}

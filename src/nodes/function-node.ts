import { type NodeLike, type StepFunction } from "./types";
import { type NodeContext } from "../graphs/runtime-context";

/**
 * Wraps a step function so it can be used as a node.
 *
 * @example
 * ```typescript
 * const doubleNode = new FunctionNode<{ count: number }>((state) => ({
 *   count: state.count * 2,
 * }));
 * ```
 */
export class FunctionNode<T extends Record<string, unknown>> implements NodeLike<T> {
    constructor(private readonly func: StepFunction<T>) { }

    async run(state: T, context: NodeContext): Promise<Partial<T>> {
        return await this.func(state, context);
    }
}

/**
 * Helper to create a {@link FunctionNode} with type inference.
 */
export function makeNode<T extends Record<string, unknown>>(func: StepFunction<T>): NodeLike<T> {
    return new FunctionNode(func);
}

export function isNodeLike<T extends Record<string, unknown>>(node: NodeLike<T> | StepFunction<T>): node is NodeLike<T> {
    return typeof node !== "function";
}

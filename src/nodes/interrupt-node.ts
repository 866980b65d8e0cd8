import { type NodeLike } from "./types";
import { type NodeContext } from "../graphs/runtime-context";

/**
 * A node that pauses the run when it is reached and lets it through when the
 * thread is resumed. Changes nothing in the state.
 *
 * @example
 * ```typescript
 * builder
 *   .addNode("confirm", new InterruptNode("Please confirm the order"))
 *   .addEdge("draft", "confirm")
 *   .addEdge("confirm", "submit");
 *
 * const result = await graph.execute(input, { threadId });
 * if (result.exitReason === "interrupt") {
 *   console.log(result.exitMessage); // "Please confirm the order"
 *   await graph.invoke(null, { threadId });
 * }
 * ```
 */
export class InterruptNode<T extends Record<string, unknown>> implements NodeLike<T> {
    constructor(private readonly message?: string) { }

    async run(_state: T, context: NodeContext): Promise<Partial<T>> {
        context.interrupt(this.message);
        return {};
    }
}

import { z } from "zod";
import { END, START } from "./constants";
import { StateGraph } from "./state-graph";
import { type CompiledGraph } from "./compiled-graph";
import { type CompileOptions } from "./types";
import { type NodeLike, type StepFunction } from "../nodes/types";

/**
 * A graph that runs its nodes one after another without branching.
 * Each call to {@link next} appends a node; {@link compile} wires
 * `START -> first -> ... -> last -> END`.
 *
 * @example
 * ```typescript
 * const schema = z.object({ count: z.number() });
 *
 * const graph = new NodeSequence(schema)
 *   .next((state) => ({ count: state.count + 1 }))
 *   .next((state) => ({ count: state.count * 2 }))
 *   .compile();
 *
 * await graph.invoke({ count: 5 }); // { count: 12 }
 * ```
 */
export class NodeSequence<Z extends z.ZodObject, S extends Record<string, unknown> = z.infer<Z>> {
    private readonly steps: Array<{ name: string; node: NodeLike<S> | StepFunction<S> }> = [];

    constructor(public readonly schema: Z) { }

    /**
     * Appends a node to the sequence.
     *
     * @param name - Defaults to `node-<position>`, counting from 0
     */
    next(node: NodeLike<S> | StepFunction<S>, name: string = `node-${this.steps.length}`): this {
        this.steps.push({ name, node });
        return this;
    }

    compile(options: CompileOptions = {}): CompiledGraph<Z, S> {
        const graph = new StateGraph<Z, S>(this.schema);
        let previous: string = START;
        for (const { name, node } of this.steps) {
            graph.addNode(name, node).addEdge(previous, name);
            previous = name;
        }
        graph.addEdge(previous, END);
        return graph.compile(options);
    }
}

import { type NodeContext } from "../graphs/runtime-context";

/**
 * Anything a graph can run as a node: given a snapshot of the state,
 * produce a partial update. Nodes must not mutate the state they receive.
 */
export interface NodeLike<I extends Record<string, unknown>, O extends Record<string, unknown> = Partial<I>> {
    run(state: I, context: NodeContext): Promise<O>;
}

/** A plain function used as a node. */
export type StepFunction<S extends Record<string, unknown>> = (
    state: S,
    context: NodeContext,
) => Partial<S> | Promise<Partial<S>>;

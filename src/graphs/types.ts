import { type Logger } from "../logger";
import { type BaseCheckpointer } from "./store/base-checkpointer";

interface ResultBase<S> {
    runId: string;
    threadId: string;
    state: S;
    /** Steps completed on the thread so far, across invocations. */
    step: number;
}

interface EndResult<S> extends ResultBase<S> {
    exitReason: "end";
}

interface InterruptResult<S> extends ResultBase<S> {
    exitReason: "interrupt";
    exitMessage: string;
    /** Nodes that run when the thread is resumed. */
    next: string[];
}

export type GraphResult<S> = EndResult<S> | InterruptResult<S>;

export interface RunConfig {
    /** Thread to run on. A new thread is started when omitted. */
    threadId?: string;
    /** Aborting it cancels the run before the next step is executed or merged. */
    signal?: AbortSignal;
}

export interface ThreadConfig {
    threadId: string;
}

export interface CompileOptions {
    checkpointer?: BaseCheckpointer;
    /** Nodes to pause before. */
    interruptBefore?: readonly string[];
    /** Nodes to pause after, once their update is checkpointed. */
    interruptAfter?: readonly string[];
    /** Maximum number of steps per invocation. */
    recursionLimit?: number;
    /** Maximum number of nodes run at once within a step. */
    maxConcurrency?: number;
    logger?: Logger;
}

export interface StateSnapshot<S> {
    values: S;
    /** Nodes the thread runs next; empty once it has completed. */
    next: string[];
    interrupted: boolean;
    exitMessage?: string;
    step: number;
    checkpointId: string;
    createdAt: string;
}

export interface NodeUpdate<S> {
    node: string;
    update: Partial<S>;
}

/** Emitted by `stream()` after each checkpointed step. */
export interface StepUpdate<S> {
    step: number;
    nodes: string[];
    updates: NodeUpdate<S>[];
    state: S;
}

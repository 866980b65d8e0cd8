import { createId } from "@paralleldrive/cuid2";
import { z } from "zod";
import { type EdgeTable } from "./edge-table";
import { RuntimeContext } from "./runtime-context";
import { type BaseCheckpointer } from "./store/base-checkpointer";
import { type Checkpoint } from "./store/checkpoint";
import { MemoryCheckpointer } from "./store/memory-checkpointer";
import { type StoredThread } from "./store/stored-thread";
import {
    type GraphResult,
    type NodeUpdate,
    type RunConfig,
    type StateSnapshot,
    type StepUpdate,
    type ThreadConfig,
} from "./types";
import { type NodeLike } from "../nodes/types";
import { type Logger } from "../logger";
import {
    CheckpointError,
    GraphInterrupt,
    NodeExecutionError,
    RecursionLimitError,
    SchemaError,
} from "../errors";
import { cloneAware } from "../util/clone-aware";
import { mergeState, parseState } from "../util/merge-state";
import { Semaphore } from "../util/semaphore";

export interface CompiledGraphParams<S extends Record<string, unknown>> {
    nodes: ReadonlyMap<string, NodeLike<S>>;
    table: EdgeTable<S>;
    checkpointer?: BaseCheckpointer;
    interruptBefore: ReadonlySet<string>;
    interruptAfter: ReadonlySet<string>;
    recursionLimit: number;
    maxConcurrency: number;
    logger: Logger;
}

type NodeOutcome<S> =
    | { node: string; kind: "update"; update: Partial<S> }
    | { node: string; kind: "interrupt"; interrupt: GraphInterrupt }
    | { node: string; kind: "error"; error: unknown };

/**
 * A validated, immutable graph, produced by `StateGraph.compile()`.
 *
 * Every call runs on a thread. The thread's checkpoint holds the state and
 * the nodes to run next, and is rewritten after every step, so a call that
 * pauses or fails can be picked up by any later call with the same thread
 * id, including one made by another process sharing the checkpointer.
 * Calls on the same thread run one after the other.
 *
 * @example
 * ```typescript
 * const graph = builder.compile({ checkpointer, interruptBefore: ["tools"] });
 *
 * const paused = await graph.execute({ messages: [new UserMessage("Book a flight")] }, { threadId });
 * // paused.exitReason === "interrupt", paused.next === ["tools"]
 *
 * const done = await graph.execute(null, { threadId });
 * // done.exitReason === "end"
 * ```
 */
export class CompiledGraph<Z extends z.ZodObject, S extends Record<string, unknown> = z.infer<Z>> {
    constructor(
        public readonly schema: Z,
        private readonly params: CompiledGraphParams<S>,
    ) { }

    get checkpointer(): BaseCheckpointer | undefined {
        return this.params.checkpointer;
    }

    /**
     * Runs the thread until it ends or pauses and returns its state.
     *
     * A paused thread only moves past its pause when called with `null`.
     * Input sent to a paused thread is merged into its state and checkpointed;
     * the call then returns paused without running any node.
     *
     * @param input - The initial state for a new thread. For an existing
     * thread, an update merged into its state before it continues, or null
     * to continue as is.
     * @param config - The thread to run on (a new one when omitted) and an optional abort signal
     * @returns The state when the run ended or paused
     * @throws {SchemaError} If the input does not fit the schema
     * @throws {NodeExecutionError} If a node fails
     * @throws {RecursionLimitError} If the call runs more steps than the limit allows
     * @throws {GraphCancelledError} If the signal aborts the run
     */
    async invoke(input: Partial<S> | null, config: RunConfig = {}): Promise<S> {
        const result = await this.execute(input, config);
        return result.state;
    }

    /**
     * Like {@link invoke}, but also tells why the run stopped and where a
     * paused thread continues.
     *
     * @returns An end result, or an interrupt result carrying `exitMessage` and `next`
     */
    async execute(input: Partial<S> | null, config: RunConfig = {}): Promise<GraphResult<S>> {
        const steps = this.stream(input, config);
        let item = await steps.next();
        while (!item.done) {
            item = await steps.next();
        }
        return item.value;
    }

    /**
     * Runs the thread and yields the merged state after every checkpointed
     * step. The thread stays locked until the generator finishes, so callers
     * that stop early must call `return()` on it (a `break` out of
     * `for await` does).
     *
     * @param input - As for {@link invoke}
     * @param config - As for {@link invoke}
     * @returns The same result {@link execute} resolves to, once the generator is done
     */
    async *stream(
        input: Partial<S> | null,
        config: RunConfig = {},
    ): AsyncGenerator<StepUpdate<S>, GraphResult<S>, undefined> {
        const threadId = config.threadId ?? createId();
        const runId = createId();
        const runtime = new RuntimeContext({
            threadId,
            runId,
            logger: this.params.logger.child({ threadId, runId }),
            signal: config.signal,
        });
        const checkpointer = this.params.checkpointer ?? new MemoryCheckpointer();

        const release = await checkpointer.acquire(threadId);
        try {
            runtime.transition("running");
            runtime.logger.debug("Run started");
            const result = yield* this.run(input, checkpointer.getStoredThread(threadId), runtime);
            runtime.transition(result.exitReason === "end" ? "completed" : "paused");
            runtime.logger.debug({ exitReason: result.exitReason, step: result.step }, "Run finished");
            return result;
        } catch (error) {
            runtime.transition("failed");
            runtime.logger.error({ err: error }, "Run failed");
            throw error;
        } finally {
            release();
        }
    }

    /**
     * Returns the latest checkpoint of a thread, or null if it has none.
     *
     * @param config - The thread to read
     * @returns A snapshot of the state, the pending nodes and whether the thread is paused
     * @throws {CheckpointError} If the graph was compiled without a checkpointer
     */
    async getState(config: ThreadConfig): Promise<StateSnapshot<S> | null> {
        const checkpointer = this.requireCheckpointer("getState");
        const checkpoint = await checkpointer.getStoredThread(config.threadId).load();
        return checkpoint ? this.snapshot(checkpoint) : null;
    }

    /**
     * Merges `values` into a thread's state through the field reducers,
     * as if a node had returned them. The thread keeps its continuation, so a
     * paused thread resumes from the same place with the edited state.
     *
     * @param config - The thread to edit
     * @param values - A partial state, merged the way a node update is
     * @returns The snapshot saved after the edit
     * @throws {CheckpointError} If the thread has no checkpoint or the graph has no checkpointer
     * @throws {SchemaError} If `values` does not fit the schema
     */
    async updateState(config: ThreadConfig, values: Partial<S>): Promise<StateSnapshot<S>> {
        const checkpointer = this.requireCheckpointer("updateState");
        const release = await checkpointer.acquire(config.threadId);
        try {
            const thread = checkpointer.getStoredThread(config.threadId);
            const checkpoint = await thread.load();
            if (!checkpoint) {
                throw new CheckpointError(`Thread ${config.threadId} has no checkpoint to update`, {
                    context: { threadId: config.threadId },
                });
            }
            const state = mergeState(this.schema, this.loadState(checkpoint), values, "updateState");
            const saved = await thread.save({
                state,
                next: checkpoint.next,
                interrupted: checkpoint.interrupted,
                message: checkpoint.message,
                step: checkpoint.step,
            });
            return this.snapshot(saved);
        } finally {
            release();
        }
    }

    private async *run(
        input: Partial<S> | null,
        thread: StoredThread,
        runtime: RuntimeContext,
    ): AsyncGenerator<StepUpdate<S>, GraphResult<S>, undefined> {
        const { interruptBefore, interruptAfter, recursionLimit, table } = this.params;
        const { threadId } = runtime;

        let checkpoint = await thread.load();
        if (checkpoint === null) {
            if (input === null) {
                throw new SchemaError(`Thread ${threadId} has no checkpoint: an initial state is required`, {
                    context: { threadId },
                });
            }
            const initial = parseState<S>(this.schema, input, "input");
            checkpoint = await thread.save({
                state: initial,
                next: table.resolveEntry(initial),
                interrupted: false,
                step: 0,
            });
        } else {
            this.checkContinuation(checkpoint);
            if (input !== null) {
                const merged = mergeState(this.schema, this.loadState(checkpoint), input, "input");
                checkpoint = await thread.save({
                    state: merged,
                    next: checkpoint.next.length > 0 ? checkpoint.next : table.resolveEntry(merged),
                    interrupted: checkpoint.interrupted,
                    message: checkpoint.message,
                    step: checkpoint.step,
                });
                // input is not an approval: the thread stays paused where it was
                if (checkpoint.interrupted) {
                    const message = checkpoint.message ?? `Interrupted before ${checkpoint.next.join(", ")}`;
                    runtime.logger.warn({ nodes: checkpoint.next, step: checkpoint.step }, message);
                    return this.interrupted(runtime, merged, checkpoint.next, message, checkpoint.step);
                }
            } else if (checkpoint.interrupted) {
                runtime.markResuming();
            }
        }

        let state = this.loadState(checkpoint);
        let next = checkpoint.next;
        let step = checkpoint.step;
        let executed = 0;
        runtime.setStep(step);

        while (next.length > 0) {
            if (!runtime.resuming) {
                const blocked = next.filter((node) => interruptBefore.has(node));
                if (blocked.length > 0) {
                    const message = `Interrupted before ${blocked.join(", ")}`;
                    await thread.save({ state, next, interrupted: true, message, step });
                    runtime.logger.warn({ nodes: blocked, step }, message);
                    return this.interrupted(runtime, state, next, message, step);
                }
            }
            if (executed >= recursionLimit) {
                throw new RecursionLimitError(recursionLimit, threadId);
            }
            runtime.throwIfCancelled();

            runtime.logger.trace({ step: step + 1, nodes: next }, "Executing step");
            const outcomes = await this.runStep(next, state, runtime);

            for (const outcome of outcomes) {
                if (outcome.kind === "interrupt") {
                    const message = outcome.interrupt.reason ?? `Interrupted at ${outcome.node}`;
                    await thread.save({ state, next, interrupted: true, message, step });
                    runtime.logger.warn({ node: outcome.node, step }, message);
                    return this.interrupted(runtime, state, next, message, step);
                }
            }
            const updates: NodeUpdate<S>[] = [];
            for (const outcome of outcomes) {
                if (outcome.kind === "error") {
                    throw new NodeExecutionError(outcome.node, threadId, state, outcome.error);
                }
                if (outcome.kind === "update") {
                    updates.push({ node: outcome.node, update: outcome.update });
                }
            }

            runtime.throwIfCancelled();
            let merged = state;
            for (const { node, update } of updates) {
                merged = mergeState(this.schema, merged, update, node);
            }
            const resolved = table.resolveAll(next, merged);

            const pausedAfter = next.filter((node) => interruptAfter.has(node));
            const interrupted = pausedAfter.length > 0 && resolved.length > 0;
            const message = interrupted ? `Interrupted after ${pausedAfter.join(", ")}` : undefined;
            const completed = next;

            step += 1;
            executed += 1;
            await thread.save({ state: merged, next: resolved, interrupted, message, step });
            runtime.markResumed();
            runtime.setStep(step);
            state = merged;
            next = resolved;

            yield { step, nodes: completed, updates, state: cloneAware(state) };

            if (message !== undefined) {
                runtime.logger.warn({ nodes: pausedAfter, step }, message);
                return this.interrupted(runtime, state, next, message, step);
            }
        }

        return {
            exitReason: "end",
            runId: runtime.runId,
            threadId,
            state,
            step,
        };
    }

    /**
     * Runs the scheduled nodes on copies of the state, at most
     * `maxConcurrency` at a time, and waits for all of them.
     */
    private async runStep(next: readonly string[], state: S, runtime: RuntimeContext): Promise<NodeOutcome<S>[]> {
        const semaphore = new Semaphore(this.params.maxConcurrency);
        return await Promise.all(
            next.map((node) => semaphore.run(() => this.runNode(node, state, runtime))),
        );
    }

    private async runNode(name: string, state: S, runtime: RuntimeContext): Promise<NodeOutcome<S>> {
        const node = this.params.nodes.get(name);
        if (!node) {
            return { node: name, kind: "error", error: new Error(`Node ${name} is not part of this graph`) };
        }
        runtime.logger.trace({ node: name }, "Running node");
        try {
            const update = await node.run(cloneAware(state), runtime.forNode(name));
            return { node: name, kind: "update", update };
        } catch (error) {
            if (error instanceof GraphInterrupt) {
                return { node: name, kind: "interrupt", interrupt: error };
            }
            return { node: name, kind: "error", error };
        }
    }

    private interrupted(
        runtime: RuntimeContext,
        state: S,
        next: string[],
        exitMessage: string,
        step: number,
    ): GraphResult<S> {
        return {
            exitReason: "interrupt",
            exitMessage,
            next: [...next],
            runId: runtime.runId,
            threadId: runtime.threadId,
            state,
            step,
        };
    }

    private loadState(checkpoint: Checkpoint): S {
        return parseState<S>(this.schema, checkpoint.state, `checkpoint of thread ${checkpoint.threadId}`);
    }

    private checkContinuation(checkpoint: Checkpoint): void {
        const unknown = checkpoint.next.filter((node) => !this.params.nodes.has(node));
        if (unknown.length > 0) {
            throw new CheckpointError(
                `Checkpoint of thread ${checkpoint.threadId} continues at unknown node ${unknown.join(", ")}`,
                { context: { threadId: checkpoint.threadId, next: unknown } },
            );
        }
    }

    private snapshot(checkpoint: Checkpoint): StateSnapshot<S> {
        const snapshot: StateSnapshot<S> = {
            values: this.loadState(checkpoint),
            next: [...checkpoint.next],
            interrupted: checkpoint.interrupted,
            step: checkpoint.step,
            checkpointId: checkpoint.id,
            createdAt: checkpoint.createdAt,
        };
        if (checkpoint.message !== undefined) {
            snapshot.exitMessage = checkpoint.message;
        }
        return snapshot;
    }

    private requireCheckpointer(operation: string): BaseCheckpointer {
        if (!this.params.checkpointer) {
            throw new CheckpointError(`${operation} requires a graph compiled with a checkpointer`);
        }
        return this.params.checkpointer;
    }
}

import { type Logger } from "../logger";
import { GraphCancelledError, GraphInterrupt } from "../errors";

/**
 * Lifecycle of a single invocation. A paused thread is resumed by a new
 * invocation, which starts again from `idle`.
 */
export type RunStatus = "idle" | "running" | "paused" | "completed" | "failed";

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
    idle: ["running", "failed"],
    running: ["paused", "completed", "failed"],
    paused: [],
    completed: [],
    failed: [],
};

export interface RuntimeContextOptions {
    threadId: string;
    runId: string;
    logger: Logger;
    signal?: AbortSignal;
}

/**
 * Per-invocation bookkeeping shared by the runner and the nodes it calls:
 * ids, run status, the step counter, the resume flag and cancellation.
 *
 * @example
 * ```typescript
 * const runtime = new RuntimeContext({ threadId: "t-1", runId: createId(), logger });
 * runtime.transition("running");
 * const context = runtime.forNode("agent");
 * ```
 */
export class RuntimeContext {
    public readonly threadId: string;
    public readonly runId: string;
    public readonly logger: Logger;
    public readonly signal?: AbortSignal;

    private _status: RunStatus = "idle";
    private _resuming = false;
    private _step = 0;

    constructor(options: RuntimeContextOptions) {
        this.threadId = options.threadId;
        this.runId = options.runId;
        this.logger = options.logger;
        this.signal = options.signal;
    }

    get status(): RunStatus {
        return this._status;
    }

    /**
     * True while the step that paused the thread is being run again.
     * Nodes that interrupted that step let it pass this time.
     */
    get resuming(): boolean {
        return this._resuming;
    }

    /** Step number of the thread, counted across invocations. */
    get step(): number {
        return this._step;
    }

    transition(to: RunStatus): void {
        if (!TRANSITIONS[this._status].includes(to)) {
            throw new Error(`Invalid run status transition ${this._status} -> ${to}`);
        }
        this._status = to;
    }

    markResuming(): void {
        this._resuming = true;
    }

    markResumed(): void {
        this._resuming = false;
    }

    setStep(step: number): void {
        this._step = step;
    }

    get cancelled(): boolean {
        return this.signal?.aborted ?? false;
    }

    throwIfCancelled(): void {
        if (this.signal?.aborted) {
            throw new GraphCancelledError(this.threadId, this.signal.reason);
        }
    }

    forNode(node: string): NodeContext {
        return new NodeContext(node, this);
    }
}

/**
 * What a node sees of the running invocation besides the state.
 */
export class NodeContext {
    public readonly logger: Logger;

    constructor(
        public readonly node: string,
        private readonly runtime: RuntimeContext,
    ) {
        this.logger = runtime.logger.child({ node });
    }

    get threadId(): string {
        return this.runtime.threadId;
    }

    get runId(): string {
        return this.runtime.runId;
    }

    get step(): number {
        return this.runtime.step;
    }

    get resuming(): boolean {
        return this.runtime.resuming;
    }

    /** Aborted when the caller cancels the invocation. */
    get signal(): AbortSignal | undefined {
        return this.runtime.signal;
    }

    /**
     * Pauses the run before this node's update is applied. The thread is
     * checkpointed with this node still pending; when it is resumed the node
     * runs again and this call returns normally.
     */
    interrupt(reason?: string): void {
        if (!this.runtime.resuming) {
            throw new GraphInterrupt(this.node, reason);
        }
    }
}

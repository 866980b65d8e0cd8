/**
 * A persisted snapshot of one thread: its state and the continuation.
 *
 * `next` is the whole continuation. An empty `next` marks a finished thread;
 * otherwise it names the nodes the next step runs. `interrupted` is set when
 * the run paused at an interrupt boundary before running `next`.
 */
export interface Checkpoint {
    id: string;
    threadId: string;
    state: Record<string, unknown>;
    next: string[];
    interrupted: boolean;
    /** Reason given by a node that interrupted the run, if any. */
    message?: string;
    /** Number of steps completed on this thread. */
    step: number;
    createdAt: string;
}

/** Fields the runner provides; the rest is stamped by {@link StoredThread}. */
export type CheckpointDraft = Pick<Checkpoint, "state" | "next" | "interrupted" | "message" | "step">;

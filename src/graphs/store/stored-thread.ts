import { createId } from "@paralleldrive/cuid2";
import { type BaseCheckpointer } from "./base-checkpointer";
import { type Checkpoint, type CheckpointDraft } from "./checkpoint";
import { CheckpointError, describeError } from "../../errors";

/**
 * Handle on one thread's checkpoint. Stamps new checkpoints with an id and
 * a timestamp, and reports any backend failure as a {@link CheckpointError}.
 *
 * @example
 * ```typescript
 * const thread = checkpointer.getStoredThread("thread-1");
 * const checkpoint = await thread.load();
 * if (checkpoint?.interrupted) {
 *   console.log("Paused before", checkpoint.next);
 * }
 * ```
 */
export class StoredThread {
    constructor(
        public readonly threadId: string,
        private readonly checkpointer: BaseCheckpointer,
    ) { }

    /**
     * Stamps the draft with a new id and the current time and stores it.
     *
     * @param draft - Everything but the id, thread id and timestamp
     * @returns The checkpoint as stored
     * @throws {CheckpointError} If the backend fails
     */
    async save(draft: CheckpointDraft): Promise<Checkpoint> {
        const checkpoint: Checkpoint = {
            id: createId(),
            threadId: this.threadId,
            state: draft.state,
            next: [...draft.next],
            interrupted: draft.interrupted,
            step: draft.step,
            createdAt: new Date().toISOString(),
        };
        if (draft.message !== undefined) {
            checkpoint.message = draft.message;
        }
        try {
            await this.checkpointer.save(this.threadId, checkpoint);
        } catch (error) {
            throw new CheckpointError(`Failed to save checkpoint for thread ${this.threadId}: ${describeError(error)}`, {
                cause: error,
                context: { threadId: this.threadId },
            });
        }
        return checkpoint;
    }

    /**
     * @returns The thread's latest checkpoint, or null if it has none
     * @throws {CheckpointError} If the backend fails
     */
    async load(): Promise<Checkpoint | null> {
        try {
            return await this.checkpointer.load(this.threadId);
        } catch (error) {
            throw new CheckpointError(`Failed to load checkpoint for thread ${this.threadId}: ${describeError(error)}`, {
                cause: error,
                context: { threadId: this.threadId },
            });
        }
    }

    async exists(): Promise<boolean> {
        return (await this.load()) !== null;
    }

    /**
     * @throws {CheckpointError} If the backend fails
     */
    async delete(): Promise<void> {
        try {
            await this.checkpointer.delete(this.threadId);
        } catch (error) {
            throw new CheckpointError(`Failed to delete checkpoint for thread ${this.threadId}: ${describeError(error)}`, {
                cause: error,
                context: { threadId: this.threadId },
            });
        }
    }
}

import { BaseCheckpointer } from "./base-checkpointer";
import { type Checkpoint } from "./checkpoint";
import { cloneAware } from "../../util/clone-aware";

/**
 * Keeps checkpoints in process memory. Stored and returned checkpoints are
 * deep copies, so callers can never alter what is stored.
 */
export class MemoryCheckpointer extends BaseCheckpointer {
    private readonly checkpoints = new Map<string, Checkpoint>();

    /**
     * @param threadId - Thread the checkpoint belongs to
     * @param checkpoint - Copied before it is stored
     */
    async save(threadId: string, checkpoint: Checkpoint): Promise<void> {
        this.checkpoints.set(threadId, cloneAware(checkpoint));
    }

    /**
     * @param threadId - Thread to look up
     * @returns A copy of the stored checkpoint, or null
     */
    async load(threadId: string): Promise<Checkpoint | null> {
        const checkpoint = this.checkpoints.get(threadId);
        return checkpoint ? cloneAware(checkpoint) : null;
    }

    async delete(threadId: string): Promise<void> {
        this.checkpoints.delete(threadId);
    }

    async dispose(): Promise<void> {
        this.checkpoints.clear();
    }

    /** Ids of all threads with a stored checkpoint. */
    threads(): string[] {
        return [...this.checkpoints.keys()];
    }
}

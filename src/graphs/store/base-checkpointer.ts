import { StoredThread } from "./stored-thread";
import { type Checkpoint } from "./checkpoint";
import { ThreadLock, type ReleaseLock } from "../../util/thread-lock";

/**
 * Storage for thread checkpoints. The only persistence abstraction of the
 * engine: compiled graphs read and write checkpoints through it and nothing
 * else.
 *
 * Implementations must make a `save` that has resolved visible to every
 * later `load` of the same thread id. Saves overwrite; the last one wins.
 *
 * @abstract
 *
 * @example
 * ```typescript
 * class FileCheckpointer extends BaseCheckpointer {
 *   async save(threadId: string, checkpoint: Checkpoint): Promise<void> { ... }
 *   async load(threadId: string): Promise<Checkpoint | null> { ... }
 *   async delete(threadId: string): Promise<void> { ... }
 *   async dispose(): Promise<void> { ... }
 * }
 *
 * const graph = builder.compile({ checkpointer: new FileCheckpointer() });
 * ```
 */
export abstract class BaseCheckpointer {
    private readonly locks = new ThreadLock();

    /**
     * Stores the checkpoint for a thread, replacing any previous one.
     *
     * @abstract
     * @param threadId - Thread the checkpoint belongs to
     * @param checkpoint - Complete checkpoint, already stamped with an id and a timestamp
     */
    abstract save(threadId: string, checkpoint: Checkpoint): Promise<void>;

    /**
     * Returns the latest checkpoint for a thread.
     *
     * @abstract
     * @param threadId - Thread to look up
     * @returns The checkpoint, or null if the thread has none
     */
    abstract load(threadId: string): Promise<Checkpoint | null>;

    /**
     * Removes a thread's checkpoint. Deleting an unknown thread does nothing.
     *
     * @abstract
     * @param threadId - Thread to forget
     */
    abstract delete(threadId: string): Promise<void>;

    /**
     * Releases whatever the backend holds open.
     * Called when the checkpointer is no longer needed.
     *
     * @abstract
     */
    abstract dispose(): Promise<void>;

    /**
     * Gets a {@link StoredThread} handle for one thread.
     *
     * @param threadId - Thread the handle reads and writes
     */
    getStoredThread(threadId: string): StoredThread {
        return new StoredThread(threadId, this);
    }

    /**
     * Takes the advisory lock of a thread. Every graph invocation holds it
     * for its whole duration, so steps of one thread never interleave, even
     * across graphs sharing this checkpointer.
     *
     * @param threadId - Thread to lock
     * @returns A function that releases the lock; waiting callers get it in FIFO order
     */
    acquire(threadId: string): Promise<ReleaseLock> {
        return this.locks.acquire(threadId);
    }
}

import { type Database } from "better-sqlite3";
import { z } from "zod";
import { BaseCheckpointer } from "./base-checkpointer";
import { type Checkpoint } from "./checkpoint";
import { decodeValue, encodeValue } from "../../util/serializer";
import { CheckpointError } from "../../errors";

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const rowSchema = z.object({
    checkpoint_id: z.string(),
    thread_id: z.string(),
    state: z.string(),
    next: z.string(),
    interrupted: z.number().int(),
    message: z.string().nullable(),
    step: z.number().int(),
    created_at: z.string(),
});

const stateSchema = z.record(z.string(), z.unknown());
const nextSchema = z.array(z.string());

/**
 * Checkpointer backed by an SQLite table, one row per thread.
 * Registered class instances in the state (messages, dates) are encoded
 * through the serializer, so they come back as instances on load.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 *
 * const checkpointer = new SQLiteCheckpointer(new Database("threads.db"));
 * const graph = builder.compile({ checkpointer });
 *
 * await graph.invoke({ messages: [new UserMessage("hi")] }, { threadId: "t-1" });
 * // after a restart, the same thread continues where it stopped
 * await graph.invoke(null, { threadId: "t-1" });
 *
 * await checkpointer.dispose();
 * ```
 */
export class SQLiteCheckpointer extends BaseCheckpointer {
    /**
     * Creates the table if it does not exist yet.
     *
     * @param tableName - Must be a plain SQL identifier
     */
    constructor(private readonly db: Database, private readonly tableName: string = "checkpoints") {
        super();
        if (!TABLE_NAME_PATTERN.test(tableName)) {
            throw new CheckpointError(`Invalid table name: ${tableName}`);
        }
        this.db.prepare(
            `CREATE TABLE IF NOT EXISTS ${this.tableName} (
                thread_id TEXT PRIMARY KEY,
                checkpoint_id TEXT NOT NULL,
                state TEXT NOT NULL,
                next TEXT NOT NULL,
                interrupted INTEGER NOT NULL,
                message TEXT,
                step INTEGER NOT NULL,
                created_at TEXT NOT NULL
            )`,
        ).run();
    }

    /**
     * Upserts the thread's row. The state is encoded through the registered
     * serializers, so message instances come back as instances.
     *
     * @async
     * @param threadId - Thread the checkpoint belongs to
     * @param checkpoint - Checkpoint to store in place of the current row
     * @throws {Error} If the state holds an instance of an unregistered class
     */
    async save(threadId: string, checkpoint: Checkpoint): Promise<void> {
        this.db.prepare(
            `INSERT INTO ${this.tableName} (thread_id, checkpoint_id, state, next, interrupted, message, step, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT(thread_id) DO UPDATE SET
                checkpoint_id = excluded.checkpoint_id,
                state = excluded.state,
                next = excluded.next,
                interrupted = excluded.interrupted,
                message = excluded.message,
                step = excluded.step,
                created_at = excluded.created_at`,
        ).run(
            threadId,
            checkpoint.id,
            JSON.stringify(encodeValue(checkpoint.state)),
            JSON.stringify(checkpoint.next),
            checkpoint.interrupted ? 1 : 0,
            checkpoint.message ?? null,
            checkpoint.step,
            checkpoint.createdAt,
        );
    }

    /**
     * Reads and validates the thread's row.
     *
     * @async
     * @param threadId - Thread to look up
     * @returns The checkpoint, or null if the table has no row for the thread
     * @throws {z.ZodError} If the row is malformed
     */
    async load(threadId: string): Promise<Checkpoint | null> {
        const raw: unknown = this.db.prepare(
            `SELECT checkpoint_id, thread_id, state, next, interrupted, message, step, created_at
             FROM ${this.tableName} WHERE thread_id = ?`,
        ).get(threadId);
        if (raw === undefined) {
            return null;
        }
        const row = rowSchema.parse(raw);
        const checkpoint: Checkpoint = {
            id: row.checkpoint_id,
            threadId: row.thread_id,
            state: stateSchema.parse(decodeValue(JSON.parse(row.state))),
            next: nextSchema.parse(JSON.parse(row.next)),
            interrupted: row.interrupted === 1,
            step: row.step,
            createdAt: row.created_at,
        };
        if (row.message !== null) {
            checkpoint.message = row.message;
        }
        return checkpoint;
    }

    /**
     * Deletes the thread's row, if any.
     *
     * @async
     * @param threadId - Thread to forget
     */
    async delete(threadId: string): Promise<void> {
        this.db.prepare(`DELETE FROM ${this.tableName} WHERE thread_id = ?`).run(threadId);
    }

    /**
     * Closes the database connection.
     *
     * @async
     */
    async dispose(): Promise<void> {
        this.db.close();
    }
}

import { describe, expect, it } from "vitest";
import { MemoryCheckpointer } from "./memory-checkpointer";
import { BaseCheckpointer } from "./base-checkpointer";
import { type Checkpoint } from "./checkpoint";
import { CheckpointError } from "../../errors";
import { UserMessage } from "../../messages";

describe("MemoryCheckpointer", () => {
    it("returns what was saved, as an independent copy", async () => {
        const checkpointer = new MemoryCheckpointer();
        const thread = checkpointer.getStoredThread("thread-1");
        const state = { messages: [new UserMessage("hi")], count: 1 };

        const saved = await thread.save({ state, next: ["agent"], interrupted: false, step: 0 });
        state.count = 99;
        const loaded = await thread.load();

        expect(loaded?.id).toBe(saved.id);
        expect(loaded?.next).toEqual(["agent"]);
        expect(loaded?.state).toEqual({ messages: [new UserMessage("hi")], count: 1 });
    });

    it("overwrites the previous checkpoint", async () => {
        const checkpointer = new MemoryCheckpointer();
        const thread = checkpointer.getStoredThread("thread-1");
        await thread.save({ state: { count: 1 }, next: ["a"], interrupted: false, step: 1 });
        const second = await thread.save({ state: { count: 2 }, next: [], interrupted: false, step: 2 });

        expect(await thread.load()).toEqual(second);
        expect(checkpointer.threads()).toEqual(["thread-1"]);
    });

    it("stamps ids and timestamps and keeps the interrupt message", async () => {
        const thread = new MemoryCheckpointer().getStoredThread("thread-1");
        const saved = await thread.save({
            state: {},
            next: ["review"],
            interrupted: true,
            message: "Needs approval",
            step: 3,
        });

        expect(saved.id).toEqual(expect.any(String));
        expect(saved.threadId).toBe("thread-1");
        expect(Number.isNaN(Date.parse(saved.createdAt))).toBe(false);
        expect(saved.message).toBe("Needs approval");
    });

    it("keeps threads apart", async () => {
        const checkpointer = new MemoryCheckpointer();
        await checkpointer.getStoredThread("a").save({ state: { owner: "a" }, next: [], interrupted: false, step: 1 });
        await checkpointer.getStoredThread("b").save({ state: { owner: "b" }, next: [], interrupted: false, step: 1 });

        expect((await checkpointer.load("a"))?.state).toEqual({ owner: "a" });
        expect((await checkpointer.load("b"))?.state).toEqual({ owner: "b" });
        expect(await checkpointer.load("c")).toBeNull();
    });

    it("deletes a thread", async () => {
        const checkpointer = new MemoryCheckpointer();
        const thread = checkpointer.getStoredThread("thread-1");
        await thread.save({ state: {}, next: [], interrupted: false, step: 0 });
        await thread.delete();

        expect(await thread.exists()).toBe(false);
    });
});

class FailingCheckpointer extends BaseCheckpointer {
    async save(_threadId: string, _checkpoint: Checkpoint): Promise<void> {
        throw new Error("disk full");
    }

    async load(_threadId: string): Promise<Checkpoint | null> {
        throw new Error("disk unreadable");
    }

    async delete(_threadId: string): Promise<void> { }

    async dispose(): Promise<void> { }
}

describe("StoredThread", () => {
    it("reports backend failures as checkpoint errors", async () => {
        const thread = new FailingCheckpointer().getStoredThread("thread-1");

        await expect(thread.save({ state: {}, next: [], interrupted: false, step: 0 })).rejects.toThrow(
            new CheckpointError("Failed to save checkpoint for thread thread-1: disk full"),
        );
        await expect(thread.load()).rejects.toBeInstanceOf(CheckpointError);
    });
});

describe("BaseCheckpointer.acquire", () => {
    it("serializes access to one thread", async () => {
        const checkpointer = new MemoryCheckpointer();
        const order: string[] = [];

        const release = await checkpointer.acquire("thread-1");
        const waiting = checkpointer.acquire("thread-1").then((next) => {
            order.push("second");
            next();
        });
        order.push("first");
        release();
        await waiting;

        expect(order).toEqual(["first", "second"]);
    });
});

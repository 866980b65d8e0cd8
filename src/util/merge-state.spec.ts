import { describe, expect, it } from "vitest";
import { z } from "zod";
import { mergeState, parseState } from "./merge-state";
import { STATE_MERGE } from "../graphs/registry";
import { appendReducer } from "../graphs/reducers";
import { SchemaError } from "../errors";
import { type ModelMessages, AgentMessage, UserMessage } from "../messages";

const schema = z.object({
    count: z.number(),
    log: z.array(z.string()).register(STATE_MERGE, { merge: appendReducer }),
    note: z.string().optional(),
});
type State = z.infer<typeof schema>;

const base: State = { count: 1, log: ["a"] };

describe("mergeState", () => {
    it("replaces fields without a reducer", () => {
        expect(mergeState(schema, base, { count: 2 })).toEqual({ count: 2, log: ["a"] });
    });

    it("applies the registered reducer", () => {
        expect(mergeState(schema, base, { log: ["b"] })).toEqual({ count: 1, log: ["a", "b"] });
    });

    it("appends in the order updates are merged", () => {
        const first = mergeState<State>(schema, { count: 0, log: [] }, { log: ["a"] });
        const second = mergeState(schema, first, { log: ["b"] });
        expect(second.log).toEqual(["a", "b"]);
    });

    it("leaves fields absent from the update untouched", () => {
        const result = mergeState(schema, { ...base, note: "keep" }, { count: 5 });
        expect(result).toEqual({ count: 5, log: ["a"], note: "keep" });
    });

    it("sets an optional field that had no value", () => {
        expect(mergeState(schema, base, { note: "first" })).toEqual({ count: 1, log: ["a"], note: "first" });
    });

    it("does not mutate its inputs", () => {
        const current: State = { count: 1, log: ["a"] };
        const update: Partial<State> = { log: ["b"] };
        mergeState(schema, current, update);
        expect(current).toEqual({ count: 1, log: ["a"] });
        expect(update).toEqual({ log: ["b"] });
    });

    it("rejects undeclared fields and names the source", () => {
        const update: Record<string, unknown> = { count: 2, unknown: true };
        expect(() => mergeState<Record<string, unknown>>(schema, base, update, "writer")).toThrow(
            new SchemaError('Update from writer sets undeclared field "unknown"'),
        );
    });

    it("rejects updates that are not plain objects", () => {
        const update: Record<string, unknown> = Object.create(new Map());
        update.count = 2;
        expect(() => mergeState<Record<string, unknown>>(schema, base, update, "writer")).toThrow("Update from writer must be a plain object");
    });

    it("reports values the schema rejects", () => {
        const update: Record<string, unknown> = { count: "two" };
        expect(() => mergeState<Record<string, unknown>>(schema, base, update, "writer")).toThrow(SchemaError);
        expect(() => mergeState<Record<string, unknown>>(schema, base, update, "writer")).toThrow(/^Invalid state after writer: count: /);
    });

    it("surfaces reducer type errors", () => {
        const update: Record<string, unknown> = { log: "b" };
        expect(() => mergeState<Record<string, unknown>>(schema, base, update)).toThrow(
            new TypeError("append reducer expects two arrays, got array and string"),
        );
    });

    it("keeps message instances through an append", () => {
        const chat = z.object({
            messages: z.array(z.custom<ModelMessages>()).register(STATE_MERGE, { merge: appendReducer }),
        });
        const result = mergeState<{ messages: ModelMessages[] }>(chat, { messages: [new UserMessage("hi")] }, { messages: [new AgentMessage("hello")] });
        expect(result.messages).toHaveLength(2);
        expect(result.messages[1]).toBeInstanceOf(AgentMessage);
    });
});

describe("parseState", () => {
    it("returns a valid state", () => {
        expect(parseState<State>(schema, { count: 3, log: [] })).toEqual({ count: 3, log: [] });
    });

    it("reports missing fields with their path", () => {
        expect(() => parseState(schema, { log: [] }, "input")).toThrow(/^Invalid input: count: /);
    });

    it("rejects undeclared fields instead of stripping them", () => {
        expect(() => parseState(schema, { count: 1, log: [], bogus: 1 }, "input")).toThrow(
            new SchemaError('Invalid input: undeclared field "bogus"'),
        );
    });

    it("reports a non-object value at the root", () => {
        expect(() => parseState(schema, 5, "input")).toThrow(/^Invalid input: \(root\): /);
    });
});

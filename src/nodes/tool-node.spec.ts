import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ToolNode, pendingToolRequests, toolsCondition } from "./tool-node";
import { defineTool, tool } from "../tools";
import { RuntimeContext } from "../graphs/runtime-context";
import { END } from "../graphs/constants";
import { createLogger } from "../logger";
import { AgentMessage, ToolError, ToolRequest, ToolResponse, UserMessage } from "../messages";

const context = new RuntimeContext({
    threadId: "thread-1",
    runId: "run-1",
    logger: createLogger({ level: "silent" }),
}).forNode("tools");

const calculator = tool(
    defineTool("calculator", "Adds two numbers", z.object({ a: z.number(), b: z.number() })),
    ({ a, b }) => ({ sum: a + b }),
);

const failing = tool(
    defineTool("failing", "Always fails", z.object({})),
    async () => {
        throw new Error("service unavailable");
    },
);

describe("pendingToolRequests", () => {
    it("returns the trailing run of tool requests", () => {
        const first = new ToolRequest("call-2", "calculator", { a: 1, b: 2 });
        const second = new ToolRequest("call-3", "calculator", { a: 3, b: 4 });
        const messages = [
            new UserMessage("add"),
            new ToolRequest("call-1", "calculator", { a: 0, b: 0 }),
            new ToolResponse("call-1", "calculator", { sum: 0 }),
            first,
            second,
        ];

        expect(pendingToolRequests(messages)).toEqual([first, second]);
    });

    it("returns nothing when the last message is not a request", () => {
        expect(pendingToolRequests([new AgentMessage("done")])).toEqual([]);
        expect(pendingToolRequests([])).toEqual([]);
    });
});

describe("toolsCondition", () => {
    it("routes to the tools while requests are pending", () => {
        expect(toolsCondition({ messages: [new ToolRequest("call-1", "calculator", {})] })).toBe("tools");
        expect(toolsCondition({ messages: [new AgentMessage("done")] })).toBe(END);
    });
});

describe("ToolNode", () => {
    it("answers every request in order, tagged with its id", async () => {
        const node = new ToolNode([calculator]);
        const result = await node.run({
            messages: [
                new ToolRequest("call-1", "calculator", { a: 1, b: 2 }),
                new ToolRequest("call-2", "calculator", { a: 10, b: 20 }),
            ],
        }, context);

        expect(result).toEqual({
            messages: [
                new ToolResponse("call-1", "calculator", { sum: 3 }),
                new ToolResponse("call-2", "calculator", { sum: 30 }),
            ],
        });
    });

    it("turns failures into error entries without affecting siblings", async () => {
        const node = new ToolNode([calculator, failing]);
        const result = await node.run({
            messages: [
                new ToolRequest("call-1", "failing", {}),
                new ToolRequest("call-2", "calculator", { a: 2, b: 2 }),
                new ToolRequest("call-3", "missing", {}),
            ],
        }, context);

        expect(result.messages).toEqual([
            new ToolError("call-1", "failing", "service unavailable"),
            new ToolResponse("call-2", "calculator", { sum: 4 }),
            new ToolError("call-3", "missing", "Tool missing not found"),
        ]);
        expect(result.messages?.[0]).toBeInstanceOf(ToolError);
    });

    it("rejects input that does not match the tool schema", async () => {
        const node = new ToolNode([calculator]);
        const result = await node.run({
            messages: [new ToolRequest("call-1", "calculator", { a: "one", b: 2 })],
        }, context);

        const [entry] = result.messages ?? [];
        expect(entry).toBeInstanceOf(ToolError);
        expect(entry instanceof ToolError && entry.error.startsWith("Invalid input for tool calculator: ")).toBe(true);
    });

    it("limits how many calls run at once", async () => {
        let active = 0;
        let peak = 0;
        const slow = tool(
            defineTool("slow", "Waits a little", z.object({ id: z.number() })),
            async ({ id }) => {
                active++;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setTimeout(resolve, 5));
                active--;
                return id;
            },
        );
        const node = new ToolNode([slow], { maxConcurrency: 2 });
        const result = await node.run({
            messages: [1, 2, 3, 4].map((id) => new ToolRequest(`call-${id}`, "slow", { id })),
        }, context);

        expect(peak).toBe(2);
        expect(result.messages).toHaveLength(4);
    });

    it("returns no update without pending requests", async () => {
        const node = new ToolNode([calculator]);
        expect(await node.run({ messages: [new AgentMessage("done")] }, context)).toEqual({});
    });

    it("refuses two tools with the same name", () => {
        expect(() => new ToolNode([calculator, calculator])).toThrow("Tool calculator is registered twice");
    });
});

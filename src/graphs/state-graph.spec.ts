import { describe, expect, it } from "vitest";
import { z } from "zod";
import { StateGraph } from "./state-graph";
import { CompiledGraph } from "./compiled-graph";
import { END, START } from "./constants";
import { MemoryCheckpointer } from "./store/memory-checkpointer";
import { GraphIntegrityError } from "../errors";

const schema = z.object({ count: z.number() });
type State = z.infer<typeof schema>;

const increment = (state: State) => ({ count: state.count + 1 });

function compileError(build: () => unknown): string {
    try {
        build();
    } catch (error) {
        expect(error).toBeInstanceOf(GraphIntegrityError);
        return error instanceof Error ? error.message : String(error);
    }
    throw new Error("expected a GraphIntegrityError");
}

describe("StateGraph", () => {
    describe("addNode", () => {
        it.each([START, END])("rejects the reserved name %s", (name) => {
            expect(() => new StateGraph(schema).addNode(name, increment)).toThrow(`Node name ${name} is reserved`);
        });

        it("rejects duplicate names", () => {
            const graph = new StateGraph(schema).addNode("a", increment);
            expect(() => graph.addNode("a", increment)).toThrow(new GraphIntegrityError("Node a already exists"));
        });
    });

    describe("addConditionalEdges", () => {
        it("allows one conditional edge per node", () => {
            const graph = new StateGraph(schema)
                .addNode("a", increment)
                .addConditionalEdges("a", () => "done", { done: END });
            expect(() => graph.addConditionalEdges("a", () => "done", { done: END })).toThrow(
                "Node a already has a conditional edge",
            );
        });

        it("rejects an empty mapping", () => {
            const graph = new StateGraph(schema).addNode("a", increment);
            expect(() => graph.addConditionalEdges("a", () => "x", [])).toThrow("Conditional edge from a has an empty mapping");
        });
    });

    describe("compile", () => {
        it("returns a compiled graph for a valid definition", () => {
            const graph = new StateGraph(schema)
                .addNode("a", increment)
                .setEntryPoint("a")
                .setFinishPoint("a")
                .compile();
            expect(graph).toBeInstanceOf(CompiledGraph);
        });

        it("requires an entry point", () => {
            const build = () => new StateGraph(schema).addNode("a", increment).addEdge("a", END).compile();
            expect(compileError(build)).toBe("Graph has no entry point: add an edge from __start__");
        });

        it("rejects edges to unknown nodes", () => {
            const build = () => new StateGraph(schema).addNode("a", increment).addEdge(START, "a").addEdge("a", "b").compile();
            expect(compileError(build)).toBe("Edge from a to unknown node b");
        });

        it("rejects edges from unknown nodes", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .addEdge(START, "a")
                .addEdge("a", END)
                .addEdge("ghost", "a")
                .compile();
            expect(compileError(build)).toBe("Edge from unknown node ghost");
        });

        it("rejects conditional targets that do not exist", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .addEdge(START, "a")
                .addConditionalEdges("a", () => "next", { next: "b" })
                .compile();
            expect(compileError(build)).toBe("Edge from a to unknown node b");
        });

        it("rejects edges into START and out of END", () => {
            const intoStart = () => new StateGraph(schema).addNode("a", increment).addEdge(START, "a").addEdge("a", START).compile();
            expect(compileError(intoStart)).toBe("Edges cannot enter __start__");
            const outOfEnd = () => new StateGraph(schema).addNode("a", increment).addEdge(START, "a").addEdge(END, "a").compile();
            expect(compileError(outOfEnd)).toBe("Edges cannot leave __end__");
        });

        it("rejects nodes unreachable from START", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .addNode("orphan", increment)
                .addEdge(START, "a")
                .addEdge("a", END)
                .addEdge("orphan", END)
                .compile();
            expect(compileError(build)).toBe("Node orphan is not reachable from __start__");
        });

        it("rejects dangling nodes without outgoing edges", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .addNode("dangling", increment)
                .addEdge(START, "a")
                .addEdge("a", "dangling")
                .addEdge("a", END)
                .compile();
            expect(compileError(build)).toBe("Node dangling has no outgoing edge");
        });

        it("rejects cycles with no way out to END", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .addNode("b", increment)
                .addNode("c", increment)
                .addEdge(START, "a")
                .addConditionalEdges("a", (): "b" | "end" => "b", { b: "b", end: END })
                .addEdge("a", "c")
                .addEdge("c", "b")
                .addEdge("b", "c")
                .compile();
            expect(compileError(build)).toBe("Node c has no path to __end__");
        });

        it("accepts loops that can reach END", () => {
            const build = () => new StateGraph(schema)
                .addNode("agent", increment)
                .addNode("tools", increment)
                .addEdge(START, "agent")
                .addConditionalEdges("agent", (state) => (state.count > 2 ? END : "tools"), ["tools", END])
                .addEdge("tools", "agent")
                .compile();
            expect(build).not.toThrow();
        });

        it("rejects interrupts on unknown nodes", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .setEntryPoint("a")
                .setFinishPoint("a")
                .compile({ checkpointer: new MemoryCheckpointer(), interruptBefore: ["b"] });
            expect(compileError(build)).toBe("interruptBefore names unknown node b");
        });

        it("requires a checkpointer for interrupts", () => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .setEntryPoint("a")
                .setFinishPoint("a")
                .compile({ interruptAfter: ["a"] });
            expect(compileError(build)).toBe("Interrupts require a checkpointer to resume from");
        });

        it.each([0, 2.5])("rejects recursionLimit %s", (recursionLimit) => {
            const build = () => new StateGraph(schema)
                .addNode("a", increment)
                .setEntryPoint("a")
                .setFinishPoint("a")
                .compile({ recursionLimit });
            expect(compileError(build)).toBe(`recursionLimit must be a positive integer, got ${recursionLimit}`);
        });
    });
});

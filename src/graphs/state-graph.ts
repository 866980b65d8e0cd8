import { z } from "zod";
import { END, START } from "./constants";
import { type Branch, type BranchFunction, EdgeTable } from "./edge-table";
import { CompiledGraph } from "./compiled-graph";
import { type CompileOptions } from "./types";
import { type NodeLike, type StepFunction } from "../nodes/types";
import { FunctionNode, isNodeLike } from "../nodes/function-node";
import { GraphIntegrityError } from "../errors";
import { getConfig } from "../config";
import { logger as defaultLogger } from "../logger";

/**
 * Where the keys of a conditional edge lead. An array maps every key to the
 * node of the same name.
 */
export type BranchMapping<K extends string> = Readonly<Record<K, string>> | readonly K[];

function isTargetList<K extends string>(mapping: BranchMapping<K>): mapping is readonly K[] {
    return Array.isArray(mapping);
}

/**
 * Builder for a graph of nodes sharing one state described by a zod schema.
 * Nothing is checked until {@link compile}, which validates the whole graph
 * and returns the runnable {@link CompiledGraph}.
 *
 * @template Z - The zod schema of the state
 * @template S - The state type inferred from Z
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   messages: z.array(z.custom<ModelMessages>()).register(STATE_MERGE, { merge: appendReducer }),
 * });
 *
 * const graph = new StateGraph(schema)
 *   .addNode("agent", callModel)
 *   .addNode("tools", new ToolNode([search]))
 *   .addEdge(START, "agent")
 *   .addConditionalEdges("agent", toolsCondition, { tools: "tools", [END]: END })
 *   .addEdge("tools", "agent")
 *   .compile({ checkpointer: new MemoryCheckpointer() });
 * ```
 */
export class StateGraph<Z extends z.ZodObject, S extends Record<string, unknown> = z.infer<Z>> {
    private readonly nodes = new Map<string, NodeLike<S>>();
    private readonly edges = new Map<string, string[]>();
    private readonly branches = new Map<string, Branch<S>>();

    constructor(public readonly schema: Z) { }

    /**
     * Adds a node. A plain step function is wrapped in a {@link FunctionNode}.
     *
     * @throws {GraphIntegrityError} If the name is reserved or already taken
     */
    addNode(name: string, node: NodeLike<S> | StepFunction<S>): this {
        if (name === START || name === END) {
            throw new GraphIntegrityError(`Node name ${name} is reserved`);
        }
        if (name.length === 0) {
            throw new GraphIntegrityError("Node name must not be empty");
        }
        if (this.nodes.has(name)) {
            throw new GraphIntegrityError(`Node ${name} already exists`);
        }
        this.nodes.set(name, isNodeLike(node) ? node : new FunctionNode(node));
        return this;
    }

    /**
     * Adds an unconditional edge. Several edges out of one node fan out: all
     * their targets run in the same step. Adding the same edge twice has no
     * effect.
     */
    addEdge(from: string, to: string): this {
        const targets = this.edges.get(from) ?? [];
        if (!targets.includes(to)) {
            targets.push(to);
        }
        this.edges.set(from, targets);
        return this;
    }

    /**
     * Adds a conditional edge: after `from` runs, `branch` picks one or more
     * keys and `mapping` turns them into the nodes to run next. A key may map
     * to `END`.
     *
     * @throws {GraphIntegrityError} If `from` already has a conditional edge or the mapping is empty
     *
     * @example
     * ```typescript
     * graph.addConditionalEdges(
     *   "supervisor",
     *   (state) => state.route,
     *   { coder: "coder_node", writer: "writer_node", done: END },
     * );
     * ```
     */
    addConditionalEdges<K extends string>(
        from: string,
        branch: BranchFunction<S, K>,
        mapping: BranchMapping<K>,
    ): this {
        if (this.branches.has(from)) {
            throw new GraphIntegrityError(`Node ${from} already has a conditional edge`);
        }
        const resolved: Record<string, string> = {};
        if (isTargetList(mapping)) {
            for (const target of mapping) {
                resolved[target] = target;
            }
        } else {
            for (const [key, target] of Object.entries<string>(mapping)) {
                resolved[key] = target;
            }
        }
        if (Object.keys(resolved).length === 0) {
            throw new GraphIntegrityError(`Conditional edge from ${from} has an empty mapping`);
        }
        this.branches.set(from, { branch, mapping: Object.freeze(resolved) });
        return this;
    }

    setEntryPoint(name: string): this {
        return this.addEdge(START, name);
    }

    setFinishPoint(name: string): this {
        return this.addEdge(name, END);
    }

    /**
     * Validates the graph and freezes it into a runnable graph. Later changes
     * to this builder do not affect graphs already compiled.
     *
     * @throws {GraphIntegrityError} If an edge names an unknown node, a node is
     * unreachable from `START` or cannot reach `END`, or the options are invalid
     */
    compile(options: CompileOptions = {}): CompiledGraph<Z, S> {
        this.checkEndpoints();
        if (!this.edges.has(START) && !this.branches.has(START)) {
            throw new GraphIntegrityError(`Graph has no entry point: add an edge from ${START}`);
        }

        const edges = new Map<string, readonly string[]>();
        for (const [from, targets] of this.edges) {
            edges.set(from, Object.freeze([...targets]));
        }
        const table = new EdgeTable<S>([...this.nodes.keys()], edges, new Map(this.branches));
        this.checkPaths(table);

        const interruptBefore = this.checkInterrupts("interruptBefore", options.interruptBefore);
        const interruptAfter = this.checkInterrupts("interruptAfter", options.interruptAfter);
        if ((interruptBefore.size > 0 || interruptAfter.size > 0) && !options.checkpointer) {
            throw new GraphIntegrityError("Interrupts require a checkpointer to resume from");
        }

        const config = getConfig();
        return new CompiledGraph(this.schema, {
            nodes: new Map(this.nodes),
            table,
            checkpointer: options.checkpointer,
            interruptBefore,
            interruptAfter,
            recursionLimit: positiveInteger("recursionLimit", options.recursionLimit ?? config.recursionLimit),
            maxConcurrency: positiveInteger("maxConcurrency", options.maxConcurrency ?? config.maxConcurrency),
            logger: options.logger ?? defaultLogger,
        });
    }

    private checkEndpoints(): void {
        const check = (from: string, to: string) => {
            if (from === END) {
                throw new GraphIntegrityError(`Edges cannot leave ${END}`);
            }
            if (from !== START && !this.nodes.has(from)) {
                throw new GraphIntegrityError(`Edge from unknown node ${from}`);
            }
            if (to === START) {
                throw new GraphIntegrityError(`Edges cannot enter ${START}`);
            }
            if (to !== END && !this.nodes.has(to)) {
                throw new GraphIntegrityError(`Edge from ${from} to unknown node ${to}`);
            }
        };
        for (const [from, targets] of this.edges) {
            targets.forEach((to) => check(from, to));
        }
        for (const [from, { mapping }] of this.branches) {
            Object.values(mapping).forEach((to) => check(from, to));
        }
    }

    private checkPaths(table: EdgeTable<S>): void {
        const reachable = new Set<string>();
        const queue: string[] = [START];
        const incoming = new Map<string, string[]>();
        for (let from = queue.shift(); from !== undefined; from = queue.shift()) {
            for (const to of table.targets(from)) {
                incoming.set(to, [...(incoming.get(to) ?? []), from]);
                if (to !== END && !reachable.has(to)) {
                    reachable.add(to);
                    queue.push(to);
                }
            }
        }

        for (const name of this.nodes.keys()) {
            if (!reachable.has(name)) {
                throw new GraphIntegrityError(`Node ${name} is not reachable from ${START}`);
            }
            if (!table.hasOutgoing(name)) {
                throw new GraphIntegrityError(`Node ${name} has no outgoing edge`);
            }
        }

        const reachesEnd = new Set<string>();
        const pending: string[] = [END];
        for (let to = pending.shift(); to !== undefined; to = pending.shift()) {
            for (const from of incoming.get(to) ?? []) {
                if (!reachesEnd.has(from)) {
                    reachesEnd.add(from);
                    pending.push(from);
                }
            }
        }
        for (const name of reachable) {
            if (!reachesEnd.has(name)) {
                throw new GraphIntegrityError(`Node ${name} has no path to ${END}`);
            }
        }
    }

    private checkInterrupts(option: string, names: readonly string[] = []): ReadonlySet<string> {
        for (const name of names) {
            if (!this.nodes.has(name)) {
                throw new GraphIntegrityError(`${option} names unknown node ${name}`);
            }
        }
        return new Set(names);
    }
}

function positiveInteger(option: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new GraphIntegrityError(`${option} must be a positive integer, got ${value}`);
    }
    return value;
}

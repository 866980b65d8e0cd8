import { END, START } from "./constants";
import { RoutingError } from "../errors";

/**
 * Picks the branch key(s) to follow from the current state. Must only read
 * the state: it is called once per resolution and its result is not cached.
 * Returning several keys fans out to several nodes.
 */
export type BranchFunction<S, K extends string = string> = (state: S) => K | readonly K[];

/**
 * A conditional edge after compilation: the branch function and a frozen
 * key-to-target mapping.
 */
export interface Branch<S> {
    readonly branch: BranchFunction<S>;
    readonly mapping: Readonly<Record<string, string>>;
}

/**
 * The compiled topology of a graph. Built once by `StateGraph.compile()`
 * and never modified afterwards.
 *
 * @example
 * ```typescript
 * const table = new EdgeTable(
 *   ["agent", "tools"],
 *   new Map([[START, ["agent"]], ["tools", ["agent"]]]),
 *   new Map([["agent", { branch: toolsCondition, mapping: { tools: "tools", [END]: END } }]]),
 * );
 * table.resolveNext("agent", state); // ["tools"] or [END]
 * ```
 */
export class EdgeTable<S> {
    private readonly order: ReadonlyMap<string, number>;

    constructor(
        nodeOrder: readonly string[],
        private readonly edges: ReadonlyMap<string, readonly string[]>,
        private readonly branches: ReadonlyMap<string, Branch<S>>,
    ) {
        this.order = new Map(nodeOrder.map((name, index) => [name, index]));
    }

    /**
     * Every node that can follow `from`, whatever the state.
     */
    targets(from: string): string[] {
        const targets = [...(this.edges.get(from) ?? [])];
        const branch = this.branches.get(from);
        if (branch) {
            targets.push(...Object.values(branch.mapping));
        }
        return unique(targets);
    }

    hasOutgoing(from: string): boolean {
        return this.edges.has(from) || this.branches.has(from);
    }

    /**
     * Resolves the nodes that follow `from` for the given state: its static
     * targets first, then the targets the branch function selects.
     *
     * @throws {RoutingError} If the branch function returns a key its mapping lacks
     */
    resolveNext(from: string, state: S): string[] {
        const next = [...(this.edges.get(from) ?? [])];
        const branch = this.branches.get(from);
        if (branch) {
            const selected = branch.branch(state);
            const keys: readonly unknown[] = Array.isArray(selected) ? selected : [selected];
            for (const key of keys) {
                if (typeof key !== "string" || !Object.hasOwn(branch.mapping, key)) {
                    throw new RoutingError(from, key, Object.keys(branch.mapping));
                }
                const target = branch.mapping[key];
                if (target !== undefined) {
                    next.push(target);
                }
            }
        }
        return unique(next);
    }

    /**
     * Resolves the set of nodes to run after all of `from` completed.
     * The result is ordered by node declaration and contains no duplicates.
     * `END` is never part of it: an empty result means the run is over.
     */
    resolveAll(from: readonly string[], state: S): string[] {
        return unique(from.flatMap((node) => this.resolveNext(node, state)))
            .filter((node) => node !== END)
            .sort((a, b) => this.rank(a) - this.rank(b));
    }

    /**
     * Nodes that run first, i.e. the resolution of `START`.
     */
    resolveEntry(state: S): string[] {
        return this.resolveAll([START], state);
    }

    private rank(node: string): number {
        return this.order.get(node) ?? Number.MAX_SAFE_INTEGER;
    }
}

function unique(values: readonly string[]): string[] {
    return [...new Set(values)];
}


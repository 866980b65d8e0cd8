import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
    LOOMGRAPH_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    LOOMGRAPH_RECURSION_LIMIT: z.coerce.number().int().positive().default(25),
    LOOMGRAPH_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export interface EngineConfig {
    logLevel: LogLevel;
    /** Maximum number of steps a single invocation may execute. */
    recursionLimit: number;
    /** Maximum number of nodes run in parallel within one fan-out step. */
    maxConcurrency: number;
}

/**
 * Reads engine defaults from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
    const relevant: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value !== "") {
            relevant[key] = value;
        }
    }
    const parsed = envSchema.safeParse(relevant);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid engine configuration: ${details}`);
    }
    return {
        logLevel: parsed.data.LOOMGRAPH_LOG_LEVEL,
        recursionLimit: parsed.data.LOOMGRAPH_RECURSION_LIMIT,
        maxConcurrency: parsed.data.LOOMGRAPH_MAX_CONCURRENCY,
    };
}

let cached: EngineConfig | undefined;

export function getConfig(): EngineConfig {
    if (!cached) {
        cached = loadConfig();
    }
    return cached;
}

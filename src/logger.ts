import pino, { type Logger } from "pino";
import { getConfig, type LogLevel } from "./config";

export type { Logger };

export interface LoggerOptions {
    name?: string;
    level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return pino({
        name: options.name ?? "loomgraph",
        level: options.level ?? getConfig().logLevel,
    });
}

/** Default logger for compiled graphs that are not given one. */
export const logger = createLogger();

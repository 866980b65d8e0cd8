export * from "./graphs";
export * from "./nodes";
export * from "./messages";
export * from "./errors";
export { defineTool, tool, type ToolDefinition, type ToolImplementation } from "./tools";
export { createLogger, logger, type Logger, type LoggerOptions } from "./logger";
export { loadConfig, getConfig, LOG_LEVELS, type EngineConfig, type LogLevel } from "./config";
export { mergeState, parseState } from "./util/merge-state";
export { registerSerializer, type Serializer } from "./util/serializer";

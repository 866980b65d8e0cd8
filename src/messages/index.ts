import { type BaseMessage } from "./message";
import { type ToolUse } from "./tool";

export type ModelMessages = BaseMessage | ToolUse;

export * from "./message";
export * from "./tool";

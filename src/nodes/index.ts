export { FunctionNode, makeNode, isNodeLike } from "./function-node";
export { InterruptNode } from "./interrupt-node";
export { ToolNode, toolsCondition, pendingToolRequests, type ToolState, type ToolNodeOptions } from "./tool-node";
export { type NodeLike, type StepFunction } from "./types";

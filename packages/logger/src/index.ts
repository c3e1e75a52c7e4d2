export { createNodeLogger, formatShard, type LifecycleLogger, withShardContext } from "./node.js";
export type { Logger } from "pino";
export * from "./redaction.js";
export * from "./types.js";

import { createNodeLogger, type LifecycleLogger } from "@shardline/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "gateway",
	level: process.env.LOG_LEVEL === "debug" ? "debug" : process.env.LOG_LEVEL === "trace" ? "trace" : "info",
	environment: process.env.SHARDLINE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});

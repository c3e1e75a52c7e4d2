import { createNodeLogger, type LifecycleLogger } from "@shardline/logger";

export const log: LifecycleLogger = createNodeLogger({
  service: "config",
  level: process.env.LOG_LEVEL === "debug" ? "debug" : "info",
  environment: process.env.SHARDLINE_ENV ?? "development",
  pretty: process.env.NODE_ENV === "development",
});

import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions, ShardLogContext } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
  flush(): Promise<void>;
  destroy(): Promise<void>;
}

function withLifecycle(baseLogger: Logger, lifecycle: { state: LoggerState }): LifecycleLogger {
  let flushPromise: Promise<void> | null = null;

  const flush = async (): Promise<void> => {
    if (lifecycle.state === "destroyed") {
      return;
    }
    if (flushPromise) {
      return flushPromise;
    }
    lifecycle.state = "flushing";
    flushPromise = new Promise<void>((resolve) => {
      baseLogger.flush(() => {
        lifecycle.state = "active";
        flushPromise = null;
        resolve();
      });
    });
    return flushPromise;
  };

  const destroy = async (): Promise<void> => {
    if (lifecycle.state === "destroyed") {
      return;
    }
    await flush();
    lifecycle.state = "destroyed";
  };

  // The child shares the parent's stream; overriding flush on it leaves
  // pino's own flush reachable through baseLogger.
  return Object.assign(baseLogger.child({}), { flush, destroy });
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
  const {
    service,
    level = "info",
    environment,
    version,
    pretty,
    redactPaths,
    base = {},
    destination,
    pinoOptions = {},
  } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";
  const lifecycle: { state: LoggerState } = { state: "active" };

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      bindings: () => ({}), // Remove pid, hostname
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
    hooks: {
      logMethod(args, method) {
        if (lifecycle.state === "destroyed") {
          return;
        }
        method.apply(this, args);
      },
    },
    base: {
      service,
      environment,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  const baseLogger = isPretty
    ? pino(
        loggerOptions,
        pino.transport({
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,service,environment,version",
            customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
            singleLine: true,
          },
        })
      )
    : destination
      ? pino(loggerOptions, destination)
      : pino(loggerOptions);

  return withLifecycle(baseLogger, lifecycle);
}

export function formatShard(context: ShardLogContext): string {
  return `${context.index}/${context.total}`;
}

export function withShardContext(logger: Logger, context: ShardLogContext): Logger {
  return logger.child({ shard: formatShard(context) });
}

import type { DestinationStream, Level, LoggerOptions } from "pino";

export type LogLevel = Level;

export interface NodeLoggerOptions {
  /** Service name attached to every record */
  service: string;
  /** Minimum level (default: info) */
  level?: LogLevel;
  /** Deployment environment label */
  environment?: string;
  /** Release version label */
  version?: string;
  /** Human-readable output through pino-pretty (default: NODE_ENV === "development") */
  pretty?: boolean;
  /** Extra redaction paths, merged with the defaults */
  redactPaths?: string[];
  /** Extra base bindings */
  base?: Record<string, unknown>;
  /** Write records here instead of stdout; ignored when pretty */
  destination?: DestinationStream;
  /** Raw pino options, applied last */
  pinoOptions?: Partial<LoggerOptions>;
}

export interface ShardLogContext {
  index: number;
  total: number;
}

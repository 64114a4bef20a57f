import pino, { type DestinationStream, type Logger } from "pino";

/** Level for operational command descriptions, between debug (20) and info (30) */
export const OP_LEVEL = 25;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "op", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type OpLogger = Logger<"op">;

// stdout carries command output and the MCP stdio transport, so logs go to stderr
export function createLogger(level: LogLevel = "info", destination?: DestinationStream): OpLogger {
  return pino<"op">(
    { name: "panorama-cli", level, customLevels: { op: OP_LEVEL } },
    destination ?? pino.destination({ dest: 2, sync: true }),
  );
}

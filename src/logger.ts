import pino from "pino";
import type { ApiflowConfig } from "./config.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Pretty-print through pino-pretty (default true) */
  pretty?: boolean;
  /** Write to stderr, keeping stdout free for CLI output or the MCP transport */
  stderr?: boolean;
}

export function createLogger(
  config: Pick<ApiflowConfig, "logLevel">,
  options: LoggerOptions = {}
): Logger {
  const destination = options.stderr ? 2 : 1;

  if (options.pretty === false) {
    return pino({ level: config.logLevel }, pino.destination(destination));
  }

  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        destination,
      },
    },
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

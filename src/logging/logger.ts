import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/**
 * Logs go to stderr (or `config.file`) so that lint reports on stdout stay
 * machine-readable.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const options: pino.LoggerOptions = { level };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  if (isJson) {
    return pino(options, pino.destination(2));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  });
}

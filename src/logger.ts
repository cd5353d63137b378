import pino from "pino";
import type { DestinationStream, LoggerOptions as PinoOptions } from "pino";

export type LoggerOptions = {
  readonly level?: string;
  readonly name?: string;
};

/**
 * Creates the pino logger shared by the client and transport.
 *
 * - Level labels instead of numbers, ISO 8601 timestamps
 * - Level from `options.level`, then `LOG_LEVEL`, then `info`
 * - JSON to stdout unless a destination is given
 */
export function createLogger(
  options: LoggerOptions = {},
  destination?: DestinationStream,
): pino.Logger {
  const pinoOptions: PinoOptions = {
    name: options.name ?? "feedmap",
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination === undefined ? pino(pinoOptions) : pino(pinoOptions, destination);
}

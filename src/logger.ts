import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

/**
 * Create the CLI's root logger.
 *
 * Logs go synchronously to stderr as JSON; stdout is reserved for encoded
 * or decoded data. Tests pass their own destination.
 */
export function createLogger(
  level: LogLevel,
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  return pino(
    {
      name: "base-n",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination
  );
}

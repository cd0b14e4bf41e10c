import pino from "pino";
import type { DestinationStream } from "pino";
import type { Logger, LogLevel } from "../ports/logger";

export type LoggerOptions = {
  level: LogLevel;
  // also append JSON lines to this file
  file?: string;
};

function destinationFor(options: LoggerOptions): DestinationStream {
  const stderr = pino.destination({ dest: 2, sync: true });
  const level = options.level;
  if (!options.file || level === "silent") return stderr;

  return pino.multistream([
    { level, stream: stderr },
    { level, stream: pino.destination({ dest: options.file, mkdir: true, sync: true }) },
  ]);
}

/**
 * Root logger. Components take `logger.child({ component })` so every line
 * says where it came from.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destinationFor(options)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

// Structured logger factory. Components take a Logger argument instead of
// reaching for a module-level instance, so tests can hand in a silent or
// capturing logger.
import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(name: string, opts: LoggerOptions = {}): Logger {
  const level = opts.verbose ? "debug" : process.env.LOG_LEVEL || "info";

  const options = {
    name,
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return opts.destination ? pino(options, opts.destination) : pino(options);
}

/**
 * Logger that drops everything (tests, library callers without logging)
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

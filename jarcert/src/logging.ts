import { pino, stdTimeFunctions, type Logger as PinoLogger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type OutputFormat = "human" | "jsonl";

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  format?: OutputFormat;
  /** Drop everything; used by tests. */
  silent?: boolean;
}

function levelFor(options: LoggerOptions): string {
  if (options.silent) return "silent";
  if (options.verbose) return "debug";
  if (options.quiet) return "error";
  return "info";
}

function createPinoLogger(options: LoggerOptions): PinoLogger {
  const level = levelFor(options);

  // jsonl keeps pino's own line format so other tools can consume it
  if (options.silent || options.format === "jsonl") {
    return pino({ level, timestamp: stdTimeFunctions.isoTime });
  }

  const stream = PinoPretty({
    colorize: !(options.noColor ?? false),
    ignore: "pid,hostname,time,level",
    messageFormat: (log, messageKey) => {
      const msg = String(log[messageKey] ?? "");
      if (log.level === 30) return msg;
      const levelLabel = log.level === 40 ? "WARN" : log.level === 50 ? "ERROR" : "DEBUG";
      return `${levelLabel}: ${msg}`;
    },
    singleLine: true,
  });

  return pino({ level }, stream);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoLogger = createPinoLogger(options);

  const write =
    (fn: "debug" | "info" | "warn" | "error") =>
    (message: string, fields?: LogFields): void => {
      if (fields && Object.keys(fields).length > 0) {
        pinoLogger[fn](fields, message);
      } else {
        pinoLogger[fn](message);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export const silentLogger: Logger = createLogger({ silent: true });

import pino from "pino";
import { LOG_FORMAT, LOG_LEVEL } from "./config";

const pretty = LOG_FORMAT !== "json" && process.env.NODE_ENV !== "test";

// Results go to stdout, diagnostics to stderr.
export const logger = pretty
  ? pino({
      level: LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    })
  : pino({ level: LOG_LEVEL }, pino.destination(2));

export function createLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}

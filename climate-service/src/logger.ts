import pino from "pino";
import type { ServiceConfig } from "./config.js";

export type { Logger } from "pino";

/** `fd` 2 keeps logs off stdout when stdout carries command output. */
export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">, fd: 1 | 2 = 1) {
  return pino({
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  }, pino.destination(fd));
}

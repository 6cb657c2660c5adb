import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "bank-gateway"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = pino.Logger;

export interface RequestLogContext {
  requestId: string;
  callerAddress: string;
  path: string;
}

/**
 * Returns a child logger with request context attached.
 */
export function getRequestLogger(context: RequestLogContext): Logger {
  return logger.child({
    requestId: context.requestId,
    callerAddress: context.callerAddress,
    path: context.path
  });
}

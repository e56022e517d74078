/**
 * Root pino logger. JSON lines everywhere except `NODE_ENV=development`,
 * which pretty-prints. Sensitive keys are censored at the top level and
 * one level down.
 */
import pino, { type Logger, type LoggerOptions } from "pino";

import { getServerConfig } from "@/lib/env";

import { REDACT_KEYS } from "./redact";

function buildLoggerOptions(): LoggerOptions {
  const { NODE_ENV, LOG_LEVEL } = getServerConfig();
  const pretty = NODE_ENV === "development";

  const options: LoggerOptions = {
    level: LOG_LEVEL ?? (pretty ? "debug" : "info"),
    base: { service: "kinship-server", env: NODE_ENV },
    redact: {
      paths: [...REDACT_KEYS].flatMap((key) => [key, `*.${key}`]),
      censor: "[REDACTED]",
    },
    serializers: { err: pino.stdSerializers.err },
  };

  if (pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss.l",
        ignore: "pid,hostname,service,env",
      },
    };
  }
  return options;
}

export const logger: Logger = pino(buildLoggerOptions());

/** Child logger carrying the verification id on every line. */
export function createJobLogger(
  verificationId: string,
  bindings: Record<string, unknown> = {},
): Logger {
  return logger.child({ verificationId, ...bindings });
}

export type { Logger };

/**
 * Error logging with fingerprints. A fingerprint groups occurrences of the
 * same failure and is short enough to quote in a user-facing reason.
 */
import { createHash } from "node:crypto";

import { VerificationError } from "@/lib/identity/verification-errors";

import { type Logger, logger } from "./logger";
import { sanitizeForLog, sanitizeLogMessage } from "./redact";

const FINGERPRINT_LENGTH = 12;
const FINGERPRINT_MESSAGE_CHARS = 100;

/** "at fn (file:line:col)" or "at file:line:col" */
const FRAME_LOCATION = /\(?([^\s()]+):(\d+):\d+\)?$/;
const UP_TO_SRC = /^.*?\/src\//;

export interface ErrorContext {
  verificationId?: string;
  userId?: string;
  operation?: string;
  durationMs?: number;
}

/**
 * `file:line` of the first stack frame inside the app, with the path cut
 * back to `src/` so checkouts in different directories agree.
 */
function firstAppFrame(stack: string | undefined): string {
  const frames = stack?.split("\n").slice(1) ?? [];
  for (const raw of frames) {
    const frame = raw.trim();
    if (
      !frame.startsWith("at ") ||
      frame.includes("node_modules") ||
      frame.includes("node:")
    ) {
      continue;
    }
    const match = FRAME_LOCATION.exec(frame);
    if (match?.[1]) {
      return `${match[1].replace(UP_TO_SRC, "src/")}:${match[2]}`;
    }
  }
  return "unknown";
}

export function createFingerprint(err: Error): string {
  const key = [
    err.name,
    err.message.slice(0, FINGERPRINT_MESSAGE_CHARS),
    firstAppFrame(err.stack),
  ].join(":");
  return createHash("sha256").update(key).digest("hex").slice(0, FINGERPRINT_LENGTH);
}

/**
 * Log an unexpected failure and return its fingerprint.
 */
export function logError(
  error: unknown,
  context: ErrorContext = {},
  log: Logger = logger,
): string {
  const err = error instanceof Error ? error : new Error(String(error));
  const fingerprint = createFingerprint(err);
  const message = sanitizeLogMessage(err.message);

  log.error(
    {
      ...context,
      ...(error instanceof VerificationError && {
        errorType: error.name,
        issueCode: error.issueCode,
        isExpected: error.isExpected,
      }),
      fingerprint,
      error: {
        name: err.name,
        message,
        stack: err.stack?.replace(err.message, message),
      },
    },
    `[${fingerprint}] ${message}`,
  );
  return fingerprint;
}

/** Expected conditions: no stack, context sanitized. */
export function logWarn(
  message: string,
  context: Record<string, unknown> = {},
  log: Logger = logger,
): void {
  log.warn(sanitizeForLog(context), sanitizeLogMessage(message));
}

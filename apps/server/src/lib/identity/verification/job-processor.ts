import type { VerificationRuntime } from "./runtime";

import { getServerConfig } from "@/lib/env";
import { logError } from "@/lib/logging/error-logger";
import { createJobLogger } from "@/lib/logging/logger";

import { processVerificationSafely } from "./auto-verify";

interface QueuedJob {
  verificationId: string;
  runtime: VerificationRuntime;
}

const activeVerificationJobs = new Set<string>();
const queuedJobs: QueuedJob[] = [];
let runningJobs = 0;
let idleWaiters: Array<() => void> = [];

function notifyIfIdle(): void {
  if (activeVerificationJobs.size > 0) return;
  const waiters = idleWaiters;
  idleWaiters = [];
  for (const resolve of waiters) {
    resolve();
  }
}

function runJob(job: QueuedJob): Promise<void> {
  const log = createJobLogger(job.verificationId);
  const startTime = Date.now();
  return processVerificationSafely(job.verificationId, job.runtime).then(
    (result) => {
      log.info(
        {
          autoVerified: result.autoVerified,
          needsManualReview: result.needsManualReview,
          failureReason: result.failureReason,
          durationMs: Date.now() - startTime,
        },
        "Verification job finished",
      );
    },
  );
}

function drainQueue(): void {
  const limit = getServerConfig().VERIFICATION_JOB_CONCURRENCY;
  while (runningJobs < limit) {
    const job = queuedJobs.shift();
    if (!job) break;

    runningJobs++;
    runJob(job)
      .finally(() => {
        runningJobs--;
        activeVerificationJobs.delete(job.verificationId);
        drainQueue();
      })
      .catch((error: unknown) => {
        logError(error, {
          verificationId: job.verificationId,
          operation: "verification.job",
        });
      });
  }
  notifyIfIdle();
}

/**
 * Queue automated processing for a verification already in `processing`.
 * Runs after the current call stack unwinds, so the caller returns first.
 * Returns false when the verification is already queued or running.
 */
export function scheduleVerificationJob(
  verificationId: string,
  runtime: VerificationRuntime,
): boolean {
  if (activeVerificationJobs.has(verificationId)) {
    return false;
  }
  activeVerificationJobs.add(verificationId);
  queuedJobs.push({ verificationId, runtime });
  setTimeout(drainQueue, 0);
  return true;
}

/**
 * Resolves once every scheduled job has settled.
 */
export function waitForVerificationJobs(): Promise<void> {
  if (activeVerificationJobs.size === 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    idleWaiters.push(resolve);
  });
}

export function getActiveVerificationJobCount(): number {
  return activeVerificationJobs.size;
}

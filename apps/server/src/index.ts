import type { VerificationStatus } from "@/lib/db/schema";
import type { AutoVerificationResult } from "@/lib/identity/verification/auto-verify";
import type { VerificationRuntime } from "@/lib/identity/verification/runtime";
import type { FileUpload } from "@/lib/storage/upload-validation";

import {
  deleteSelfie,
  getSelfieStatus,
  processSelfie,
  uploadSelfie,
} from "@/lib/identity/selfie/selfie-service";
import { processVerificationSafely } from "@/lib/identity/verification/auto-verify";
import { waitForVerificationJobs } from "@/lib/identity/verification/job-processor";
import { createDefaultRuntime } from "@/lib/identity/verification/runtime";
import {
  getAutoVerificationSettings,
  updateAutoVerificationSettings,
} from "@/lib/identity/verification/settings";
import {
  type ApproveVerificationInput,
  approveVerification,
  cancelVerification,
  checkVerificationPrerequisites,
  deleteVerification,
  getUserVerification,
  getVerificationSummary,
  listReviewQueue,
  listUserVerifications,
  rejectVerification,
  reprocessVerification,
  type SubmitVerificationInput,
  submitVerification,
} from "@/lib/identity/verification/verification-service";
import { logger } from "@/lib/logging/logger";
import {
  getCompatibilityWithProfile,
  getSuggestions,
  getWhoLikesMe,
} from "@/lib/matching/suggestions";

export interface KinshipCoreOptions {
  /** Replace individual collaborators, e.g. engines in tests */
  runtime?: Partial<VerificationRuntime>;
}

/**
 * Verification and matching core with its collaborators bound to one
 * runtime. Engines load lazily; creating the core does no heavy work.
 */
export function createKinshipCore(options: KinshipCoreOptions = {}) {
  const runtime: VerificationRuntime = {
    ...createDefaultRuntime(),
    ...options.runtime,
  };

  return {
    runtime,

    process(verificationId: string): Promise<AutoVerificationResult> {
      return processVerificationSafely(verificationId, runtime);
    },
    score: getCompatibilityWithProfile,
    suggestions(viewerId: string, limit?: number) {
      return getSuggestions(viewerId, { limit });
    },
    whoLikesMe: getWhoLikesMe,

    verifications: {
      submit: (userId: string, input: SubmitVerificationInput) =>
        submitVerification(userId, input, runtime),
      prerequisites: checkVerificationPrerequisites,
      list: (
        userId: string,
        page?: { status?: VerificationStatus; limit?: number; offset?: number },
      ) => listUserVerifications(userId, page),
      get: getUserVerification,
      reviewQueue: listReviewQueue,
      cancel: cancelVerification,
      approve: (
        verificationId: string,
        reviewerId: string,
        input: ApproveVerificationInput = {},
      ) => approveVerification(verificationId, reviewerId, input, runtime),
      reject: (verificationId: string, reviewerId: string, reason: string) =>
        rejectVerification(verificationId, reviewerId, reason, runtime),
      reprocess: (verificationId: string) =>
        reprocessVerification(verificationId, runtime),
      summary: getVerificationSummary,
      delete: (verificationId: string) =>
        deleteVerification(verificationId, runtime),
    },

    selfies: {
      upload: (userId: string, upload: FileUpload) =>
        uploadSelfie(userId, upload, runtime),
      process: (userId: string) => processSelfie(userId, runtime),
      delete: (userId: string) => deleteSelfie(userId, runtime),
      status: getSelfieStatus,
    },

    settings: {
      get: getAutoVerificationSettings,
      update: updateAutoVerificationSettings,
    },

    /** Wait for queued verification jobs, then release OCR workers. */
    async shutdown(): Promise<void> {
      await waitForVerificationJobs();
      await runtime.ocr.terminate?.();
      logger.info("Kinship core stopped");
    },
  };
}

export type KinshipCore = ReturnType<typeof createKinshipCore>;

export type { AutoVerificationResult } from "@/lib/identity/verification/auto-verify";
export type {
  CompatibilityResult,
  FactorScore,
} from "@/lib/matching/compatibility";
export type { SuggestionCard, SuggestionPage } from "@/lib/matching/suggestions";
export {
  ConfigError,
  getServerConfig,
  loadServerConfig,
} from "@/lib/env";
export {
  VerificationError,
  VerificationInputError,
  VerificationStateError,
} from "@/lib/identity/verification-errors";

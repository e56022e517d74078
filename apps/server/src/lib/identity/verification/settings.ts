import z from "zod";

import { getServerConfig } from "@/lib/env";
import { VerificationInputError } from "@/lib/identity/verification-errors";
import { logger } from "@/lib/logging/logger";

export interface AutoVerificationSettings {
  enabled: boolean;
  approveThreshold: number;
  rejectThreshold: number;
}

const settingsSchema = z
  .object({
    enabled: z.boolean(),
    approveThreshold: z.number().min(0).max(1),
    rejectThreshold: z.number().min(0).max(1),
  })
  .refine((s) => s.rejectThreshold < s.approveThreshold, {
    message: "rejectThreshold must be lower than approveThreshold",
    path: ["rejectThreshold"],
  });

let currentSettings: AutoVerificationSettings | null = null;

function settingsFromConfig(): AutoVerificationSettings {
  const config = getServerConfig();
  return {
    enabled: config.AUTO_VERIFICATION_ENABLED,
    approveThreshold: config.AUTO_APPROVE_THRESHOLD,
    rejectThreshold: config.AUTO_REJECT_THRESHOLD,
  };
}

/**
 * Current auto-verification policy, seeded from the environment.
 */
export function getAutoVerificationSettings(): AutoVerificationSettings {
  currentSettings ??= settingsFromConfig();
  return { ...currentSettings };
}

/**
 * Change thresholds or the global switch at runtime.
 * Applies to verifications processed after the call.
 */
export function updateAutoVerificationSettings(
  patch: Partial<AutoVerificationSettings>,
): AutoVerificationSettings {
  const parsed = settingsSchema.safeParse({
    ...getAutoVerificationSettings(),
    ...patch,
  });
  if (!parsed.success) {
    throw VerificationInputError.invalidSettings(
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  currentSettings = parsed.data;
  logger.info({ settings: parsed.data }, "Auto-verification settings updated");
  return { ...parsed.data };
}

export function resetAutoVerificationSettings(): void {
  currentSettings = null;
}

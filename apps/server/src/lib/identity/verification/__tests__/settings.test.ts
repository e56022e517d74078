import { afterEach, describe, expect, it } from "vitest";

import { VerificationInputError } from "@/lib/identity/verification-errors";

import {
  getAutoVerificationSettings,
  resetAutoVerificationSettings,
  updateAutoVerificationSettings,
} from "../settings";

describe("auto-verification settings", () => {
  afterEach(() => {
    resetAutoVerificationSettings();
  });

  it("starts from the environment defaults", () => {
    expect(getAutoVerificationSettings()).toEqual({
      enabled: true,
      approveThreshold: 0.65,
      rejectThreshold: 0.35,
    });
  });

  it("applies a partial update", () => {
    updateAutoVerificationSettings({ approveThreshold: 0.8 });

    expect(getAutoVerificationSettings()).toEqual({
      enabled: true,
      approveThreshold: 0.8,
      rejectThreshold: 0.35,
    });
  });

  it("returns copies that callers cannot mutate", () => {
    const settings = getAutoVerificationSettings();
    settings.enabled = false;

    expect(getAutoVerificationSettings().enabled).toBe(true);
  });

  it("refuses a reject threshold at or above the approve threshold", () => {
    expect(() =>
      updateAutoVerificationSettings({ rejectThreshold: 0.65 }),
    ).toThrow(
      "Invalid auto-verification settings: rejectThreshold must be lower than approveThreshold",
    );
    expect(getAutoVerificationSettings().rejectThreshold).toBe(0.35);
  });

  it("refuses thresholds outside [0, 1]", () => {
    expect(() =>
      updateAutoVerificationSettings({ approveThreshold: 1.5 }),
    ).toThrow(VerificationInputError);
  });
});

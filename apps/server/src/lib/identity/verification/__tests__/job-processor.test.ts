import type { TestRuntime } from "@/test/service-mocks";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { getVerificationById } from "@/lib/db/queries/verifications";
import {
  createTestUser,
  createTestVerification,
  resetDatabase,
} from "@/test/db-test-utils";
import { createTestRuntime } from "@/test/service-mocks";

import {
  getActiveVerificationJobCount,
  scheduleVerificationJob,
  waitForVerificationJobs,
} from "../job-processor";

describe("verification job processor", () => {
  let runtime: TestRuntime;
  let userId: string;

  beforeEach(() => {
    resetDatabase();
    runtime = createTestRuntime();
    userId = createTestUser();
  });

  afterEach(async () => {
    await waitForVerificationJobs();
    runtime.cleanup();
  });

  async function processingVerification(): Promise<string> {
    const filePath = await runtime.files.save(
      ["verifications", userId, "doc"],
      "document.jpg",
      Buffer.from("scan"),
    );
    return createTestVerification({
      userId,
      documentType: "diploma",
      status: "processing",
      filePath,
    }).id;
  }

  it("does not run the caller's work synchronously", async () => {
    const id = await processingVerification();

    expect(scheduleVerificationJob(id, runtime)).toBe(true);
    expect(runtime.ocr.recognize).not.toHaveBeenCalled();
    expect(getActiveVerificationJobCount()).toBe(1);

    await waitForVerificationJobs();

    expect(getActiveVerificationJobCount()).toBe(0);
    expect(getVerificationById(id)?.status).toBe("pending");
  });

  it("ignores a verification that is already queued", async () => {
    const id = await processingVerification();

    expect(scheduleVerificationJob(id, runtime)).toBe(true);
    expect(scheduleVerificationJob(id, runtime)).toBe(false);

    await waitForVerificationJobs();

    expect(runtime.ocr.recognize).toHaveBeenCalledTimes(1);
  });

  it("runs every queued verification", async () => {
    const ids = [
      await processingVerification(),
      await processingVerification(),
      await processingVerification(),
    ];

    for (const id of ids) {
      scheduleVerificationJob(id, runtime);
    }
    await waitForVerificationJobs();

    expect(ids.map((id) => getVerificationById(id)?.status)).toEqual([
      "pending",
      "pending",
      "pending",
    ]);
  });

  it("resolves right away when nothing is scheduled", async () => {
    await expect(waitForVerificationJobs()).resolves.toBeUndefined();
  });
});

/**
 * In-process stand-ins for the OCR, face and PDF engines, plus a runtime
 * that stores uploads in a throwaway directory.
 */
import type { OcrEngine, OcrMode, OcrOutcome } from "@/lib/identity/document/ocr";
import type { PdfRasterizer, RasterizeOutcome } from "@/lib/identity/document/pdf";
import type { FaceEmbedding } from "@/lib/identity/face/embedding";
import type {
  DetectedFace,
  FaceDetectionOutcome,
  FaceEngine,
} from "@/lib/identity/face/face-engine";
import type { AutoVerificationSettings } from "@/lib/identity/verification/settings";
import type { VerificationRuntime } from "@/lib/identity/verification/runtime";

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { vi } from "vitest";

import { EMBEDDING_DIMENSION } from "@/lib/identity/face/embedding";
import { FileStore } from "@/lib/storage/file-store";

export class FakeOcrEngine implements OcrEngine {
  /** Text returned in MRZ mode */
  mrzText = "";
  /** Text returned in general text mode */
  text = "";
  unavailableReason: string | null = null;

  readonly recognize = vi.fn(
    async (
      _image: Buffer,
      options: { mode?: OcrMode } = {},
    ): Promise<OcrOutcome> => {
      if (this.unavailableReason !== null) {
        return { status: "unavailable", reason: this.unavailableReason };
      }
      return {
        status: "ok",
        text: options.mode === "mrz" ? this.mrzText : this.text,
      };
    },
  );

  readonly terminate = vi.fn(async () => {});

  async available(): Promise<boolean> {
    return this.unavailableReason === null;
  }
}

export class FakeFaceEngine implements FaceEngine {
  readonly embeddingDimension = EMBEDDING_DIMENSION;
  outcome: FaceDetectionOutcome = {
    status: "ok",
    faces: [],
    imageWidth: 100,
    imageHeight: 100,
  };

  readonly detect = vi.fn(
    async (_image: Buffer): Promise<FaceDetectionOutcome> => this.outcome,
  );

  async available(): Promise<boolean> {
    return this.outcome.status === "ok";
  }

  /** Report these faces on a 100x100 image. */
  withFaces(...faces: DetectedFace[]): this {
    this.outcome = { status: "ok", faces, imageWidth: 100, imageHeight: 100 };
    return this;
  }

  unavailable(reason = "model missing"): this {
    this.outcome = { status: "unavailable", reason };
    return this;
  }
}

export class FakePdfRasterizer implements PdfRasterizer {
  outcome: RasterizeOutcome = {
    status: "ok",
    pages: [Buffer.from("rendered-page")],
  };

  readonly rasterize = vi.fn(
    async (_pdf: Buffer, _options: { maxPages: number }) => this.outcome,
  );
}

/** A face covering a quarter of a 100x100 image. */
export function detectedFace(
  embedding: FaceEmbedding | null,
  overrides: Partial<DetectedFace> = {},
): DetectedFace {
  return {
    box: { x: 25, y: 25, width: 50, height: 50 },
    score: 0.9,
    embedding,
    ...overrides,
  };
}

/** Unit vector along one axis. */
export function axisEmbedding(axis = 0): FaceEmbedding {
  const embedding = new Float32Array(EMBEDDING_DIMENSION);
  embedding[axis] = 1;
  return embedding;
}

/**
 * Unit vector whose similarity to `axisEmbedding(0)` is `similarity`.
 */
export function embeddingWithSimilarity(similarity: number): FaceEmbedding {
  const cosine = 2 * similarity - 1;
  const embedding = new Float32Array(EMBEDDING_DIMENSION);
  embedding[0] = cosine;
  embedding[1] = Math.sqrt(1 - cosine * cosine);
  return embedding;
}

export interface TestRuntime extends VerificationRuntime {
  ocr: FakeOcrEngine;
  face: FakeFaceEngine;
  pdf: FakePdfRasterizer;
  settingsValue: AutoVerificationSettings;
  cleanup: () => void;
}

export const TEST_NOW = new Date("2025-06-01T12:00:00.000Z");

export function createTestRuntime(
  settings: Partial<AutoVerificationSettings> = {},
): TestRuntime {
  const root = mkdtempSync(path.join(tmpdir(), "kinship-test-"));
  const settingsValue: AutoVerificationSettings = {
    enabled: true,
    approveThreshold: 0.65,
    rejectThreshold: 0.35,
    ...settings,
  };
  return {
    ocr: new FakeOcrEngine(),
    face: new FakeFaceEngine(),
    pdf: new FakePdfRasterizer(),
    files: new FileStore(root),
    settingsValue,
    settings: () => settingsValue,
    maxUploadBytes: 1024 * 1024,
    now: () => TEST_NOW,
    cleanup: () => {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

import type { DetectedFace, FaceEngine } from "../face-engine";

import { describe, expect, it } from "vitest";

import { toEmbedding } from "../embedding";
import {
  computeFaceQuality,
  extractPrimaryFace,
  getLargestFace,
} from "../face-metrics";

function face(width: number, height: number, score = 0.9, embedding = [1, 0]): DetectedFace {
  return {
    box: { x: 0, y: 0, width, height },
    score,
    embedding: toEmbedding(embedding),
  };
}

function engineReturning(faces: DetectedFace[], size = 100): FaceEngine {
  return {
    embeddingDimension: 2,
    available: async () => true,
    detect: async () => ({
      status: "ok",
      faces,
      imageWidth: size,
      imageHeight: size,
    }),
  };
}

describe("getLargestFace", () => {
  it("picks the face with the largest box", () => {
    const small = face(10, 10);
    const large = face(40, 30);
    expect(getLargestFace([small, large, face(20, 20)])).toBe(large);
  });

  it("returns null for no faces", () => {
    expect(getLargestFace([])).toBeNull();
  });
});

describe("computeFaceQuality", () => {
  it("keeps the detector score for well-framed faces", () => {
    expect(computeFaceQuality(face(40, 40, 0.9), 100, 100)).toBe(0.9);
  });

  it("halves the score for tiny faces", () => {
    expect(computeFaceQuality(face(10, 10, 0.9), 100, 100)).toBe(0.45);
  });

  it("penalizes faces that fill the frame", () => {
    expect(computeFaceQuality(face(90, 90, 0.5), 100, 100)).toBe(0.4);
  });
});

describe("extractPrimaryFace", () => {
  it("returns the largest face's embedding with count and quality", async () => {
    const outcome = await extractPrimaryFace(
      engineReturning([face(10, 10, 0.9, [0, 1]), face(50, 50, 0.8, [1, 0])]),
      Buffer.from("img"),
    );

    expect(outcome).toEqual({
      status: "ok",
      embedding: toEmbedding([1, 0]),
      faceCount: 2,
      quality: 0.8,
    });
  });

  it("reports no face when nothing was detected", async () => {
    expect(await extractPrimaryFace(engineReturning([]), Buffer.from("img"))).toEqual({
      status: "no_face",
    });
  });

  it("treats an embedding of the wrong size as no face", async () => {
    const outcome = await extractPrimaryFace(
      engineReturning([face(50, 50, 0.9, [1, 0, 0])]),
      Buffer.from("img"),
    );
    expect(outcome.status).toBe("no_face");
  });

  it("passes through engine unavailability", async () => {
    const engine: FaceEngine = {
      embeddingDimension: 2,
      available: async () => false,
      detect: async () => ({ status: "unavailable", reason: "models missing" }),
    };

    expect(await extractPrimaryFace(engine, Buffer.from("img"))).toEqual({
      status: "unavailable",
      reason: "models missing",
    });
  });
});

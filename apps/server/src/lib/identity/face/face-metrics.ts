import type { FaceEmbedding } from "./embedding";
import type { DetectedFace, FaceBox, FaceEngine } from "./face-engine";

export function getBoxArea(box: FaceBox | undefined): number {
  if (!box) return 0;
  return Math.max(0, box.width) * Math.max(0, box.height);
}

/**
 * The face with the largest bounding box; the subject is usually closest
 * to the camera.
 */
export function getLargestFace(faces: readonly DetectedFace[]): DetectedFace | null {
  let best: DetectedFace | null = null;
  for (const face of faces) {
    if (!best || getBoxArea(face.box) > getBoxArea(best.box)) {
      best = face;
    }
  }
  return best;
}

/**
 * Detector confidence, penalized for faces that are tiny (< 5% of the
 * image) or fill most of it (> 60%).
 */
export function computeFaceQuality(
  face: DetectedFace,
  imageWidth: number,
  imageHeight: number,
): number {
  const imageArea = imageWidth * imageHeight;
  let quality = face.score;
  if (imageArea > 0) {
    const ratio = getBoxArea(face.box) / imageArea;
    if (ratio < 0.05) {
      quality *= 0.5;
    } else if (ratio > 0.6) {
      quality *= 0.8;
    }
  }
  return quality;
}

export type PrimaryFaceOutcome =
  | {
      status: "ok";
      embedding: FaceEmbedding;
      faceCount: number;
      quality: number;
    }
  | { status: "no_face" }
  | { status: "unavailable"; reason: string };

/**
 * Detect faces and return the embedding of the largest one.
 */
export async function extractPrimaryFace(
  engine: FaceEngine,
  image: Buffer,
): Promise<PrimaryFaceOutcome> {
  const outcome = await engine.detect(image);
  if (outcome.status === "unavailable") {
    return outcome;
  }

  const face = getLargestFace(outcome.faces);
  if (!face?.embedding || face.embedding.length !== engine.embeddingDimension) {
    return { status: "no_face" };
  }

  return {
    status: "ok",
    embedding: face.embedding,
    faceCount: outcome.faces.length,
    quality: computeFaceQuality(face, outcome.imageWidth, outcome.imageHeight),
  };
}

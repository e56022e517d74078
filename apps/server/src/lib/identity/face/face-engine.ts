import type { FaceEmbedding } from "./embedding";

export interface FaceBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DetectedFace {
  box: FaceBox;
  /** Detector confidence in [0, 1] */
  score: number;
  embedding: FaceEmbedding | null;
}

export type FaceDetectionOutcome =
  | {
      status: "ok";
      faces: DetectedFace[];
      imageWidth: number;
      imageHeight: number;
    }
  | { status: "unavailable"; reason: string };

/**
 * Face detection and embedding over encoded image bytes.
 * A missing model or runtime is reported as `unavailable`, never thrown.
 */
export interface FaceEngine {
  readonly embeddingDimension: number;
  available(): Promise<boolean>;
  detect(image: Buffer): Promise<FaceDetectionOutcome>;
}

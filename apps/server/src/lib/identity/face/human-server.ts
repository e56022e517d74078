import type { Config, FaceResult, Human } from "@vladmandic/human";
import type { DetectedFace, FaceDetectionOutcome, FaceEngine } from "./face-engine";

import path from "node:path";
import { pathToFileURL } from "node:url";

import { decodeToRgb } from "@/lib/identity/document/image-processing";
import { logger } from "@/lib/logging/logger";

import { EMBEDDING_DIMENSION, normalizeEmbedding, toEmbedding } from "./embedding";

const DEFAULT_MODELS_DIR = path.join(
  process.cwd(),
  "node_modules",
  "@vladmandic",
  "human-models",
  "models",
);

/**
 * TensorFlow.js Node.js backend requires file:// URLs for local paths,
 * with a trailing slash so relative URL resolution works.
 */
export function resolveModelsUrl(modelsDir = DEFAULT_MODELS_DIR): string {
  return pathToFileURL(path.resolve(modelsDir) + path.sep).href;
}

function buildServerConfig(modelBasePath: string): Partial<Config> {
  return {
    modelBasePath,
    backend: "tensorflow",
    async: true,
    debug: false,
    face: {
      enabled: true,
      detector: {
        enabled: true,
        rotation: true, // Document photos are often slightly tilted
        return: false, // Prevents tensor memory leaks across detection calls
        maxDetected: 5, // Enough to reject group selfies
      },
      mesh: { enabled: true },
      iris: { enabled: false },
      description: { enabled: false },
      insightface: { enabled: true }, // 512-dim identity embeddings
      emotion: { enabled: false },
      attention: { enabled: false },
      antispoof: { enabled: false },
      liveness: { enabled: false },
    },
    body: { enabled: false },
    hand: { enabled: false },
    gesture: { enabled: false },
    object: { enabled: false },
    segmentation: { enabled: false },
    filter: {
      enabled: true,
      equalization: true, // Normalize lighting between scans and selfies
    },
  };
}

let humanInstance: Human | null = null;
let initPromise: Promise<Human> | null = null;

// TensorFlow.js deadlocks when several detect() calls share one model
let detectionLock: Promise<void> = Promise.resolve();

/**
 * Process-wide Human instance, loaded on first use.
 * A failed load is forgotten so a later call can retry.
 */
export async function getHumanServer(modelsUrl: string): Promise<Human> {
  if (humanInstance) return humanInstance;
  if (!initPromise) {
    initPromise = (async () => {
      const mod = await import("@vladmandic/human");
      const human = new mod.Human(buildServerConfig(modelsUrl));
      await human.load();
      humanInstance = human;
      return human;
    })();
    initPromise.catch(() => {
      initPromise = null;
    });
  }
  return initPromise;
}

/**
 * Create a deferred promise with external resolve control.
 */
function createDeferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function toDetectedFace(face: FaceResult): DetectedFace {
  const [x, y, width, height] = face.box;
  return {
    box: { x, y, width, height },
    score: face.boxScore ?? face.score,
    embedding:
      face.embedding && face.embedding.length > 0
        ? normalizeEmbedding(toEmbedding(face.embedding))
        : null,
  };
}

/**
 * Face engine backed by Human with the InsightFace description model.
 */
export class HumanFaceEngine implements FaceEngine {
  readonly embeddingDimension = EMBEDDING_DIMENSION;
  private readonly modelsUrl: string;

  constructor(options: { modelsDir?: string } = {}) {
    this.modelsUrl = resolveModelsUrl(options.modelsDir);
  }

  async available(): Promise<boolean> {
    try {
      await getHumanServer(this.modelsUrl);
      return true;
    } catch (error) {
      logger.warn({ error: String(error) }, "Face engine not available");
      return false;
    }
  }

  async detect(image: Buffer): Promise<FaceDetectionOutcome> {
    let human: Human;
    try {
      human = await getHumanServer(this.modelsUrl);
    } catch (error) {
      return { status: "unavailable", reason: String(error) };
    }

    const rgb = await decodeToRgb(image);

    const previousLock = detectionLock;
    const { promise: currentLock, resolve: releaseLock } = createDeferred();
    detectionLock = currentLock;
    await previousLock;

    try {
      const tensor = human.tf.tensor(
        Float32Array.from(rgb.data),
        [1, rgb.height, rgb.width, 3],
        "float32",
      );
      try {
        const result = await human.detect(tensor);
        return {
          status: "ok",
          faces: result.face.map(toDetectedFace),
          imageWidth: rgb.width,
          imageHeight: rgb.height,
        };
      } finally {
        human.tf.dispose(tensor);
      }
    } finally {
      releaseLock();
    }
  }
}

/**
 * Face embedding math and storage encoding.
 */

export type FaceEmbedding = Float32Array;

export const EMBEDDING_DIMENSION = 512;

export function toEmbedding(values: ArrayLike<number>): FaceEmbedding {
  return Float32Array.from(values);
}

export function normalizeEmbedding(embedding: FaceEmbedding): FaceEmbedding {
  let sumSquares = 0;
  for (const value of embedding) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return embedding;
  return embedding.map((value) => value / norm);
}

/**
 * Cosine similarity of the L2-normalized vectors, remapped to [0, 1].
 * Missing, empty, zero or mismatched vectors compare as 0.
 */
export function compareEmbeddings(
  a: FaceEmbedding | null | undefined,
  b: FaceEmbedding | null | undefined,
): number {
  if (!a || !b || a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }

  const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  if (!Number.isFinite(cosine)) {
    return 0;
  }
  const similarity = (cosine + 1) / 2;
  return Math.min(1, Math.max(0, similarity));
}

/**
 * Little-endian float32 bytes.
 */
export function serializeEmbedding(embedding: FaceEmbedding): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, index) => {
    buffer.writeFloatLE(value, index * 4);
  });
  return buffer;
}

export function deserializeEmbedding(bytes: Uint8Array): FaceEmbedding {
  if (bytes.byteLength % 4 !== 0) {
    throw new Error(
      `Embedding byte length ${bytes.byteLength} is not a multiple of 4`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const embedding = new Float32Array(bytes.byteLength / 4);
  for (let i = 0; i < embedding.length; i++) {
    embedding[i] = view.getFloat32(i * 4, true);
  }
  return embedding;
}

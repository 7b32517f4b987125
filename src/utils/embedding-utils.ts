/**
 * Embedding serialization for SQLite BLOB storage.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array (4 bytes per dimension); a 768-dimension
 * embedding takes 3KB.
 */
export function serializeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * Copies the bytes first: SQLite buffers are not guaranteed to be
 * 4-byte aligned, which Float32Array requires.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const copy = new Uint8Array(buffer.length);
  copy.set(buffer);
  const float32 = new Float32Array(copy.buffer, 0, buffer.length / Float32Array.BYTES_PER_ELEMENT);
  return Array.from(float32);
}

/**
 * Embedding artifact codec
 *
 * Layout (all integers unsigned 32-bit little-endian):
 *
 * | offset | size    | field                         |
 * |--------|---------|-------------------------------|
 * | 0      | 4       | magic "RDXE"                  |
 * | 4      | 4       | format version (1)            |
 * | 8      | 4       | rows N                        |
 * | 12     | 4       | dimensions D                  |
 * | 16     | 4·N·D   | float32 LE values, row-major  |
 */

import { IndexIntegrityError } from '../errors/index.js';
import type { EmbeddingMatrix } from '../indexer/embedder/types.js';
import { FORMAT_VERSION } from './types.js';

export const EMBEDDINGS_MAGIC = 'RDXE';
export const HEADER_BYTES = 16;

/**
 * Serialize a matrix into the artifact format.
 */
export function encodeEmbeddings(matrix: EmbeddingMatrix): Buffer {
  const { rows, dimensions, data } = matrix;
  if (data.length !== rows * dimensions) {
    throw new IndexIntegrityError(
      `Embedding matrix holds ${data.length} values, expected ${rows} x ${dimensions}`
    );
  }

  const buffer = Buffer.alloc(HEADER_BYTES + data.length * 4);
  buffer.write(EMBEDDINGS_MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(FORMAT_VERSION, 4);
  buffer.writeUInt32LE(rows, 8);
  buffer.writeUInt32LE(dimensions, 12);

  for (let i = 0; i < data.length; i++) {
    buffer.writeFloatLE(data[i] ?? 0, HEADER_BYTES + i * 4);
  }

  return buffer;
}

/**
 * Parse an artifact back into a matrix.
 *
 * @param context - What is being read, for error messages (e.g. a file path)
 * @throws IndexIntegrityError for a bad header, unknown version, or a length
 *   that does not match the declared shape
 */
export function decodeEmbeddings(buffer: Buffer, context: string): EmbeddingMatrix {
  if (buffer.length < HEADER_BYTES) {
    throw new IndexIntegrityError(
      `${context} is truncated: ${buffer.length} byte(s), header needs ${HEADER_BYTES}`
    );
  }

  const magic = buffer.toString('ascii', 0, 4);
  if (magic !== EMBEDDINGS_MAGIC) {
    throw new IndexIntegrityError(`${context} is not an embedding artifact (bad magic)`);
  }

  const version = buffer.readUInt32LE(4);
  if (version !== FORMAT_VERSION) {
    throw new IndexIntegrityError(`${context} has unsupported format version ${version}`);
  }

  const rows = buffer.readUInt32LE(8);
  const dimensions = buffer.readUInt32LE(12);
  const expectedBytes = HEADER_BYTES + rows * dimensions * 4;
  if (buffer.length !== expectedBytes) {
    throw new IndexIntegrityError(
      `${context} has ${buffer.length} byte(s), expected ${expectedBytes} for ${rows} x ${dimensions}`
    );
  }

  const data = new Float32Array(rows * dimensions);
  for (let i = 0; i < data.length; i++) {
    data[i] = buffer.readFloatLE(HEADER_BYTES + i * 4);
  }

  return { rows, dimensions, data };
}

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { HASH_CHUNK_BYTES } from '@tracklab/core';

/**
 * SHA-256 of a file, streamed in fixed-size chunks so memory stays
 * flat regardless of file size
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES });

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest('hex');
}

export function hashBytes(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

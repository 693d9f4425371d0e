import { promises as fs } from 'fs';
import * as path from 'path';
import { TaskValidationError } from '@tracklab/core';

const SNIFF_BYTES = 12;

/**
 * MIME type from the file's leading bytes, or null when unrecognized
 */
export function sniffAudioType(header: Buffer): string | null {
  if (header.length >= 12 && header.toString('ascii', 0, 4) === 'RIFF' && header.toString('ascii', 8, 12) === 'WAVE') {
    return 'audio/wav';
  }
  if (header.length >= 4 && header.toString('ascii', 0, 4) === 'fLaC') {
    return 'audio/flac';
  }
  if (header.length >= 4 && header.toString('ascii', 0, 4) === 'OggS') {
    return 'audio/ogg';
  }
  if (header.length >= 3 && header.toString('ascii', 0, 3) === 'ID3') {
    return 'audio/mpeg';
  }
  // MPEG audio frame sync: 11 set bits
  if (header.length >= 2 && header[0] === 0xff && (header[1] & 0xe0) === 0xe0) {
    return 'audio/mpeg';
  }

  return null;
}

export async function readFileHeader(filePath: string): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');

  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export type ValidatedAudioFile = {
  sizeBytes: number;
  mimeType: string;
};

/**
 * Reject files that are too large or not a supported audio container
 */
export async function validateAudioFile(
  filePath: string,
  limits: { maxFileSizeBytes: number; allowedAudioTypes: readonly string[] }
): Promise<ValidatedAudioFile> {
  const stats = await fs.stat(filePath);
  const file = path.basename(filePath);

  if (stats.size > limits.maxFileSizeBytes) {
    throw new TaskValidationError(`File ${file} exceeds the maximum size`, {
      sizeBytes: stats.size,
      maxFileSizeBytes: limits.maxFileSizeBytes
    });
  }

  const mimeType = sniffAudioType(await readFileHeader(filePath));

  if (!mimeType || !limits.allowedAudioTypes.includes(mimeType)) {
    throw new TaskValidationError(`File ${file} is not a supported audio type`, {
      detectedType: mimeType,
      allowedAudioTypes: limits.allowedAudioTypes
    });
  }

  return { sizeBytes: stats.size, mimeType };
}

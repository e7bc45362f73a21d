import fs from 'fs';

const CHUNK_SIZE = 64 * 1024;
const MASK_64 = (1n << 64n) - 1n;

function sumWords(buffer: Buffer): bigint {
  let sum = 0n;
  for (let offset = 0; offset + 8 <= buffer.length; offset += 8) {
    sum = (sum + buffer.readBigUInt64LE(offset)) & MASK_64;
  }
  return sum;
}

/**
 * OpenSubtitles movie hash: file size plus the 64-bit little-endian word sums
 * of the first and last 64 KiB, truncated to 64 bits, as 16 hex digits.
 * Files shorter than two chunks have no hash.
 */
export async function computeMovieHash(filePath: string): Promise<string | undefined> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    if (size < CHUNK_SIZE * 2) {
      return undefined;
    }

    const head = Buffer.alloc(CHUNK_SIZE);
    const tail = Buffer.alloc(CHUNK_SIZE);
    await handle.read(head, 0, CHUNK_SIZE, 0);
    await handle.read(tail, 0, CHUNK_SIZE, size - CHUNK_SIZE);

    const hash = (BigInt(size) + sumWords(head) + sumWords(tail)) & MASK_64;
    return hash.toString(16).padStart(16, '0');
  } finally {
    await handle.close();
  }
}

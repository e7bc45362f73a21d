import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { computeMovieHash } from './moviehash';

describe('computeMovieHash', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'moviehash-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should hash a zero-filled file to its size', async () => {
    const file = path.join(dir, 'zeros.mkv');
    await fs.promises.writeFile(file, Buffer.alloc(128 * 1024));

    expect(await computeMovieHash(file)).toBe('0000000000020000');
  });

  it('should add the words of the first chunk', async () => {
    const file = path.join(dir, 'one.mkv');
    const content = Buffer.alloc(128 * 1024);
    content[0] = 1;
    await fs.promises.writeFile(file, content);

    expect(await computeMovieHash(file)).toBe('0000000000020001');
  });

  it('should return undefined for files shorter than two chunks', async () => {
    const file = path.join(dir, 'short.mkv');
    await fs.promises.writeFile(file, Buffer.alloc(1024));

    expect(await computeMovieHash(file)).toBeUndefined();
  });
});

import fs from 'fs';
import path from 'path';
import type { SubtitleCandidate } from '@subtitle-sync/shared-types';
import type { OpenSubtitlesApi } from '../clients/OpenSubtitlesClient';
import { NotFoundError, PermissionError } from '../utils/errors';

/** `/movies/Heat (1995).mkv` + `en` → `/movies/Heat (1995).en.srt` */
export function subtitlePathFor(mediaPath: string, language: string): string {
  const parsed = path.parse(mediaPath);
  return path.join(parsed.dir, `${parsed.name}.${language}.srt`);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes subtitles fetched from OpenSubtitles next to the media file.
 */
export class LocalSubtitleDownloader {
  private client: Pick<OpenSubtitlesApi, 'download'>;

  constructor(client: Pick<OpenSubtitlesApi, 'download'>) {
    this.client = client;
  }

  async mediaExists(mediaPath: string): Promise<boolean> {
    return exists(mediaPath);
  }

  async subtitleExists(mediaPath: string, language: string): Promise<boolean> {
    return exists(subtitlePathFor(mediaPath, language));
  }

  async ensureWritable(directory: string): Promise<void> {
    try {
      await fs.promises.access(directory, fs.constants.W_OK);
    } catch {
      throw new PermissionError(`No write permission in: ${directory}`, directory);
    }
  }

  /**
   * Downloads the candidate and writes it beside `mediaPath`. Resolves to the
   * written path only once the file is on disk.
   */
  async download(candidate: SubtitleCandidate, mediaPath: string): Promise<string> {
    if (candidate.fileId === undefined) {
      throw new NotFoundError(`No file ID for ${candidate.language} subtitle`);
    }
    if (!(await this.mediaExists(mediaPath))) {
      throw new NotFoundError(`File not found: ${mediaPath}`);
    }

    const target = subtitlePathFor(mediaPath, candidate.language);
    await this.ensureWritable(path.dirname(target));

    const content = await this.client.download(candidate.fileId);
    try {
      await fs.promises.writeFile(target, content);
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
        throw new PermissionError(`Cannot write ${target}`, path.dirname(target));
      }
      throw error;
    }
    return target;
  }
}

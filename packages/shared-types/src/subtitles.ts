import type { MediaType } from './media';

export type DownloadMethod = 'local' | 'plex';

export interface SubtitleCandidate {
  language: string;
  rating: number; // 0-10
  downloadCount: number;
  releaseName: string;
  uploader: string;
  fileId?: number;
  fileName?: string;
}

export interface DownloadRecord {
  mediaTitle: string;
  mediaType: MediaType;
  language: string;
  rating: number;
  downloadCount: number;
  releaseName: string;
  uploader: string;
  subtitleFile: string;
  method: DownloadMethod;
  timestamp: Date;
}

export type AcquisitionOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'not_found'; reason: string }
  | { status: 'fatal'; error: Error };

export interface LibraryStats {
  total: number;
  needsSubtitles: number;
  downloaded: number;
  errors: number;
  skipped: number;
}

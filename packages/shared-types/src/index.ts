export type { MediaType, LibraryType, LibrarySummary, MediaItem } from './media';
export type {
  DownloadMethod,
  SubtitleCandidate,
  DownloadRecord,
  AcquisitionOutcome,
  LibraryStats,
} from './subtitles';

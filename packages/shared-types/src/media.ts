export type MediaType = 'movie' | 'episode';

export type LibraryType = 'movie' | 'show';

export interface LibrarySummary {
  key: string;
  title: string;
  type: LibraryType;
}

export interface MediaItem {
  ratingKey: string;
  type: MediaType;
  title: string;
  year?: number;
  // Episode-specific fields
  showTitle?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  filePath?: string;
  fileSize?: number;
  duration?: number; // milliseconds
  subtitleLanguages: string[]; // normalized two-letter codes
  imdbId?: string;
  tmdbId?: string;
  libraryTitle: string;
}

import { vi } from 'vitest';
import type { MediaItem, SubtitleCandidate } from '@subtitle-sync/shared-types';
import type { PlexApi } from '../clients/PlexClient';
import type { PlexLibraryItem } from '../types/plex.types';

export function movie(overrides: Partial<MediaItem> = {}): MediaItem {
  return {
    ratingKey: '100',
    type: 'movie',
    title: 'Inception',
    year: 2010,
    filePath: '/media/movies/Inception (2010)/Inception.mkv',
    fileSize: 1000,
    subtitleLanguages: [],
    libraryTitle: 'Movies',
    ...overrides,
  };
}

export function episode(overrides: Partial<MediaItem> = {}): MediaItem {
  return {
    ratingKey: '200',
    type: 'episode',
    title: 'Pilot',
    showTitle: 'Breaking Bad',
    seasonNumber: 1,
    episodeNumber: 1,
    filePath: '/media/tv/Breaking Bad/Season 01/S01E01.mkv',
    subtitleLanguages: [],
    libraryTitle: 'TV Shows',
    ...overrides,
  };
}

export function candidate(overrides: Partial<SubtitleCandidate> = {}): SubtitleCandidate {
  return {
    language: 'en',
    rating: 0,
    downloadCount: 0,
    releaseName: 'Unknown',
    uploader: 'Unknown',
    fileId: 1,
    ...overrides,
  };
}

/** Plex metadata entry with one part and subtitle streams in `languageCodes`. */
export function plexItem(
  overrides: Partial<PlexLibraryItem> = {},
  languageCodes: string[] = [],
  file = '/media/movies/Heat (1995)/Heat.mkv'
): PlexLibraryItem {
  return {
    ratingKey: '100',
    key: '/library/metadata/100',
    type: 'movie',
    title: 'Heat',
    year: 1995,
    Media: [
      {
        id: 1,
        Part: [
          {
            id: 1,
            key: '/library/parts/1/file.mkv',
            file,
            size: 2048,
            Stream: languageCodes.map((languageCode, index) => ({
              id: index + 10,
              streamType: 3,
              languageCode,
            })),
          },
        ],
      },
    ],
    ...overrides,
  };
}

/** Plex API stand-in with one movie, one show and one music library, all empty. */
export function fakePlexApi(overrides: Partial<PlexApi> = {}): PlexApi {
  return {
    getServerInfo: vi.fn().mockResolvedValue({
      friendlyName: 'Home',
      platform: 'Linux',
      version: '1.40.0',
    }),
    getLibraries: vi.fn().mockResolvedValue([
      { key: '1', type: 'movie', title: 'Movies' },
      { key: '2', type: 'show', title: 'TV Shows' },
      { key: '3', type: 'artist', title: 'Music' },
    ]),
    getLibraryItems: vi.fn().mockResolvedValue([]),
    getAllLeaves: vi.fn().mockResolvedValue([]),
    getMetadata: vi.fn().mockResolvedValue(plexItem()),
    searchSubtitles: vi.fn().mockResolvedValue([]),
    selectSubtitle: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

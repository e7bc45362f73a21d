// Plex API Types

export interface PlexMedia {
  id: string | number;
  Part?: PlexPart[];
}

export interface PlexPart {
  id: string | number;
  key: string;
  file: string;
  size?: number;
  Stream?: PlexStream[];
}

export const PLEX_STREAM_TYPE_SUBTITLE = 3;

export interface PlexStream {
  id: string | number;
  streamType: number;
  languageCode?: string;
}

// Result of the subtitle agent search: a stream the server can fetch on demand
export interface PlexRemoteSubtitle {
  key: string;
  codec?: string;
  providerTitle?: string;
}

export interface PlexLibrary {
  key: string;
  type: string;
  title: string;
}

export interface PlexGuid {
  id: string;
}

export interface PlexLibraryItem {
  ratingKey: string;
  key: string;
  type: string;
  title: string;
  index?: number;
  parentIndex?: number;  // Season number for episodes
  year?: number;
  duration?: number;
  Media?: PlexMedia[];
  Guid?: PlexGuid[];
  // Episode-specific fields
  grandparentTitle?: string;  // Series title for episodes
}

export interface PlexServerInfo {
  friendlyName: string;
  platform: string;
  version: string;
}

export interface PlexLibrariesResponse {
  MediaContainer: {
    size: number;
    Directory?: PlexLibrary[];
  };
}

export interface PlexLibraryItemsResponse {
  MediaContainer: {
    size: number;
    Metadata?: PlexLibraryItem[];
  };
}

export interface PlexRemoteSubtitlesResponse {
  MediaContainer: {
    size: number;
    Stream?: PlexRemoteSubtitle[];
  };
}

export interface PlexServerInfoResponse {
  MediaContainer: PlexServerInfo;
}

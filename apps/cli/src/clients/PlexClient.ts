import type { AxiosAdapter } from 'axios';
import type { ServiceConfig } from '../config/services.config';
import { NotFoundError } from '../utils/errors';
import { HttpClient } from './base/HttpClient';
import type {
  PlexLibrariesResponse,
  PlexLibraryItemsResponse,
  PlexRemoteSubtitlesResponse,
  PlexServerInfoResponse,
  PlexLibrary,
  PlexLibraryItem,
  PlexRemoteSubtitle,
  PlexServerInfo,
} from '../types/plex.types';

export class PlexClient {
  private client: HttpClient;
  private serviceName: string = 'plex';

  constructor(config: ServiceConfig, adapter?: AxiosAdapter) {
    this.client = new HttpClient(
      {
        baseUrl: config.baseUrl,
        timeout: config.timeout,
        headers: {
          'Accept': 'application/json',
          'X-Plex-Token': config.apiKey || '',
          'X-Plex-Client-Identifier': 'subtitle-sync',
          'X-Plex-Product': 'Subtitle Sync',
          'X-Plex-Version': '1.0.0',
        },
        adapter,
      },
      this.serviceName
    );
  }

  async getServerInfo(): Promise<PlexServerInfo> {
    const response = await this.client.get<PlexServerInfoResponse>('/');
    return response.MediaContainer;
  }

  async getLibraries(): Promise<PlexLibrary[]> {
    const response = await this.client.get<PlexLibrariesResponse>('/library/sections');
    return response.MediaContainer.Directory || [];
  }

  async getLibraryItems(libraryKey: string): Promise<PlexLibraryItem[]> {
    const response = await this.client.get<PlexLibraryItemsResponse>(
      `/library/sections/${libraryKey}/all`
    );
    return response.MediaContainer.Metadata || [];
  }

  async getAllLeaves(ratingKey: string): Promise<PlexLibraryItem[]> {
    // Get all episodes for a series using the allLeaves endpoint
    const response = await this.client.get<PlexLibraryItemsResponse>(
      `/library/metadata/${ratingKey}/allLeaves`
    );
    return response.MediaContainer.Metadata || [];
  }

  /** Full item detail: media parts with their streams, plus external guids. */
  async getMetadata(ratingKey: string): Promise<PlexLibraryItem> {
    const response = await this.client.get<PlexLibraryItemsResponse>(
      `/library/metadata/${ratingKey}`,
      { includeGuids: 1 }
    );
    const item = response.MediaContainer.Metadata?.[0];
    if (!item) {
      throw new NotFoundError(`Plex item ${ratingKey} not found`);
    }
    return item;
  }

  async searchSubtitles(ratingKey: string, language: string): Promise<PlexRemoteSubtitle[]> {
    const response = await this.client.get<PlexRemoteSubtitlesResponse>(
      `/library/metadata/${ratingKey}/subtitles`,
      { language, hearingImpaired: 0, forced: 0 }
    );
    return response.MediaContainer.Stream || [];
  }

  async selectSubtitle(ratingKey: string, subtitle: PlexRemoteSubtitle, language: string): Promise<void> {
    await this.client.put(`/library/metadata/${ratingKey}/subtitles`, undefined, {
      params: {
        key: subtitle.key,
        codec: subtitle.codec || 'srt',
        language,
        hearingImpaired: 0,
        forced: 0,
        providerTitle: subtitle.providerTitle || '',
      },
    });
  }
}

export type PlexApi = Pick<
  PlexClient,
  | 'getServerInfo'
  | 'getLibraries'
  | 'getLibraryItems'
  | 'getAllLeaves'
  | 'getMetadata'
  | 'searchSubtitles'
  | 'selectSubtitle'
>;

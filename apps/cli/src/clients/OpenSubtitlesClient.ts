import axios, { type AxiosAdapter } from 'axios';
import type { ServiceConfig } from '../config/services.config';
import {
  ConfigurationError,
  DownloadQuotaExceededError,
  NotFoundError,
  ServiceError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { HttpClient } from './base/HttpClient';
import type {
  OpenSubtitlesDownloadResponse,
  OpenSubtitlesLoginResponse,
  OpenSubtitlesSearchParams,
  OpenSubtitlesSearchResponse,
  OpenSubtitlesSubtitle,
  OpenSubtitlesUser,
  OpenSubtitlesUserInfoResponse,
  RateLimitStatus,
} from '../types/opensubtitles.types';

export interface OpenSubtitlesClientConfig extends ServiceConfig {
  minRequestIntervalMs?: number;
}

function headerValue(value: unknown): string | undefined {
  return value === undefined || value === null ? undefined : String(value);
}

/** Body of a refused `/download` call; it still carries the quota fields. */
function refusalBody(error: ServiceError): OpenSubtitlesDownloadResponse {
  const original = error.originalError;
  if (!axios.isAxiosError(original)) return {};
  const data: unknown = original.response?.data;
  if (!data || typeof data !== 'object') return {};

  return {
    remaining: 'remaining' in data && typeof data.remaining === 'number' ? data.remaining : undefined,
    message: 'message' in data && typeof data.message === 'string' ? data.message : undefined,
    reset_time: 'reset_time' in data && typeof data.reset_time === 'string' ? data.reset_time : undefined,
    reset_time_utc:
      'reset_time_utc' in data && typeof data.reset_time_utc === 'string' ? data.reset_time_utc : undefined,
  };
}

export class OpenSubtitlesClient {
  private client: HttpClient;
  private serviceName = 'opensubtitles';
  private readonly username?: string;
  private readonly password?: string;
  private jwtToken?: string;
  private remainingDownloads?: number;
  // Links already paid for, by file id, until their payload is fetched
  private readonly issuedLinks = new Map<number, string>();

  constructor(config: OpenSubtitlesClientConfig, adapter?: AxiosAdapter) {
    this.username = config.username;
    this.password = config.password;
    this.client = new HttpClient(
      {
        baseUrl: config.baseUrl,
        timeout: config.timeout,
        headers: {
          'Api-Key': config.apiKey || '',
          'User-Agent': config.userAgent || 'SubtitleSync v1.0',
          'Accept': 'application/json',
        },
        minRequestIntervalMs: config.minRequestIntervalMs,
        adapter,
      },
      this.serviceName
    );
  }

  get remaining(): number | undefined {
    return this.remainingDownloads;
  }

  /**
   * Authenticates and stores the JWT used for downloads.
   */
  async login(): Promise<OpenSubtitlesUser | undefined> {
    if (!this.username || !this.password) {
      throw new ConfigurationError('OpenSubtitles username and password are required for downloads');
    }

    logger.info('Logging in to OpenSubtitles...');
    try {
      const response = await this.client.post<OpenSubtitlesLoginResponse>('/login', {
        username: this.username,
        password: this.password,
      });
      if (!response.token) {
        throw new ServiceError('Login response did not include a token', this.serviceName, 502);
      }
      this.jwtToken = response.token;
      logger.info('Successfully logged in');
      return response.user;
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode === 401) {
        throw new ConfigurationError('Invalid OpenSubtitles username or password');
      }
      throw error;
    }
  }

  async search(params: OpenSubtitlesSearchParams): Promise<OpenSubtitlesSubtitle[]> {
    try {
      const response = await this.client.get<OpenSubtitlesSearchResponse>('/subtitles', { ...params });
      return response.data || [];
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode === 406) {
        logger.debug('No subtitles found');
        return [];
      }
      if (error instanceof ServiceError && error.statusCode === 401) {
        throw new ConfigurationError('Invalid OpenSubtitles API key');
      }
      throw error;
    }
  }

  /** Cheap search used to validate the API key and read the rate-limit headers. */
  async probe(): Promise<RateLimitStatus> {
    try {
      const response = await this.client.request<OpenSubtitlesSearchResponse>({
        method: 'GET',
        url: '/subtitles',
        params: { languages: 'en', query: 'test' },
      });
      return {
        remaining: headerValue(response.headers['x-ratelimit-remaining']),
        limit: headerValue(response.headers['x-ratelimit-limit']),
      };
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode === 401) {
        throw new ConfigurationError('Invalid OpenSubtitles API key');
      }
      throw error;
    }
  }

  async getUserInfo(): Promise<OpenSubtitlesUser> {
    const token = await this.ensureToken();
    const response = await this.client.request<OpenSubtitlesUserInfoResponse>({
      method: 'GET',
      url: '/infos/user',
      headers: { Authorization: `Bearer ${token}` },
    });
    const user = response.data.data || {};
    if (user.remaining_downloads !== undefined) {
      this.remainingDownloads = user.remaining_downloads;
    }
    return user;
  }

  /**
   * Requests a download link for `fileId` and fetches the subtitle payload.
   * An expired token is refreshed once. A link whose fetch failed is reused
   * by the next call for the same file, so retries do not spend quota again.
   */
  async download(fileId: number): Promise<Buffer> {
    const link = this.issuedLinks.get(fileId) ?? (await this.requestLink(fileId));
    this.issuedLinks.set(fileId, link);

    const content = await this.client.getBinary(link);
    this.issuedLinks.delete(fileId);
    logger.debug(`Remaining downloads: ${this.remainingDownloads ?? 'unknown'}`);
    return content;
  }

  private async requestLink(fileId: number): Promise<string> {
    if (this.remainingDownloads !== undefined && this.remainingDownloads <= 0) {
      throw new DownloadQuotaExceededError('Daily download limit reached');
    }

    const token = await this.ensureToken();
    let response: OpenSubtitlesDownloadResponse;
    try {
      response = await this.requestDownload(fileId, token);
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode === 401) {
        logger.warn('Invalid token - trying to re-login');
        this.jwtToken = undefined;
        response = await this.requestDownload(fileId, await this.ensureToken());
      } else {
        throw error;
      }
    }

    if (response.remaining !== undefined) {
      this.remainingDownloads = response.remaining;
    }
    if (!response.link) {
      throw new ServiceError(
        `Download response for file ${fileId} did not include a link${response.message ? `: ${response.message}` : ''}`,
        this.serviceName,
        502
      );
    }
    return response.link;
  }

  private async requestDownload(fileId: number, token: string): Promise<OpenSubtitlesDownloadResponse> {
    try {
      return await this.client.post<OpenSubtitlesDownloadResponse>(
        '/download',
        { file_id: fileId },
        { headers: { Authorization: `Bearer ${token}` } }
      );
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode === 406) {
        const body = refusalBody(error);
        if (body.remaining !== undefined && body.remaining > 0) {
          this.remainingDownloads = body.remaining;
          throw new NotFoundError(`Subtitle file ${fileId} unavailable: ${body.message ?? 'download refused'}`);
        }
        this.remainingDownloads = 0;
        throw new DownloadQuotaExceededError(
          'Daily download limit reached',
          body.reset_time_utc ?? body.reset_time
        );
      }
      throw error;
    }
  }

  private async ensureToken(): Promise<string> {
    if (!this.jwtToken) {
      await this.login();
    }
    if (!this.jwtToken) {
      throw new ConfigurationError('Cannot download - not logged in');
    }
    return this.jwtToken;
  }
}

export type OpenSubtitlesApi = Pick<
  OpenSubtitlesClient,
  'login' | 'search' | 'probe' | 'getUserInfo' | 'download' | 'remaining'
>;

// OpenSubtitles REST API (v1) Types

export interface OpenSubtitlesFile {
  file_id: number;
  cd_number?: number;
  file_name?: string;
}

export interface OpenSubtitlesUploader {
  uploader_id?: number;
  name?: string;
  rank?: string;
}

export interface OpenSubtitlesAttributes {
  subtitle_id?: string;
  language?: string;
  download_count?: number;
  new_download_count?: number;
  hearing_impaired?: boolean;
  ratings?: number;
  votes?: number;
  from_trusted?: boolean;
  release?: string;
  uploader?: OpenSubtitlesUploader;
  files?: OpenSubtitlesFile[];
  moviehash_match?: boolean;
}

export interface OpenSubtitlesSubtitle {
  id: string;
  type: string;
  attributes?: OpenSubtitlesAttributes;
}

export interface OpenSubtitlesSearchResponse {
  total_pages?: number;
  total_count?: number;
  page?: number;
  data?: OpenSubtitlesSubtitle[];
}

export interface OpenSubtitlesSearchParams {
  languages: string;
  query?: string;
  year?: number;
  imdb_id?: string;
  tmdb_id?: string;
  moviehash?: string;
  moviebytesize?: number;
  season_number?: number;
  episode_number?: number;
}

export interface OpenSubtitlesUser {
  allowed_downloads?: number;
  remaining_downloads?: number;
  downloads_count?: number;
  level?: string;
  user_id?: number;
  vip?: boolean;
}

export interface OpenSubtitlesLoginResponse {
  token?: string;
  base_url?: string;
  user?: OpenSubtitlesUser;
  status?: number;
}

export interface OpenSubtitlesUserInfoResponse {
  data?: OpenSubtitlesUser;
}

export interface OpenSubtitlesDownloadResponse {
  link?: string;
  file_name?: string;
  requests?: number;
  remaining?: number;
  message?: string;
  reset_time?: string;
  reset_time_utc?: string;
}

export interface RateLimitStatus {
  remaining?: string;
  limit?: string;
}

import { describe, it, expect } from 'vitest';
import type { InternalAxiosRequestConfig } from 'axios';
import { ConfigurationError, DownloadQuotaExceededError, NotFoundError } from '../utils/errors';
import { runWithRetry } from '../utils/retry';
import { type FakeReply, fakeAdapter, jsonBody } from '../test-utils/fakeAdapter';
import { OpenSubtitlesClient } from './OpenSubtitlesClient';

const config = {
  baseUrl: 'https://subs.test/api/v1',
  apiKey: 'test-api-key',
  username: 'tester',
  password: 'test-secret',
};

function route(handlers: Record<string, (request: InternalAxiosRequestConfig) => FakeReply>) {
  return fakeAdapter((request) => {
    const handler = handlers[`${request.method?.toUpperCase()} ${request.url}`];
    return handler ? handler(request) : { status: 404 };
  });
}

describe('OpenSubtitlesClient', () => {
  it('should send the API key and user agent with every request', async () => {
    const { adapter, requests } = route({ 'GET /subtitles': () => ({ data: { data: [] } }) });
    const client = new OpenSubtitlesClient(config, adapter);

    await client.search({ languages: 'en', query: 'Heat' });

    expect(requests[0]?.headers['Api-Key']).toBe('test-api-key');
    expect(requests[0]?.headers['User-Agent']).toBe('SubtitleSync v1.0');
    expect(requests[0]?.params).toEqual({ languages: 'en', query: 'Heat' });
  });

  it('should treat 406 on search as no results', async () => {
    const { adapter } = route({ 'GET /subtitles': () => ({ status: 406 }) });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.search({ languages: 'en' })).resolves.toEqual([]);
  });

  it('should reject an invalid API key as a configuration error', async () => {
    const { adapter } = route({ 'GET /subtitles': () => ({ status: 401 }) });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.search({ languages: 'en' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should log in with the configured credentials', async () => {
    const { adapter, requests } = route({
      'POST /login': () => ({ data: { token: 'jwt', user: { level: 'Sub leecher', allowed_downloads: 20 } } }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    const user = await client.login();

    expect(user).toEqual({ level: 'Sub leecher', allowed_downloads: 20 });
    expect(jsonBody(requests[0])).toEqual({
      username: 'tester',
      password: 'test-secret',
    });
  });

  it('should reject bad credentials as a configuration error', async () => {
    const { adapter } = route({ 'POST /login': () => ({ status: 401 }) });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.login()).rejects.toThrow('Invalid OpenSubtitles username or password');
  });

  it('should download through the returned link', async () => {
    const { adapter, requests } = route({
      'POST /login': () => ({ data: { token: 'jwt' } }),
      'POST /download': () => ({ data: { link: 'https://dl.subs.test/file.srt', remaining: 19 } }),
      'GET https://dl.subs.test/file.srt': () => ({ data: Buffer.from('1\n00:00:01,000 --> 00:00:02,000\nHi\n') }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    const content = await client.download(42);

    expect(content.toString()).toBe('1\n00:00:01,000 --> 00:00:02,000\nHi\n');
    expect(client.remaining).toBe(19);
    const downloadRequest = requests[1];
    expect(downloadRequest?.headers.Authorization).toBe('Bearer jwt');
    expect(jsonBody(downloadRequest)).toEqual({ file_id: 42 });
  });

  it('should log in again once when the token has expired', async () => {
    let downloads = 0;
    let logins = 0;
    const { adapter } = route({
      'POST /login': () => {
        logins += 1;
        return { data: { token: `jwt-${logins}` } };
      },
      'POST /download': (request) => {
        downloads += 1;
        return request.headers.Authorization === 'Bearer jwt-1'
          ? { status: 401 }
          : { data: { link: 'https://dl.subs.test/file.srt', remaining: 5 } };
      },
      'GET https://dl.subs.test/file.srt': () => ({ data: Buffer.from('subtitle') }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.download(7)).resolves.toEqual(Buffer.from('subtitle'));
    expect(logins).toBe(2);
    expect(downloads).toBe(2);
  });

  it('should raise a quota error on 406 without remaining downloads and refuse further downloads', async () => {
    const { adapter, requests } = route({
      'POST /login': () => ({ data: { token: 'jwt' } }),
      'POST /download': () => ({
        status: 406,
        data: { message: 'You have downloaded your allowed 20 subtitles', remaining: 0, reset_time_utc: '2024-06-02T00:00:00.000Z' },
      }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    const error = await client.download(1).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(DownloadQuotaExceededError);
    expect(error).toMatchObject({ resetTime: '2024-06-02T00:00:00.000Z' });
    await expect(client.download(2)).rejects.toBeInstanceOf(DownloadQuotaExceededError);
    expect(requests).toHaveLength(2);
  });

  it('should treat 406 with downloads remaining as an unavailable subtitle', async () => {
    let downloads = 0;
    const { adapter } = route({
      'POST /login': () => ({ data: { token: 'jwt' } }),
      'POST /download': () => {
        downloads += 1;
        return downloads === 1
          ? { status: 406, data: { message: 'Invalid file_id', remaining: 18 } }
          : { data: { link: 'https://dl.subs.test/file.srt', remaining: 17 } };
      },
      'GET https://dl.subs.test/file.srt': () => ({ data: Buffer.from('subtitle') }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.download(1)).rejects.toBeInstanceOf(NotFoundError);
    expect(client.remaining).toBe(18);
    await expect(client.download(2)).resolves.toEqual(Buffer.from('subtitle'));
    expect(client.remaining).toBe(17);
  });

  it('should reuse an issued link when only fetching the payload failed', async () => {
    let downloads = 0;
    let fetches = 0;
    const { adapter } = route({
      'POST /login': () => ({ data: { token: 'jwt' } }),
      'POST /download': () => {
        downloads += 1;
        return { data: { link: 'https://dl.subs.test/file.srt', remaining: 19 } };
      },
      'GET https://dl.subs.test/file.srt': () => {
        fetches += 1;
        return fetches === 1 ? { status: 503 } : { data: Buffer.from('subtitle') };
      },
    });
    const client = new OpenSubtitlesClient(config, adapter);

    const outcome = await runWithRetry(
      { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
      () => client.download(42),
      { label: 'download', sleep: async () => undefined }
    );

    expect(outcome).toEqual({ status: 'success', value: Buffer.from('subtitle') });
    expect(downloads).toBe(1);
    expect(fetches).toBe(2);
  });

  it('should read rate-limit headers when probing', async () => {
    const { adapter } = route({
      'GET /subtitles': () => ({
        data: { data: [] },
        headers: { 'x-ratelimit-remaining': '39', 'x-ratelimit-limit': '40' },
      }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    await expect(client.probe()).resolves.toEqual({ remaining: '39', limit: '40' });
  });

  it('should report the remaining quota from the user info', async () => {
    const { adapter } = route({
      'POST /login': () => ({ data: { token: 'jwt' } }),
      'GET /infos/user': () => ({ data: { data: { remaining_downloads: 12, allowed_downloads: 20 } } }),
    });
    const client = new OpenSubtitlesClient(config, adapter);

    const user = await client.getUserInfo();

    expect(user.remaining_downloads).toBe(12);
    expect(client.remaining).toBe(12);
  });
});

import { describe, it, expect } from 'vitest';
import { ConnectionError, RateLimitedError, ServiceError } from '../../utils/errors';
import { fakeAdapter, unreachableAdapter } from '../../test-utils/fakeAdapter';
import { HttpClient, parseRetryAfter } from './HttpClient';

describe('parseRetryAfter', () => {
  it('should read delta seconds', () => {
    expect(parseRetryAfter('5')).toBe(5000);
    expect(parseRetryAfter(2)).toBe(2000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:10 GMT', now)).toBe(10000);
  });

  it('should clamp dates in the past to zero', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:27:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or unparseable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('HttpClient', () => {
  it('should return response data', async () => {
    const { adapter, requests } = fakeAdapter(() => ({ data: { ok: true } }));
    const client = new HttpClient({ baseUrl: 'http://plex.test', adapter }, 'plex');

    await expect(client.get('/status', { page: 2 })).resolves.toEqual({ ok: true });
    expect(requests[0]?.url).toBe('/status');
    expect(requests[0]?.params).toEqual({ page: 2 });
  });

  it('should map 429 to RateLimitedError with the Retry-After delay', async () => {
    const { adapter } = fakeAdapter(() => ({ status: 429, headers: { 'retry-after': '3' } }));
    const client = new HttpClient({ baseUrl: 'http://plex.test', adapter }, 'plex');

    const error = await client.get('/status').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ service: 'plex', retryAfterMs: 3000 });
  });

  it('should map other error statuses to ServiceError', async () => {
    const { adapter } = fakeAdapter(() => ({ status: 503, data: { message: 'maintenance' } }));
    const client = new HttpClient({ baseUrl: 'http://plex.test', adapter }, 'plex');

    const error = await client.get('/status').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({
      statusCode: 503,
      message: 'GET /status failed with status 503: maintenance',
    });
  });

  it('should map a missing response to ConnectionError', async () => {
    const client = new HttpClient({ baseUrl: 'http://plex.test', adapter: unreachableAdapter() }, 'plex');

    await expect(client.get('/status')).rejects.toBeInstanceOf(ConnectionError);
  });
});

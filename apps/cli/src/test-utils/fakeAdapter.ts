import {
  type AxiosAdapter,
  AxiosError,
  AxiosHeaders,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface FakeReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/**
 * In-process axios transport: every request is recorded and answered by
 * `handler`. Non-2xx replies reject the way axios' http adapter does.
 */
export function fakeAdapter(handler: FakeHandler): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = await handler(config);
    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: reply.data,
      status,
      statusText: String(status),
      headers: new AxiosHeaders(reply.headers),
      config,
      request: {},
    };
    if (status >= 200 && status < 300) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${status}`,
      status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      {},
      response
    );
  };

  return { adapter, requests };
}

/** Adapter that never gets a response, like a refused connection. */
export function unreachableAdapter(): AxiosAdapter {
  return async (config) => {
    throw new AxiosError('connect ECONNREFUSED 127.0.0.1:32400', 'ECONNREFUSED', config, {});
  };
}

export function jsonBody(config: InternalAxiosRequestConfig | undefined): unknown {
  const data: unknown = config?.data;
  return typeof data === 'string' ? JSON.parse(data) : data;
}

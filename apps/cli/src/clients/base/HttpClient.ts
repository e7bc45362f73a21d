import axios, {
  type AxiosAdapter,
  type AxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';
import { ConnectionError, RateLimitedError, ServiceError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface ClientConfig {
  baseUrl: string;
  timeout?: number;
  headers?: Record<string, string>;
  /** Minimum spacing between two requests of this client. */
  minRequestIntervalMs?: number;
  /** Transport override; the default is axios' own http adapter. */
  adapter?: AxiosAdapter;
}

/**
 * Parses a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function responseMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim() !== '') return data.trim();
  if (data && typeof data === 'object') {
    if ('message' in data && typeof data.message === 'string') return data.message;
    if ('errors' in data && Array.isArray(data.errors)) return data.errors.map(String).join('; ');
  }
  return undefined;
}

export class HttpClient {
  protected axiosInstance: AxiosInstance;
  protected serviceName: string;
  private readonly minRequestIntervalMs: number;
  private lastRequestAt = 0;

  constructor(config: ClientConfig, serviceName: string = 'http') {
    this.serviceName = serviceName;
    this.minRequestIntervalMs = config.minRequestIntervalMs ?? 0;

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout || 30000,
      headers: {
        'Content-Type': 'application/json',
        ...config.headers,
      },
      ...(config.adapter && { adapter: config.adapter }),
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    // Request interceptor for pacing and logging
    this.axiosInstance.interceptors.request.use(async (config) => {
      await this.waitForTurn();
      logger.debug(`[${this.serviceName}] ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    // Response interceptor maps transport failures onto typed errors
    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(this.toTypedError(error))
    );
  }

  private async waitForTurn(): Promise<void> {
    if (this.minRequestIntervalMs <= 0) return;
    const elapsed = Date.now() - this.lastRequestAt;
    if (elapsed < this.minRequestIntervalMs) {
      const wait = this.minRequestIntervalMs - elapsed;
      logger.debug(`[${this.serviceName}] Rate limiting: sleeping ${wait}ms`);
      await new Promise((resolve) => setTimeout(resolve, wait));
    }
    this.lastRequestAt = Date.now();
  }

  private toTypedError(error: unknown): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;
    const method = axiosError.config?.method?.toUpperCase() ?? 'GET';
    const url = axiosError.config?.url ?? '';

    if (axiosError.response) {
      const status = axiosError.response.status;
      const detail = responseMessage(axiosError.response.data) ?? axiosError.message;

      if (status === 429) {
        const retryAfterMs = parseRetryAfter(axiosError.response.headers['retry-after']);
        logger.warn(
          `[${this.serviceName}] Rate limit exceeded for ${method} ${url}` +
            (retryAfterMs !== undefined ? ` (retry after ${retryAfterMs}ms)` : '')
        );
        return new RateLimitedError(`Rate limit exceeded: ${detail}`, this.serviceName, retryAfterMs);
      }

      logger.debug(`[${this.serviceName}] ${method} ${url} failed with status ${status}`);
      return new ServiceError(`${method} ${url} failed with status ${status}: ${detail}`, this.serviceName, status, error);
    }

    if (axiosError.request) {
      logger.debug(`[${this.serviceName}] No response received for ${method} ${url}`);
      return new ConnectionError(
        `Cannot reach ${this.serviceName} (${axiosError.code ?? 'no response'}): ${axiosError.message}`,
        this.serviceName,
        error
      );
    }

    return new ServiceError(axiosError.message, this.serviceName, 0, error);
  }

  async request<T>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.axiosInstance.request<T>(config);
  }

  async get<T>(url: string, params?: Record<string, string | number | boolean | undefined>): Promise<T> {
    const response = await this.axiosInstance.get<T>(url, { params });
    return response.data;
  }

  async getBinary(url: string): Promise<Buffer> {
    const response = await this.axiosInstance.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    return Buffer.from(response.data);
  }

  async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.axiosInstance.post<T>(url, data, config);
    return response.data;
  }

  async put<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.axiosInstance.put<T>(url, data, config);
    return response.data;
  }
}

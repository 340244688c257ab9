import axios, { AxiosError, AxiosHeaders, AxiosInstance, AxiosRequestConfig, InternalAxiosRequestConfig } from 'axios';
import http from 'http';
import https from 'https';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';
import { getCorrelationContext, generateCorrelationId } from '../logging/correlation.js';
import { getLogger } from '../logging/logger.js';
import type { HttpClientConfig, HttpResponse } from './types.js';

const httpClientLogger = getLogger('http-client');

const DEFAULT_TIMEOUT_MS = 10000;

export class HttpClientError extends DomainError {
  constructor(
    message: string,
    statusCode: number,
    errorCode: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, statusCode, cause, errorCode, details);
    this.name = 'HttpClientError';
  }
}

const IDEMPOTENT_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'PUT', 'DELETE']);
const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNRESET', 'ECONNREFUSED']);

type RetryableRequestConfig = InternalAxiosRequestConfig & { __retryCount?: number };

function jitter(baseDelay: number): number {
  return baseDelay * (0.5 + Math.random());
}

export class HttpClient {
  private client: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private config: Required<HttpClientConfig>;

  constructor(config: HttpClientConfig = {}) {
    const maxSockets = config.maxSockets ?? 10;

    this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 2 });
    this.httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 2 });

    this.config = {
      baseUrl: config.baseUrl || '',
      timeout: config.timeout || DEFAULT_TIMEOUT_MS,
      retries: config.retries ?? 3,
      retryDelay: config.retryDelay || 1000,
      maxRedirects: config.maxRedirects ?? 5,
      headers: config.headers || {},
      maxSockets,
      userAgent: config.userAgent || 'clusterwatch-http-client/1.0.0',
    };

    this.client = axios.create({
      baseURL: this.config.baseUrl || undefined,
      timeout: this.config.timeout,
      maxRedirects: this.config.maxRedirects,
      validateStatus: status => status < 500,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: {
        Accept: 'application/json',
        ...this.config.headers,
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use(config => {
      if (!config.headers) {
        config.headers = new AxiosHeaders();
      }
      const correlationId = getCorrelationContext()?.correlationId || generateCorrelationId();
      config.headers['x-correlation-id'] = correlationId;
      config.headers['user-agent'] = this.config.userAgent;
      return config;
    });

    this.client.interceptors.response.use(
      response => response,
      async (error: unknown) => {
        if (!axios.isAxiosError(error)) {
          throw this.transformError(error);
        }

        const config: RetryableRequestConfig | undefined = error.config;
        const retryCount = config?.__retryCount ?? 0;

        if (config && this.shouldRetry(error, config) && retryCount < this.config.retries) {
          config.__retryCount = retryCount + 1;
          const delay = jitter(this.config.retryDelay * Math.pow(2, retryCount));
          httpClientLogger.debug('Retrying request', {
            url: config.url,
            attempt: config.__retryCount,
            delayMs: Math.round(delay),
            code: error.code,
          });
          await this.sleep(delay);
          return this.client.request(config);
        }

        throw this.transformError(error);
      }
    );
  }

  private shouldRetry(error: AxiosError, config: AxiosRequestConfig): boolean {
    const method = (config.method || 'GET').toUpperCase();
    if (!IDEMPOTENT_METHODS.has(method)) {
      return false;
    }

    if (error.code && RETRYABLE_CODES.has(error.code)) {
      return true;
    }
    return error.response !== undefined && error.response.status >= 500;
  }

  private transformError(error: unknown): HttpClientError {
    if (!axios.isAxiosError(error)) {
      const cause = error instanceof Error ? error : undefined;
      return new HttpClientError(
        cause?.message || 'Unknown HTTP client error',
        500,
        'HTTP_CLIENT_ERROR',
        undefined,
        cause
      );
    }

    const url = error.config?.url;
    const method = error.config?.method;
    if (error.response) {
      const status = error.response.status;
      return new HttpClientError(
        error.message || `HTTP ${status} Error`,
        status,
        DomainErrorCode.EXTERNAL_SERVICE_ERROR,
        { url, method, status },
        error
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new HttpClientError(
        `Request timed out after ${this.config.timeout}ms`,
        504,
        DomainErrorCode.TIMEOUT,
        { url, method, code: error.code },
        error
      );
    }
    return new HttpClientError(
      'Network error - unable to reach service',
      503,
      DomainErrorCode.SERVICE_UNAVAILABLE,
      { url, method, code: error.code },
      error
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private toHttpResponse<T>(response: { data: T; status: number; headers: object }): HttpResponse<T> {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) headers[key] = String(value);
    }
    return {
      data: response.data,
      status: response.status,
      headers,
      ok: response.status >= 200 && response.status < 300,
    };
  }

  async getWithResponse<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>> {
    const response = await this.client.get<T>(url, config);
    return this.toHttpResponse(response);
  }

  getAxiosInstance(): AxiosInstance {
    return this.client;
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

/**
 * HTTP Types
 *
 * Type definitions for HTTP client functionality
 */

export interface HttpClientConfig {
  baseUrl?: string;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  maxRedirects?: number;
  headers?: Record<string, string>;
  maxSockets?: number;
  userAgent?: string;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
  ok: boolean;
}

/**
 * HTTP client for the managed service
 *
 * Thin fetch wrapper bound to one instance's base URL. Every call carries its
 * own timeout; bodies are always read as text because the service's payload
 * shapes are not contractually fixed.
 */

import { toProvisionerError } from '../api/errors.js';

export interface ServiceResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface ServiceHttpClientOptions {
  baseUrl: string;
  /** Sent as `Authorization: Bearer <apiKey>` when set */
  apiKey?: string;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

export interface RequestOptions {
  timeoutMs: number;
  query?: Record<string, string>;
}

/**
 * Percent-encode a model id as one path segment (`a/b` -> `a%2Fb`).
 */
export function encodePathSegment(value: string): string {
  return encodeURIComponent(value);
}

export class ServiceHttpClient {
  public readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ServiceHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Absolute URL for a service path. The path is used verbatim, so callers
   * encode dynamic segments themselves.
   */
  public url(path: string, query?: Record<string, string>): string {
    const search = query ? `?${new URLSearchParams(query).toString()}` : '';
    return `${this.baseUrl}${path}${search}`;
  }

  public async get(path: string, options: RequestOptions): Promise<ServiceResponse> {
    return this.send('GET', path, options);
  }

  /**
   * POST without a body.
   */
  public async post(path: string, options: RequestOptions): Promise<ServiceResponse> {
    return this.send('POST', path, options);
  }

  private async send(method: 'GET' | 'POST', path: string, options: RequestOptions): Promise<ServiceResponse> {
    const headers: Record<string, string> = { Accept: 'application/json, text/plain, */*' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    try {
      const response = await this.fetchImpl(this.url(path, options.query), {
        method,
        headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      throw toProvisionerError(error, 'TransportError');
    }
  }
}

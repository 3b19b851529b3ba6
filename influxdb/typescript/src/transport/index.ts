/**
 * HTTP transport used by the exporter.
 *
 * The exporter only needs to build GET and POST requests and send them;
 * TLS, pooling and timeouts belong to the transport.
 *
 * @module transport
 */

import { request } from 'undici';
import { InfluxError } from '../errors/index.js';
import type { InfluxSettings } from '../config/index.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * A request built by a transport.
 */
export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: URL;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * A response as seen by the exporter. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  buildGetRequest(url: URL, headers?: Record<string, string>): HttpRequest;
  buildPostRequest(url: URL, headers: Record<string, string>, body: string): HttpRequest;
  sendRequest(request: HttpRequest): Promise<HttpResponse>;
  get(url: URL): Promise<HttpResponse>;
}

/**
 * Creates a transport for a given set of connection settings.
 */
export type TransportFactory = (settings: InfluxSettings) => HttpTransport;

/**
 * Returns the first value of a header, matched case-insensitively.
 */
export function firstHeader(response: HttpResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

/**
 * undici-based transport.
 */
export class UndiciTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: {
    timeout?: number;
    defaultHeaders?: Record<string, string>;
  } = {}) {
    this.timeout = options.timeout ?? 30000;
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  buildGetRequest(url: URL, headers: Record<string, string> = {}): HttpRequest {
    return {
      method: 'GET',
      url,
      headers: { ...this.defaultHeaders, ...headers },
    };
  }

  buildPostRequest(url: URL, headers: Record<string, string>, body: string): HttpRequest {
    const merged: Record<string, string> = { ...this.defaultHeaders, ...headers };
    const hasContentType = Object.keys(merged).some((key) => key.toLowerCase() === 'content-type');
    if (!hasContentType) {
      merged['Content-Type'] = 'text/plain; charset=utf-8';
    }
    return { method: 'POST', url, headers: merged, body };
  }

  async get(url: URL): Promise<HttpResponse> {
    return this.sendRequest(this.buildGetRequest(url));
  }

  async sendRequest(httpRequest: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await request(httpRequest.url, {
        method: httpRequest.method,
        headers: httpRequest.headers,
        body: httpRequest.body,
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
      });

      const body = await response.body.text();

      const headers: Record<string, string> = {};
      for (const [key, value] of Object.entries(response.headers)) {
        if (value === undefined) continue;
        headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
      }

      return { status: response.statusCode, headers, body };
    } catch (error) {
      throw InfluxError.fromUnknown(error);
    }
  }
}

/**
 * Default factory: one undici transport per settings instance, using its
 * read timeout.
 */
export const createUndiciTransport: TransportFactory = (settings) =>
  new UndiciTransport({ timeout: settings.readTimeout });

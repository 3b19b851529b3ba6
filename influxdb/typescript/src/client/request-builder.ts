/**
 * Write request construction.
 * @module client/request-builder
 */

import { InfluxError } from '../errors/index.js';
import type { InfluxSettings } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import type { HttpRequest, HttpTransport } from '../transport/index.js';
import { selectStrategy } from '../version/index.js';

/**
 * Composes the dialect's URL and auth headers into a transport POST
 * request carrying the line-protocol body.
 */
export class WriteRequestBuilder {
  constructor(private readonly logger: Logger) {}

  /**
   * Builds the write request for the settings' detected major version.
   *
   * @throws {InfluxError} UnsupportedVersion or MalformedUrl.
   */
  createRequest(settings: InfluxSettings, transport: HttpTransport, body: string): HttpRequest {
    const strategy = selectStrategy(settings.majorVersion);
    if (!strategy) {
      throw InfluxError.unsupportedVersion(settings.version);
    }

    const url = strategy.buildWriteUrl(settings);
    const headers = strategy.buildAuthHeaders(settings);
    this.logger.debug('write request built', {
      url: url.toString(),
      majorVersion: strategy.majorVersion,
    });
    return transport.buildPostRequest(url, headers, body);
  }

  /**
   * Same as {@link createRequest}, but logs the failure and returns
   * undefined instead of throwing.
   */
  buildRequest(settings: InfluxSettings, transport: HttpTransport, body: string): HttpRequest | undefined {
    try {
      return this.createRequest(settings, transport, body);
    } catch (error) {
      this.logger.error('cannot build write request', {
        error: InfluxError.fromUnknown(error).toString(),
        version: settings.version,
      });
      return undefined;
    }
  }
}

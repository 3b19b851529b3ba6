/**
 * Sends one line-protocol batch to the server.
 * @module client/writer
 */

import { InfluxError } from '../errors/index.js';
import type { InfluxSettings } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';
import { VersionResolver } from '../version/index.js';
import { WriteRequestBuilder } from './request-builder.js';

/**
 * Detects the server version if needed, then posts the batch.
 */
export class InfluxWriter {
  constructor(
    private readonly logger: Logger,
    readonly resolver: VersionResolver = new VersionResolver(logger),
    readonly requestBuilder: WriteRequestBuilder = new WriteRequestBuilder(logger)
  ) {}

  /**
   * Writes one batch. Nothing is retried.
   *
   * @throws {InfluxError} When no version could be detected, the request
   * cannot be built, the transport fails or the server answers >= 300.
   */
  async write(settings: InfluxSettings, transport: HttpTransport, body: string): Promise<void> {
    const version = await this.resolver.ensureVersion(settings, transport);
    if (version === undefined) {
      throw InfluxError.versionUnresolved('server version unknown, batch not sent');
    }

    const request = this.requestBuilder.createRequest(settings, transport, body);

    this.logger.trace('sending batch', { data: body.replace(/\n/g, '') });

    let status: number;
    try {
      status = (await transport.sendRequest(request)).status;
    } catch (error) {
      throw InfluxError.fromUnknown(error);
    }

    if (status >= 300) {
      this.logger.error('influx returned error status', { status, data: body });
      throw InfluxError.httpStatus(status, `Influx returns error code ${status}`);
    }
  }
}

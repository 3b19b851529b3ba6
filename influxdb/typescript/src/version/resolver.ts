/**
 * Server version detection.
 * @module version/resolver
 */

import { InfluxError } from '../errors/index.js';
import type { InfluxSettings } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { firstHeader } from '../transport/index.js';
import type { HttpTransport } from '../transport/index.js';

/** Header in which InfluxDB advertises its version. */
export const VERSION_HEADER = 'X-Influxdb-Version';

/** Version reported when the server sends no version header. */
export const UNKNOWN_VERSION = 'unknown';

/**
 * Probes the server root for its advertised version and caches the result
 * on the settings instance.
 */
export class VersionResolver {
  constructor(private readonly logger: Logger) {}

  /**
   * Issues one GET against the server root and returns the advertised
   * version, or {@link UNKNOWN_VERSION} if the header is missing.
   *
   * @throws {InfluxError} On any transport failure.
   */
  async resolveVersion(settings: InfluxSettings, transport: HttpTransport): Promise<string> {
    const url = settings.connectionUrl();
    this.logger.debug('probing server version', { url: url.toString() });

    let version: string;
    try {
      const response = await transport.get(url);
      version = firstHeader(response, VERSION_HEADER) ?? UNKNOWN_VERSION;
    } catch (error) {
      throw InfluxError.fromUnknown(error);
    }

    this.logger.debug('server version detected', { version });
    return version;
  }

  /**
   * Returns the cached version, probing first if none is cached yet.
   *
   * A failed probe is logged and leaves the cache empty, so the next call
   * probes again; undefined is returned in that case.
   */
  async ensureVersion(settings: InfluxSettings, transport: HttpTransport): Promise<string | undefined> {
    if (settings.version !== undefined) {
      return settings.version;
    }

    try {
      const version = await this.resolveVersion(settings, transport);
      settings.setVersionIfAbsent(version);
    } catch (error) {
      this.logger.error('version detection failed', {
        error: InfluxError.fromUnknown(error).toString(),
      });
    }

    return settings.version;
  }
}

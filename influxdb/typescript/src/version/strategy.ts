/**
 * Wire dialects of the InfluxDB write API.
 * @module version/strategy
 */

import { toUrl } from '../config/index.js';
import type { InfluxSettings } from '../config/index.js';

/**
 * Supported major versions.
 */
export type InfluxMajorVersion = 1 | 2;

/**
 * Builds the write URL and auth headers for one API dialect.
 */
export interface InfluxVersionStrategy {
  readonly majorVersion: InfluxMajorVersion;
  buildWriteUrl(settings: InfluxSettings): URL;
  buildAuthHeaders(settings: InfluxSettings): Record<string, string>;
}

/**
 * InfluxDB 1.x: `/write?db=...`, optional Basic auth.
 */
export const influxV1: InfluxVersionStrategy = {
  majorVersion: 1,

  buildWriteUrl(settings) {
    return toUrl(
      `${settings.scheme}://${settings.host}:${settings.port}/write?db=${settings.database}&precision=s`
    );
  },

  buildAuthHeaders(settings): Record<string, string> {
    if (settings.user === undefined || settings.password === undefined) {
      return {};
    }
    const credentials = Buffer.from(`${settings.user}:${settings.password}`, 'latin1').toString('base64');
    return { Authorization: `Basic ${credentials}` };
  },
};

/**
 * InfluxDB 2.x: `/api/v2/write?bucket=...&org=...`, optional Token auth.
 *
 * The user setting is read as the organization and the password as the
 * API token.
 */
export const influxV2: InfluxVersionStrategy = {
  majorVersion: 2,

  buildWriteUrl(settings) {
    const org = settings.user !== undefined ? `&org=${settings.user}` : '';
    return toUrl(
      `${settings.scheme}://${settings.host}:${settings.port}/api/v2/write?bucket=${settings.database}&precision=s${org}`
    );
  },

  buildAuthHeaders(settings): Record<string, string> {
    if (settings.user === undefined || settings.password === undefined) {
      return {};
    }
    return { Authorization: `Token ${settings.password}` };
  },
};

/**
 * Selects the strategy for a major version, or undefined if unsupported.
 */
export function selectStrategy(majorVersion: number): InfluxVersionStrategy | undefined {
  switch (majorVersion) {
    case 1:
      return influxV1;
    case 2:
      return influxV2;
    default:
      return undefined;
  }
}

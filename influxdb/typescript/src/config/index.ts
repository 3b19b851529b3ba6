/**
 * Connection settings for the InfluxDB exporter.
 * @module config
 */

import { z } from 'zod';
import { InfluxError } from '../errors/index.js';

/** Default InfluxDB host. */
export const DEFAULT_HOST = 'localhost';

/** Default InfluxDB HTTP port. */
export const DEFAULT_PORT = 8086;

/** Default read timeout in milliseconds (5 seconds). */
export const DEFAULT_READ_TIMEOUT = 5000;

/** Default database (v1) or bucket (v2) name. */
export const DEFAULT_DATABASE = 'measurements';

/** Major version assumed when the advertised version cannot be parsed. */
export const DEFAULT_MAJOR_VERSION = 1;

const optionalCredential = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

/**
 * Zod schema for raw connection settings.
 */
export const influxSettingsSchema = z.object({
  host: z.string().trim().min(1, 'Host cannot be empty'),
  port: z.number().int().min(1).max(65535),
  user: optionalCredential,
  password: optionalCredential,
  database: z.string().trim().min(1, 'Database name cannot be empty'),
  ssl: z.boolean(),
  readTimeout: z.number().int().positive('Read timeout must be greater than 0'),
});

/**
 * Plain persisted shape of the connection settings.
 */
export type InfluxSettingsInput = z.input<typeof influxSettingsSchema>;

/**
 * Validated connection settings without the version cache.
 */
export type InfluxSettingsRecord = z.output<typeof influxSettingsSchema>;

/**
 * Derives the major version from an advertised version string.
 *
 * Every character other than digits and dots is stripped, the result is
 * split on dots and the first segment parsed. Anything unparsable,
 * including an absent version, yields {@link DEFAULT_MAJOR_VERSION}.
 */
export function parseMajorVersion(version: string | null | undefined): number {
  if (version === null || version === undefined) {
    return DEFAULT_MAJOR_VERSION;
  }
  const [first] = `${version.replace(/[^0-9.]/g, '')}.`.split('.');
  if (!first || !/^\d+$/.test(first)) {
    return DEFAULT_MAJOR_VERSION;
  }
  return Number.parseInt(first, 10);
}

/**
 * InfluxDB connection settings.
 *
 * Immutable apart from the detected server version, which is filled in
 * at most once per instance and only cleared through {@link resetVersion}.
 * In the v2 dialect `user` carries the organization and `password` the
 * API token.
 */
export class InfluxSettings {
  readonly host: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
  readonly database: string;
  readonly ssl: boolean;
  readonly readTimeout: number;
  private cachedVersion?: string;

  constructor(record: InfluxSettingsRecord) {
    this.host = record.host;
    this.port = record.port;
    this.user = record.user;
    this.password = record.password;
    this.database = record.database;
    this.ssl = record.ssl;
    this.readTimeout = record.readTimeout;
  }

  /**
   * Validates raw input and creates settings from it.
   * @throws {InfluxError} If the input is invalid.
   */
  static parse(input: InfluxSettingsInput): InfluxSettings {
    const result = influxSettingsSchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw InfluxError.configuration(`Invalid InfluxDB settings: ${issues}`);
    }
    return new InfluxSettings(result.data);
  }

  /** Detected server version, if a probe has succeeded. */
  get version(): string | undefined {
    return this.cachedVersion;
  }

  /** Major version derived from {@link version}. */
  get majorVersion(): number {
    return parseMajorVersion(this.cachedVersion);
  }

  /**
   * Stores the detected version unless one is already cached.
   * @returns True if the version was stored.
   */
  setVersionIfAbsent(version: string): boolean {
    if (this.cachedVersion !== undefined) {
      return false;
    }
    this.cachedVersion = version;
    return true;
  }

  /**
   * Clears the cached version so the next send probes again.
   */
  resetVersion(): void {
    this.cachedVersion = undefined;
  }

  /** `http` or `https`, depending on the SSL flag. */
  get scheme(): 'http' | 'https' {
    return this.ssl ? 'https' : 'http';
  }

  /**
   * Server root, used for the version probe.
   * @throws {InfluxError} If host and port do not form a valid URL.
   */
  connectionUrl(): URL {
    return toUrl(`${this.scheme}://${this.host}:${this.port}/`);
  }

  /**
   * Returns the persisted shape, without the version cache.
   */
  toRecord(): InfluxSettingsRecord {
    return {
      host: this.host,
      port: this.port,
      user: this.user,
      password: this.password,
      database: this.database,
      ssl: this.ssl,
      readTimeout: this.readTimeout,
    };
  }

  /**
   * Creates a fresh instance with the same values and no cached version.
   */
  rebuild(): InfluxSettings {
    return new InfluxSettings(this.toRecord());
  }

  /** True when both user and password are set. */
  hasCredentials(): boolean {
    return this.user !== undefined && this.password !== undefined;
  }
}

/**
 * Parses a URL string, mapping parse failures to a MalformedUrl error.
 */
export function toUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw InfluxError.malformedUrl(
      `malformed url: ${value}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Creates the default settings record.
 */
export function createDefaultSettings(): InfluxSettingsRecord {
  return {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    user: undefined,
    password: undefined,
    database: DEFAULT_DATABASE,
    ssl: false,
    readTimeout: DEFAULT_READ_TIMEOUT,
  };
}

/**
 * Builder for InfluxSettings.
 */
export class InfluxSettingsBuilder {
  private record: InfluxSettingsInput;

  constructor() {
    this.record = createDefaultSettings();
  }

  host(host: string): this {
    this.record.host = host;
    return this;
  }

  port(port: number): this {
    this.record.port = port;
    return this;
  }

  /**
   * Sets the user (v1) or organization (v2).
   */
  user(user: string): this {
    this.record.user = user;
    return this;
  }

  /**
   * Sets the password (v1) or API token (v2).
   */
  password(password: string): this {
    this.record.password = password;
    return this;
  }

  /**
   * Sets the database (v1) or bucket (v2).
   */
  database(database: string): this {
    this.record.database = database;
    return this;
  }

  ssl(enabled: boolean): this {
    this.record.ssl = enabled;
    return this;
  }

  /**
   * Sets the read timeout in milliseconds.
   */
  readTimeout(timeout: number): this {
    this.record.readTimeout = timeout;
    return this;
  }

  /**
   * Builds and validates the settings.
   * @throws {InfluxError} If the settings are invalid.
   */
  build(): InfluxSettings {
    return InfluxSettings.parse({ ...this.record });
  }
}

/**
 * Creates a settings builder pre-configured from environment variables.
 *
 * Environment variables:
 * - INFLUXDB_HOST
 * - INFLUXDB_PORT
 * - INFLUXDB_USER: user (v1) or organization (v2)
 * - INFLUXDB_PASSWORD: password (v1) or API token (v2)
 * - INFLUXDB_DATABASE: database (v1) or bucket (v2)
 * - INFLUXDB_SSL: true/false
 * - INFLUXDB_READ_TIMEOUT_MS
 */
export function createSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): InfluxSettingsBuilder {
  const builder = new InfluxSettingsBuilder();

  if (env.INFLUXDB_HOST) {
    builder.host(env.INFLUXDB_HOST);
  }

  if (env.INFLUXDB_PORT) {
    const port = parseInt(env.INFLUXDB_PORT, 10);
    if (!isNaN(port)) {
      builder.port(port);
    }
  }

  if (env.INFLUXDB_USER) {
    builder.user(env.INFLUXDB_USER);
  }

  if (env.INFLUXDB_PASSWORD) {
    builder.password(env.INFLUXDB_PASSWORD);
  }

  if (env.INFLUXDB_DATABASE) {
    builder.database(env.INFLUXDB_DATABASE);
  }

  if (env.INFLUXDB_SSL !== undefined) {
    builder.ssl(env.INFLUXDB_SSL.toLowerCase() === 'true');
  }

  if (env.INFLUXDB_READ_TIMEOUT_MS) {
    const timeout = parseInt(env.INFLUXDB_READ_TIMEOUT_MS, 10);
    if (!isNaN(timeout)) {
      builder.readTimeout(timeout);
    }
  }

  return builder;
}

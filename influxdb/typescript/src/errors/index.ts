/**
 * Error types for the InfluxDB exporter.
 * @module errors
 */

/**
 * Error kinds for categorizing exporter failures.
 */
export enum InfluxErrorKind {
  // Transport / I-O
  /** Connection refused, reset or otherwise failed. */
  Io = 'io',
  /** A URL could not be built from the connection settings. */
  MalformedUrl = 'malformed_url',
  /** The transport gave up waiting for the server. */
  Timeout = 'timeout',
  /** The wait was interrupted (shutdown or abort). */
  Interrupted = 'interrupted',

  // Protocol
  /** Server answered a write or probe with a non-2xx status. */
  HttpStatus = 'http_status',
  /** Server advertises a major version other than 1 or 2. */
  UnsupportedVersion = 'unsupported_version',
  /** No server version could be detected yet. */
  VersionUnresolved = 'version_unresolved',

  // Client
  /** Invalid connection settings. */
  Configuration = 'configuration',
  /** Lifecycle call made in the wrong state. */
  InvalidState = 'invalid_state',

  /** Unknown error. */
  Unknown = 'unknown',
}

const IO_KINDS: ReadonlySet<InfluxErrorKind> = new Set([
  InfluxErrorKind.Io,
  InfluxErrorKind.MalformedUrl,
  InfluxErrorKind.Timeout,
  InfluxErrorKind.Interrupted,
]);

/**
 * Exporter error with a kind and optional HTTP status.
 */
export class InfluxError extends Error {
  /** Error kind. */
  public readonly kind: InfluxErrorKind;
  /** HTTP status code, when the server answered. */
  public readonly statusCode?: number;
  /** Underlying cause. */
  public readonly cause?: Error;

  constructor(
    kind: InfluxErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'InfluxError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfluxError);
    }
  }

  /**
   * Returns true for every failure in the transport/I-O category.
   */
  isIoFailure(): boolean {
    return IO_KINDS.has(this.kind);
  }

  // Convenience factory methods

  static io(message: string, cause?: Error): InfluxError {
    return new InfluxError(InfluxErrorKind.Io, message, { cause });
  }

  static malformedUrl(message: string, cause?: Error): InfluxError {
    return new InfluxError(InfluxErrorKind.MalformedUrl, message, { cause });
  }

  static timeout(message: string, cause?: Error): InfluxError {
    return new InfluxError(InfluxErrorKind.Timeout, message, { cause });
  }

  static interrupted(message: string): InfluxError {
    return new InfluxError(InfluxErrorKind.Interrupted, message);
  }

  static httpStatus(status: number, message: string): InfluxError {
    return new InfluxError(InfluxErrorKind.HttpStatus, message, {
      statusCode: status,
    });
  }

  static unsupportedVersion(version: string | undefined): InfluxError {
    return new InfluxError(
      InfluxErrorKind.UnsupportedVersion,
      `unsupported or unknown influx DB version '${version ?? ''}'`
    );
  }

  static versionUnresolved(message: string): InfluxError {
    return new InfluxError(InfluxErrorKind.VersionUnresolved, message);
  }

  static configuration(message: string): InfluxError {
    return new InfluxError(InfluxErrorKind.Configuration, message);
  }

  static invalidState(message: string): InfluxError {
    return new InfluxError(InfluxErrorKind.InvalidState, message);
  }

  /**
   * Normalizes anything thrown by a transport into an InfluxError.
   */
  static fromUnknown(error: unknown): InfluxError {
    if (isInfluxError(error)) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError') {
        return InfluxError.interrupted(error.message);
      }
      if (
        error.name === 'HeadersTimeoutError' ||
        error.name === 'BodyTimeoutError' ||
        error.name === 'ConnectTimeoutError'
      ) {
        return InfluxError.timeout('connection timeout', error);
      }
      if (error instanceof TypeError && error.message.toLowerCase().includes('url')) {
        return InfluxError.malformedUrl('malformed url', error);
      }
      return InfluxError.io(error.message, error);
    }

    return new InfluxError(InfluxErrorKind.Unknown, String(error));
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }
}

/**
 * Type guard for InfluxError.
 */
export function isInfluxError(error: unknown): error is InfluxError {
  return error instanceof InfluxError;
}

/**
 * InfluxDB exporter
 *
 * Accepts measurement snapshots from any number of producers and writes
 * them to InfluxDB from a single background worker:
 * - FIFO delivery, one batch in flight at a time
 * - v1/v2 dialect chosen from the server's advertised version
 * - a failed batch is logged and dropped, never retried
 *
 * @module exporter
 */

import { z } from 'zod';
import { createDefaultSettings, InfluxSettings } from './config/index.js';
import { InfluxWriter } from './client/index.js';
import { InfluxError, InfluxErrorKind } from './errors/index.js';
import { ConsoleLogger, ExportStatsRecorder } from './observability/index.js';
import type { ExportStats, Logger } from './observability/index.js';
import { LineProtocolEncoder, nowInSeconds } from './protocol/index.js';
import { AsyncQueue, QueueWorker } from './queue/index.js';
import type { WorkerState } from './queue/index.js';
import type { Snapshot } from './table/index.js';
import { createUndiciTransport, firstHeader } from './transport/index.js';
import type { HttpResponse, HttpTransport, TransportFactory } from './transport/index.js';

/** Default exporter name used in log context. */
export const DEFAULT_EXPORTER_NAME = 'influxdb';

/**
 * Exporter options.
 */
export interface InfluxExporterOptions {
  /** Connection settings. Defaults to {@link createDefaultSettings}. */
  settings?: InfluxSettings;
  /** Name used in log context. */
  name?: string;
  /** Creates the transport for a settings instance. */
  transportFactory?: TransportFactory;
  /** Logger. Defaults to a console logger at info level. */
  logger?: Logger;
  /** Current time in seconds since epoch (UTC). */
  clock?: () => number;
}

const errorBodySchema = z
  .object({
    error: z.unknown().optional(),
    message: z.unknown().optional(),
  })
  .passthrough();

/**
 * Extracts the failure message from a non-2xx response: the `error` or
 * `message` field of a JSON body, otherwise the bare status code.
 */
export function extractErrorMessage(response: HttpResponse): string {
  const contentType = firstHeader(response, 'Content-Type') ?? '';
  if (!contentType.includes('application/json')) {
    return String(response.status);
  }

  let json: unknown;
  try {
    json = JSON.parse(response.body);
  } catch {
    return String(response.status);
  }

  const parsed = errorBodySchema.safeParse(json);
  if (!parsed.success) {
    return String(response.status);
  }
  const detail = parsed.data.error ?? parsed.data.message;
  return detail === undefined || detail === null
    ? `unknown json error with ${response.status}`
    : String(detail);
}

/**
 * Maps transport-level failures onto the single I/O category reported by
 * {@link InfluxExporter.testConnection}.
 */
function normalizeIoFailure(error: InfluxError): InfluxError {
  switch (error.kind) {
    case InfluxErrorKind.MalformedUrl:
      return new InfluxError(InfluxErrorKind.MalformedUrl, 'malformed url', { cause: error });
    case InfluxErrorKind.Timeout:
    case InfluxErrorKind.Interrupted:
      return new InfluxError(error.kind, 'connection timeout', { cause: error });
    default:
      return error;
  }
}

/**
 * Queued InfluxDB line-protocol exporter.
 */
export class InfluxExporter {
  readonly name: string;
  private settings: InfluxSettings;
  private transport: HttpTransport;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly encoder = new LineProtocolEncoder();
  private readonly writer: InfluxWriter;
  private readonly queue = new AsyncQueue<Snapshot>();
  private readonly worker: QueueWorker<Snapshot>;
  private readonly stats = new ExportStatsRecorder();
  private lastCallAt?: Date;

  constructor(options: InfluxExporterOptions = {}) {
    this.name = options.name ?? DEFAULT_EXPORTER_NAME;
    this.logger = (options.logger ?? new ConsoleLogger()).child({ exporter: this.name });
    this.clock = options.clock ?? nowInSeconds;
    this.transportFactory = options.transportFactory ?? createUndiciTransport;
    this.settings = options.settings ?? this.getDefaultSettings();
    this.transport = this.transportFactory(this.settings);
    this.writer = new InfluxWriter(this.logger);
    this.worker = new QueueWorker(
      this.queue,
      (snapshot) => this.exportSnapshot(snapshot),
      this.logger
    );
  }

  /** Worker lifecycle state. */
  get state(): WorkerState {
    return this.worker.state;
  }

  /** Timestamp of the most recently accepted snapshot. */
  get lastCall(): Date | undefined {
    return this.lastCallAt;
  }

  /** Number of snapshots waiting in the queue. */
  get pendingExports(): number {
    return this.queue.size;
  }

  /** Current connection settings. */
  getSettings(): InfluxSettings {
    return this.settings;
  }

  getStats(): ExportStats {
    return this.stats.snapshot();
  }

  /**
   * Default connection settings.
   */
  getDefaultSettings(): InfluxSettings {
    return InfluxSettings.parse(createDefaultSettings());
  }

  /**
   * Starts the background worker.
   * @throws {InfluxError} If the exporter was already initialized or shut down.
   */
  initialize(): void {
    this.logger.debug('initialize influx exporter');
    this.worker.start();
  }

  /**
   * Stops the background worker. A batch already being sent completes;
   * queued snapshots are not sent. Resolves once the worker has exited.
   */
  async shutdown(): Promise<void> {
    this.logger.debug('shutdown influx exporter', { pending: this.queue.size });
    await this.worker.stop();
  }

  /**
   * Replaces the connection settings. The next batch probes the server
   * version again.
   */
  updateConfiguration(settings: InfluxSettings): void {
    this.settings = settings.rebuild();
    this.transport = this.transportFactory(this.settings);
    this.logger.debug('configuration updated', { host: this.settings.host, port: this.settings.port });
  }

  /**
   * Queues a snapshot for export. Never waits; snapshots without tables
   * are ignored.
   */
  addExport(snapshot: Snapshot): void {
    if (snapshot.tables.length === 0) {
      this.logger.debug('no exporting tables, skip export');
      return;
    }
    this.logger.debug('add export');
    this.lastCallAt = snapshot.timestamp;
    this.queue.enqueue(snapshot);
    this.stats.increment('enqueued');
  }

  /**
   * Resolves once every queued snapshot has been handled.
   */
  whenIdle(): Promise<void> {
    return this.worker.whenIdle();
  }

  /**
   * Checks that a candidate configuration can reach the server and write
   * to the database, independently of the queue.
   *
   * @returns A success message naming the detected server version.
   * @throws {InfluxError} With the server's error message, the bare HTTP
   * status, or a normalized I/O failure.
   */
  async testConnection(candidate: InfluxSettings): Promise<string> {
    const settings = candidate.rebuild();
    const transport = this.transportFactory(settings);

    try {
      const version = await this.writer.resolver.resolveVersion(settings, transport);
      settings.setVersionIfAbsent(version);

      const request = this.writer.requestBuilder.createRequest(settings, transport, '');
      let response: HttpResponse;
      try {
        response = await transport.sendRequest(request);
      } catch (error) {
        throw InfluxError.fromUnknown(error);
      }

      if (response.status >= 200 && response.status <= 300) {
        return `Connection successful, InfluxDB version ${version}`;
      }

      this.logger.error('connection test failed', { status: response.status });
      throw InfluxError.httpStatus(response.status, extractErrorMessage(response));
    } catch (error) {
      const influxError = InfluxError.fromUnknown(error);
      throw influxError.isIoFailure() ? normalizeIoFailure(influxError) : influxError;
    }
  }

  private async exportSnapshot(snapshot: Snapshot): Promise<void> {
    this.stats.increment('processed');
    if (snapshot.tables.length === 0) {
      this.logger.debug('no exporting tables, skip export');
      return;
    }

    const startTime = Date.now();
    const fallbackTimestamp = this.clock();
    const body = this.encoder.encodeAll(snapshot.tables, fallbackTimestamp);

    if (body.length === 0) {
      this.stats.increment('skipped');
      this.logger.warn('empty table(s), skip export');
      return;
    }

    try {
      await this.writer.write(this.settings, this.transport, body);
      this.stats.increment('sent');
    } catch (error) {
      this.stats.increment('failed');
      this.logger.error('export failed', { error: InfluxError.fromUnknown(error).toString() });
    }

    this.logger.debug('export finished', {
      tables: snapshot.tables.map((table) => table.name),
      durationMs: Date.now() - startTime,
    });
  }
}

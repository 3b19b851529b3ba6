/**
 * influxdb-line-exporter - queued InfluxDB line-protocol exporter
 *
 * Converts tabular measurement snapshots to line protocol and writes them
 * to InfluxDB 1.x or 2.x, detecting the dialect from the server:
 * - non-blocking enqueue, single background writer, FIFO order
 * - lazy, cached server version detection
 * - connection test for validating settings
 *
 * @module influxdb-line-exporter
 */

// Config
export type { InfluxSettingsInput, InfluxSettingsRecord } from './config/index.js';

export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_DATABASE,
  DEFAULT_MAJOR_VERSION,
  InfluxSettings,
  InfluxSettingsBuilder,
  influxSettingsSchema,
  createDefaultSettings,
  createSettingsFromEnv,
  parseMajorVersion,
} from './config/index.js';

// Errors
export { InfluxErrorKind, InfluxError, isInfluxError } from './errors/index.js';

// Observability
export type { Logger, LogEntry, ExportStats } from './observability/index.js';

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
} from './observability/index.js';

// Tables
export type {
  TableColumn,
  TableRow,
  TableCell,
  MeasurementTable,
  Snapshot,
  CellInput,
} from './table/index.js';

export { ColumnType, ValueCell, InMemoryTable, TableBuilder } from './table/index.js';

// Line protocol
export { LineProtocolEncoder, formatField, nowInSeconds } from './protocol/index.js';

// Transport
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  TransportFactory,
} from './transport/index.js';

export { UndiciTransport, createUndiciTransport, firstHeader } from './transport/index.js';

// Version dialects
export type { InfluxMajorVersion, InfluxVersionStrategy } from './version/index.js';

export {
  influxV1,
  influxV2,
  selectStrategy,
  VersionResolver,
  VERSION_HEADER,
  UNKNOWN_VERSION,
} from './version/index.js';

// Client
export { WriteRequestBuilder, InfluxWriter } from './client/index.js';

// Queue
export type { TakeResult, WorkerState, ItemProcessor } from './queue/index.js';

export { AsyncQueue, QueueWorker } from './queue/index.js';

// Exporter
export type { InfluxExporterOptions } from './exporter.js';

export { InfluxExporter, DEFAULT_EXPORTER_NAME, extractErrorMessage } from './exporter.js';

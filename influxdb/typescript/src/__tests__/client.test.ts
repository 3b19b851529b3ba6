/**
 * Tests for write request construction and batch writing.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InfluxWriter, WriteRequestBuilder } from '../client/index.js';
import { InfluxSettingsBuilder } from '../config/index.js';
import type { InfluxSettings } from '../config/index.js';
import { InfluxError, InfluxErrorKind } from '../errors/index.js';
import { InMemoryLogger, LogLevel } from '../observability/index.js';
import { MockHttpTransport, connectionRefused } from '../testing/index.js';

async function captureError(promise: Promise<unknown>): Promise<InfluxError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof InfluxError)) {
    throw new Error(`expected InfluxError, got ${String(error)}`);
  }
  return error;
}

function settingsWithVersion(version: string, builder = new InfluxSettingsBuilder()): InfluxSettings {
  const settings = builder.build();
  settings.setVersionIfAbsent(version);
  return settings;
}

describe('WriteRequestBuilder', () => {
  let transport: MockHttpTransport;
  let logger: InMemoryLogger;
  let builder: WriteRequestBuilder;

  beforeEach(() => {
    transport = new MockHttpTransport();
    logger = new InMemoryLogger();
    builder = new WriteRequestBuilder(logger);
  });

  it('should build a v1 write request', () => {
    const settings = settingsWithVersion(
      '1.8.3',
      new InfluxSettingsBuilder().host('h').database('d').user('user').password('pass')
    );

    const request = builder.buildRequest(settings, transport, 'm v=1 1\n');

    expect(request?.method).toBe('POST');
    expect(request?.url.toString()).toBe('http://h:8086/write?db=d&precision=s');
    expect(request?.headers).toEqual({ Authorization: 'Basic dXNlcjpwYXNz' });
    expect(request?.body).toBe('m v=1 1\n');
  });

  it('should build a v2 write request', () => {
    const settings = settingsWithVersion(
      'v2.1',
      new InfluxSettingsBuilder().host('h').database('d').user('org1').password('tok').ssl(true)
    );

    const request = builder.buildRequest(settings, transport, 'm v=1 1\n');

    expect(request?.url.toString()).toBe('https://h:8086/api/v2/write?bucket=d&precision=s&org=org1');
    expect(request?.headers).toEqual({ Authorization: 'Token tok' });
  });

  it('should fall back to v1 for an unparsable version', () => {
    const settings = settingsWithVersion('unknown', new InfluxSettingsBuilder().host('h').database('d'));

    const request = builder.buildRequest(settings, transport, '');

    expect(request?.url.toString()).toBe('http://h:8086/write?db=d&precision=s');
  });

  it('should return undefined and log for an unsupported version', () => {
    const settings = settingsWithVersion('3.0.0');

    expect(builder.buildRequest(settings, transport, 'm v=1 1\n')).toBeUndefined();
    expect(logger.hasLog(LogLevel.Error, 'cannot build write request')).toBe(true);
  });

  it('should return undefined for a malformed url', () => {
    const settings = settingsWithVersion('1.8.3', new InfluxSettingsBuilder().host('bad host'));

    expect(builder.buildRequest(settings, transport, 'm v=1 1\n')).toBeUndefined();
  });

  it('should throw typed errors from createRequest', () => {
    expect(() => builder.createRequest(settingsWithVersion('3.0'), transport, '')).toThrow(
      "unsupported or unknown influx DB version '3.0'"
    );
    expect(() =>
      builder.createRequest(
        settingsWithVersion('2.0', new InfluxSettingsBuilder().host('bad host')),
        transport,
        ''
      )
    ).toThrow(/^malformed url/);
  });
});

describe('InfluxWriter', () => {
  let transport: MockHttpTransport;
  let logger: InMemoryLogger;
  let writer: InfluxWriter;

  beforeEach(() => {
    transport = new MockHttpTransport();
    logger = new InMemoryLogger();
    writer = new InfluxWriter(logger);
  });

  it('should probe the version before the first write', async () => {
    transport.mockVersion('1.8.10');
    const settings = new InfluxSettingsBuilder().host('h').database('d').build();

    await writer.write(settings, transport, 'm v=1 1\n');

    const requests = transport.getRequests();
    expect(requests.map((r) => r.method)).toEqual(['GET', 'POST']);
    expect(requests[1].url.toString()).toBe('http://h:8086/write?db=d&precision=s');
    expect(requests[1].body).toBe('m v=1 1\n');
    expect(settings.version).toBe('1.8.10');
  });

  it('should not probe when the version is cached', async () => {
    const settings = settingsWithVersion('2.7.4', new InfluxSettingsBuilder().user('org1'));

    await writer.write(settings, transport, 'm v=1 1\n');

    expect(transport.getRequests().map((r) => r.method)).toEqual(['POST']);
  });

  it('should not send when version detection fails', async () => {
    transport.mock({ method: 'GET' }, { error: connectionRefused() });
    const settings = new InfluxSettingsBuilder().build();

    const error = await captureError(writer.write(settings, transport, 'm v=1 1\n'));

    expect(error.kind).toBe(InfluxErrorKind.VersionUnresolved);
    expect(transport.getWrites()).toHaveLength(0);
    expect(settings.version).toBeUndefined();
  });

  it('should reject an unsupported server version', async () => {
    transport.mockVersion('3.0.0');
    const settings = new InfluxSettingsBuilder().build();

    const error = await captureError(writer.write(settings, transport, 'm v=1 1\n'));

    expect(error.kind).toBe(InfluxErrorKind.UnsupportedVersion);
    expect(transport.getWrites()).toHaveLength(0);
  });

  it('should report error statuses with the offending data', async () => {
    transport.mock({ method: 'POST' }, { status: 400, body: 'bad line' });
    const settings = settingsWithVersion('1.8.10');

    const error = await captureError(writer.write(settings, transport, 'm v= 1\n'));

    expect(error.kind).toBe(InfluxErrorKind.HttpStatus);
    expect(error.statusCode).toBe(400);
    const [entry] = logger.getLogsByLevel(LogLevel.Error);
    expect(entry.message).toBe('influx returned error status');
    expect(entry.context).toEqual({ status: 400, data: 'm v= 1\n' });
  });

  it('should treat 3xx answers as failures', async () => {
    transport.mock({ method: 'POST' }, { status: 300 });
    const settings = settingsWithVersion('1.8.10');

    const error = await captureError(writer.write(settings, transport, 'm v=1 1\n'));

    expect(error.statusCode).toBe(300);
  });

  it('should raise transport failures as I/O errors', async () => {
    transport.mock({ method: 'POST' }, { error: connectionRefused() });
    const settings = settingsWithVersion('1.8.10');

    const error = await captureError(writer.write(settings, transport, 'm v=1 1\n'));

    expect(error.isIoFailure()).toBe(true);
  });
});

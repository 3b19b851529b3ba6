/**
 * Tests for the undici transport, against undici's in-process mock agent.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import type { Dispatcher } from 'undici';
import { InfluxSettingsBuilder } from '../config/index.js';
import { InfluxErrorKind } from '../errors/index.js';
import { UndiciTransport, createUndiciTransport, firstHeader } from '../transport/index.js';

const ORIGIN = 'http://influx.local:8086';

describe('UndiciTransport', () => {
  let originalDispatcher: Dispatcher;
  let agent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    transport = new UndiciTransport({ timeout: 1000 });
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await agent.close();
  });

  describe('request building', () => {
    it('should add a text content type to POST requests', () => {
      const request = transport.buildPostRequest(new URL(`${ORIGIN}/write`), { Authorization: 'Token tok' }, 'm v=1 1\n');

      expect(request.method).toBe('POST');
      expect(request.headers).toEqual({
        Authorization: 'Token tok',
        'Content-Type': 'text/plain; charset=utf-8',
      });
      expect(request.body).toBe('m v=1 1\n');
    });

    it('should keep an explicit content type', () => {
      const request = transport.buildPostRequest(new URL(`${ORIGIN}/write`), { 'content-type': 'text/csv' }, '');

      expect(request.headers).toEqual({ 'content-type': 'text/csv' });
    });

    it('should merge default headers', () => {
      const withDefaults = new UndiciTransport({ defaultHeaders: { 'User-Agent': 'exporter-test' } });

      const request = withDefaults.buildGetRequest(new URL(`${ORIGIN}/`));

      expect(request.headers).toEqual({ 'User-Agent': 'exporter-test' });
    });
  });

  describe('sendRequest', () => {
    it('should return status, lower-cased headers and body', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/', method: 'GET' })
        .reply(204, '', { headers: { 'X-Influxdb-Version': '1.8.10' } });

      const response = await transport.get(new URL(`${ORIGIN}/`));

      expect(response.status).toBe(204);
      expect(firstHeader(response, 'X-Influxdb-Version')).toBe('1.8.10');
      expect(response.body).toBe('');
    });

    it('should send the body and headers of a POST', async () => {
      agent
        .get(ORIGIN)
        .intercept({
          path: '/write?db=d&precision=s',
          method: 'POST',
          body: 'm v=1 1\n',
          headers: { authorization: 'Basic dXNlcjpwYXNz' },
        })
        .reply(400, '{"error":"partial write"}', { headers: { 'content-type': 'application/json' } });

      const response = await transport.sendRequest(
        transport.buildPostRequest(
          new URL(`${ORIGIN}/write?db=d&precision=s`),
          { Authorization: 'Basic dXNlcjpwYXNz' },
          'm v=1 1\n'
        )
      );

      expect(response.status).toBe(400);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.body).toBe('{"error":"partial write"}');
    });

    it('should raise connection failures as I/O errors', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/', method: 'GET' })
        .replyWithError(new Error('connect ECONNREFUSED 127.0.0.1:8086'));

      const error = await transport.get(new URL(`${ORIGIN}/`)).catch((e: unknown) => e);

      expect(error).toHaveProperty('kind', InfluxErrorKind.Io);
      expect(error).toHaveProperty('message', 'connect ECONNREFUSED 127.0.0.1:8086');
    });
  });

  describe('createUndiciTransport', () => {
    it('should create an undici transport for the settings', () => {
      const settings = new InfluxSettingsBuilder().readTimeout(250).build();

      expect(createUndiciTransport(settings)).toBeInstanceOf(UndiciTransport);
    });
  });
});

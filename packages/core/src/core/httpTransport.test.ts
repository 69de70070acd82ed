/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  vi,
  type Mock,
} from 'vitest';
import {
  AxiosError,
  type AxiosAdapter,
  type InternalAxiosRequestConfig,
} from 'axios';
import { HttpTransport, isHttpMethod } from './httpTransport.js';
import { CancelledError, TimeoutError, TransportError } from './errors.js';

function respond(
  config: InternalAxiosRequestConfig,
  status: number,
  data: unknown,
) {
  return {
    data,
    status,
    statusText: String(status),
    headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-1' },
    config,
  };
}

describe('HttpTransport', () => {
  let adapter: Mock<AxiosAdapter>;
  let transport: HttpTransport;

  beforeEach(() => {
    adapter = vi.fn<AxiosAdapter>();
    adapter.mockImplementation(async (config) => respond(config, 200, { ok: true }));
    transport = new HttpTransport({
      timeoutMs: 5000,
      userAgent: 'apigate-test/1.0',
      adapter,
    });
  });

  afterEach(() => {
    transport.close();
  });

  function lastConfig(): InternalAxiosRequestConfig {
    const call = adapter.mock.calls[adapter.mock.calls.length - 1];
    if (!call) {
      throw new Error('adapter was not called');
    }
    return call[0];
  }

  describe('send()', () => {
    it('should put GET parameters in the query string', async () => {
      const response = await transport.send({
        method: 'GET',
        url: 'https://api.test/search',
        params: { q: 'cafe', page: 2 },
      });

      expect(response).toEqual({
        status: 200,
        data: { ok: true },
        headers: { 'content-type': 'application/json', 'x-request-id': 'req-1' },
      });
      const config = lastConfig();
      expect(config.method).toBe('get');
      expect(config.params).toEqual({ q: 'cafe', page: 2 });
      expect(config.data).toBeUndefined();
    });

    it('should send POST parameters as a JSON body', async () => {
      await transport.send({
        method: 'POST',
        url: 'https://api.test/items',
        params: { name: 'widget' },
      });

      const config = lastConfig();
      expect(config.params).toBeUndefined();
      expect(config.data).toBe('{"name":"widget"}');
    });

    it('should send the user agent, caller headers and timeout', async () => {
      await transport.send({
        method: 'GET',
        url: 'https://api.test/search',
        headers: { Authorization: 'Bearer test-token' },
        timeoutMs: 1234,
      });

      const config = lastConfig();
      expect(config.headers.get('User-Agent')).toBe('apigate-test/1.0');
      expect(config.headers.get('Authorization')).toBe('Bearer test-token');
      expect(config.timeout).toBe(1234);
    });

    it('should fall back to the default timeout', async () => {
      await transport.send({ method: 'GET', url: 'https://api.test/' });

      expect(lastConfig().timeout).toBe(5000);
    });

    it('should resolve for error statuses', async () => {
      adapter.mockImplementation(async (config) =>
        respond(config, 429, { error: 'slow down' }),
      );

      const response = await transport.send({
        method: 'GET',
        url: 'https://api.test/search',
      });

      expect(response.status).toBe(429);
      expect(response.data).toEqual({ error: 'slow down' });
    });
  });

  describe('failures', () => {
    it('should map a timeout to TimeoutError', async () => {
      adapter.mockImplementation(async (config) => {
        throw new AxiosError(
          'timeout of 5000ms exceeded',
          AxiosError.ECONNABORTED,
          config,
        );
      });

      const failure = transport.send({ method: 'GET', url: 'https://api.test/' });

      await expect(failure).rejects.toBeInstanceOf(TimeoutError);
      await expect(failure).rejects.toMatchObject({
        kind: 'TimeoutError',
        timeoutMs: 5000,
      });
    });

    it('should map a connection failure to TransportError', async () => {
      adapter.mockImplementation(async (config) => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      });

      await expect(
        transport.send({ method: 'GET', url: 'https://api.test/' }),
      ).rejects.toMatchObject({
        kind: 'TransportError',
        code: 'ECONNREFUSED',
        message: 'Request to https://api.test/ failed: connect ECONNREFUSED',
      });
    });

    it('should map an abort to CancelledError', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        transport.send({
          method: 'GET',
          url: 'https://api.test/',
          signal: controller.signal,
        }),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(adapter).not.toHaveBeenCalled();
    });

    it('should refuse to send once closed', async () => {
      transport.close();
      transport.close();

      expect(transport.isClosed()).toBe(true);
      await expect(
        transport.send({ method: 'GET', url: 'https://api.test/' }),
      ).rejects.toBeInstanceOf(TransportError);
      expect(adapter).not.toHaveBeenCalled();
    });
  });

  it('should recognise supported methods', () => {
    expect(isHttpMethod('PATCH')).toBe(true);
    expect(isHttpMethod('get')).toBe(false);
    expect(isHttpMethod('TRACE')).toBe(false);
  });
});

import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { CapabilityError } from '../../../src/errors/app-error.js';
import {
  toHeaders,
  UndiciChannel,
  UndiciTransport,
} from '../../../src/http/undici-transport.js';
import { Fetcher } from '../../../src/lib/fetcher.js';
import type {
  CacheMode,
  TransportRequest,
} from '../../../src/lib/transport.js';
import { ExecutionContext } from '../../../src/services/context.js';
import { readText } from '../../helpers/fake-transport.js';

function bodiless(
  method: string,
  url: string,
  cache?: CacheMode
): TransportRequest {
  return {
    method,
    url,
    headers: new Headers(),
    body: null,
    expectedBodySize: undefined,
    cache,
    signal: null,
  };
}

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  test('returns status, headers and a web body', async () => {
    agent
      .get('https://a.test')
      .intercept({ path: '/data', method: 'GET' })
      .reply(200, 'hello', { headers: { 'x-served-by': 'mock' } });
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.request(
      bodiless('GET', 'https://a.test/data')
    );

    expect(response.status).toBe(200);
    expect(response.statusText).toBe('OK');
    expect(response.headers.get('x-served-by')).toBe('mock');
    expect(response.body ? await readText(response.body) : null).toBe('hello');
  });

  test('turns the cache mode into request headers', async () => {
    agent
      .get('https://a.test')
      .intercept({
        path: '/fresh',
        method: 'GET',
        headers: { 'cache-control': 'no-cache', pragma: 'no-cache' },
      })
      .reply(204, '');
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.request(
      bodiless('GET', 'https://a.test/fresh', 'no-cache')
    );

    expect(response.status).toBe(204);
    await response.body?.cancel();
  });

  test('refuses methods undici cannot send', async () => {
    const transport = new UndiciTransport({ dispatcher: agent });

    await expect(
      transport.request(bodiless('PROPFIND', 'https://a.test/'))
    ).rejects.toBeInstanceOf(CapabilityError);
  });
});

describe('UndiciChannel', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  test('sends client metadata under the configured header', async () => {
    agent
      .get('https://a.test')
      .intercept({
        path: '/',
        method: 'GET',
        headers: { 'x-request-metadata': '{"tenant":"test"}' },
      })
      .reply(200, 'tagged');
    const channel = new UndiciChannel({
      dispatcher: agent,
      metadataHeader: 'x-request-metadata',
    });

    const client = channel.startRequest({
      metadataJson: '{"tenant":"test"}',
      operationName: 'fetch',
    });
    const response = await client.request(bodiless('GET', 'https://a.test/'));

    expect(response.body ? await readText(response.body) : null).toBe('tagged');
  });

  test('serves a fetcher end to end', async () => {
    agent
      .get('https://a.test')
      .intercept({ path: '/greeting', method: 'GET' })
      .reply(200, 'hi there');
    const context = new ExecutionContext({
      channels: [new UndiciChannel({ dispatcher: agent })],
    });

    const text = await context.run(() =>
      Fetcher.forChannel(0).get('https://a.test/greeting')
    );

    expect(text).toBe('hi there');
  });
});

describe('toHeaders', () => {
  test('expands repeated values', () => {
    const headers = toHeaders({
      'set-cookie': ['a=1', 'b=2'],
      'x-single': 'one',
      'x-missing': undefined,
    });

    expect(headers.getSetCookie()).toEqual(['a=1', 'b=2']);
    expect(headers.get('x-single')).toBe('one');
    expect(headers.has('x-missing')).toBe(false);
  });
});

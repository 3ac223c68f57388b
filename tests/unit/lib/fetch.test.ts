import diagnosticsChannel from 'node:diagnostics_channel';
import { gzipSync } from 'node:zlib';

import { afterEach, describe, expect, test } from 'vitest';

import {
  CancellationError,
  CapabilityError,
  TransmissionError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import { fetchImpl } from '../../../src/lib/fetch.js';
import { Fetcher } from '../../../src/lib/fetcher.js';
import { Request } from '../../../src/lib/request.js';
import type {
  Transport,
  TransportResponse,
} from '../../../src/lib/transport.js';
import { ExecutionContext } from '../../../src/services/context.js';
import { RequestObserver } from '../../../src/services/observer.js';
import {
  FakeChannel,
  type FakeHandler,
  redirectTo,
  streamOf,
  textResponse,
} from '../../helpers/fake-transport.js';

function setup(handler?: FakeHandler): {
  channel: FakeChannel;
  context: ExecutionContext;
  fetcher: Fetcher;
} {
  const channel = new FakeChannel(handler);
  return {
    channel,
    context: new ExecutionContext({ channels: [channel] }),
    fetcher: Fetcher.forChannel(0),
  };
}

describe('fetchImpl', () => {
  test('sends the request through the fetcher channel', async () => {
    const { channel, context, fetcher } = setup((request) =>
      textResponse(200, `${request.method} ${request.url}`, {
        'x-served-by': 'fake',
      })
    );

    const response = await context.run(() =>
      fetcher.fetch('https://a.test/path', {
        headers: { 'x-trace': '1' },
        metadata: { tenant: 'test' },
      })
    );

    expect(response.status).toBe(200);
    expect(response.statusText).toBe('OK');
    expect(response.url).toBe('https://a.test/path');
    expect(response.headers.get('x-served-by')).toBe('fake');
    expect(await response.text()).toBe('GET https://a.test/path');
    expect(channel.requests[0]?.headers.get('x-trace')).toBe('1');
    expect(channel.started).toEqual([
      { metadataJson: '{"tenant":"test"}', operationName: 'fetch' },
    ]);
  });

  test('requires a fetcher', async () => {
    await expect(fetchImpl(null, 'https://a.test/')).rejects.toThrow(
      CapabilityError
    );
  });

  test('falls back to the fetcher carried by the request', async () => {
    const { channel, context, fetcher } = setup();
    const request = new Request('https://a.test/', { fetcher });

    const response = await context.run(() => fetchImpl(null, request));

    expect(await response.text()).toBe('ok');
    expect(channel.requests).toHaveLength(1);
  });

  test('only http and https URLs are fetched', async () => {
    const { channel, context, fetcher } = setup();

    await expect(
      context.run(() => fetcher.fetch('ftp://a.test/file'))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(channel.requests).toHaveLength(0);
  });

  test('wraps transport failures', async () => {
    const { context, fetcher } = setup(() => {
      throw new Error('connection reset');
    });

    const error = await context
      .run(() => fetcher.fetch('https://a.test/'))
      .then(
        () => null,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(TransmissionError);
    expect(error instanceof TransmissionError ? error.message : null).toBe(
      'Network request failed: connection reset'
    );
    expect(error instanceof TransmissionError ? error.url : null).toBe(
      'https://a.test/'
    );
  });

  test('fails fast on an already aborted signal', async () => {
    const { channel, context, fetcher } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      context.run(() =>
        fetcher.fetch('https://a.test/', { signal: controller.signal })
      )
    ).rejects.toBeInstanceOf(CancellationError);
    expect(channel.requests).toHaveLength(0);
  });

  test('aborting mid-flight rejects with a cancellation', async () => {
    const controller = new AbortController();
    const { context, fetcher } = setup(
      () => new Promise<TransportResponse>(() => undefined)
    );

    const pending = context.run(() =>
      fetcher.fetch('https://a.test/', { signal: controller.signal })
    );
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(CancellationError);
  });

  test('decodes compressed responses unless asked not to', async () => {
    const compressed = gzipSync('plain text');
    const { context, fetcher } = setup(() => ({
      status: 200,
      statusText: 'OK',
      headers: new Headers({ 'content-encoding': 'gzip' }),
      body: streamOf(compressed),
    }));

    const decoded = await context.run(() => fetcher.fetch('https://a.test/'));
    const raw = await context.run(() =>
      fetcher.fetch('https://a.test/', { encodeResponseBody: 'manual' })
    );

    expect(await decoded.text()).toBe('plain text');
    expect(await raw.bytes()).toEqual(new Uint8Array(compressed));
  });

  test('wraps non in-house clients with the observer', async () => {
    const wrapped: string[] = [];
    class WrappingObserver extends RequestObserver {
      override wrapTransport(transport: Transport): Transport {
        wrapped.push('wrapped');
        return transport;
      }
    }
    const channel = new FakeChannel();
    const context = new ExecutionContext({
      channels: [channel],
      observer: new WrappingObserver(),
    });

    await context.run(() => Fetcher.forChannel(0).fetch('https://a.test/'));
    await context.run(() =>
      Fetcher.forChannel(0, { isInHouse: true }).fetch('https://a.test/')
    );

    expect(wrapped).toEqual(['wrapped']);
  });

  describe('telemetry', () => {
    const events: string[] = [];
    const onMessage = (message: unknown): void => {
      if (typeof message === 'object' && message !== null && 'type' in message) {
        events.push(String(message.type));
      }
    };

    afterEach(() => {
      diagnosticsChannel.unsubscribe('sandbox-fetch.fetch', onMessage);
      events.length = 0;
    });

    test('publishes start and end events on the fetch channel', async () => {
      diagnosticsChannel.subscribe('sandbox-fetch.fetch', onMessage);
      const { context, fetcher } = setup();

      await context.run(() => fetcher.fetch('https://a.test/'));

      expect(events).toEqual(['start', 'end']);
    });

    test('publishes an error event for failed calls', async () => {
      diagnosticsChannel.subscribe('sandbox-fetch.fetch', onMessage);
      const { context, fetcher } = setup(() => {
        throw new Error('down');
      });

      await expect(
        context.run(() => fetcher.fetch('https://a.test/'))
      ).rejects.toThrow(TransmissionError);

      expect(events).toEqual(['start', 'error']);
    });
  });
});

describe('redirects', () => {
  test('follows a redirect chain and records every URL', async () => {
    const { channel, context, fetcher } = setup((request) =>
      request.url === 'https://a.test/'
        ? redirectTo('/next')
        : textResponse(200, 'done')
    );

    const response = await context.run(() => fetcher.fetch('https://a.test/'));

    expect(response.urlList).toEqual(['https://a.test/', 'https://a.test/next']);
    expect(response.url).toBe('https://a.test/next');
    expect(response.redirected).toBe(true);
    expect(await response.text()).toBe('done');
    expect(channel.started).toHaveLength(2);
  });

  test('a 303 turns a POST into a bodiless GET', async () => {
    const { channel, context, fetcher } = setup((request) =>
      request.url === 'https://a.test/form'
        ? redirectTo('/result', 303)
        : textResponse(200, 'result')
    );

    await context.run(() =>
      fetcher.fetch('https://a.test/form', { method: 'POST', body: 'payload' })
    );

    const [first, second] = channel.requests;
    expect(first?.method).toBe('POST');
    expect(first?.body).toBe('payload');
    expect(first?.headers.get('content-type')).toBe('text/plain;charset=UTF-8');
    expect(second?.method).toBe('GET');
    expect(second?.body).toBeNull();
    expect(second?.headers.has('content-type')).toBe(false);
  });

  test('a 307 replays the buffered body', async () => {
    const { channel, context, fetcher } = setup((request) =>
      request.url === 'https://a.test/upload'
        ? redirectTo('/upload-here', 307)
        : textResponse(201, null)
    );

    const response = await context.run(() =>
      fetcher.fetch('https://a.test/upload', { method: 'POST', body: 'again' })
    );

    expect(response.status).toBe(201);
    expect(channel.requests.map((request) => request.body)).toEqual([
      'again',
      'again',
    ]);
    expect(channel.requests[1]?.method).toBe('POST');
    expect(channel.requests[1]?.expectedBodySize).toBe(5);
  });

  test('a stream body cannot be replayed', async () => {
    const { context, fetcher } = setup(() => redirectTo('/elsewhere', 307));

    await expect(
      context.run(() =>
        fetcher.fetch('https://a.test/', {
          method: 'POST',
          body: streamOf('once'),
        })
      )
    ).rejects.toThrow(
      'A request with a one-time-use body encountered a redirect requiring the body to be retransmitted.'
    );
  });

  test('stops after the redirect limit', async () => {
    const { channel, context, fetcher } = setup(() => redirectTo('/loop'));

    await expect(
      context.run(() => fetcher.fetch('https://a.test/'))
    ).rejects.toThrow('Too many redirects.');
    expect(channel.requests).toHaveLength(21);
  });

  test('manual mode returns the redirect itself', async () => {
    const { channel, context, fetcher } = setup(() => redirectTo('/next'));

    const response = await context.run(() =>
      fetcher.fetch('https://a.test/', { redirect: 'manual' })
    );

    expect(response.status).toBe(302);
    expect(response.headers.get('location')).toBe('/next');
    expect(response.urlList).toEqual(['https://a.test/']);
    expect(channel.requests).toHaveLength(1);
  });

  test('a redirect without location is returned as is', async () => {
    const { context, fetcher } = setup(() => textResponse(301, 'moved'));

    const response = await context.run(() => fetcher.fetch('https://a.test/'));

    expect(response.status).toBe(301);
    expect(await response.text()).toBe('moved');
  });

  test('drops authorization when leaving the origin', async () => {
    const { channel, context, fetcher } = setup((request) => {
      if (request.url === 'https://a.test/') return redirectTo('/same');
      if (request.url === 'https://a.test/same') {
        return redirectTo('https://b.test/other');
      }
      return textResponse(200, 'ok');
    });

    await context.run(() =>
      fetcher.fetch('https://a.test/', {
        headers: { authorization: 'Bearer test-token' },
      })
    );

    expect(
      channel.requests.map((request) => request.headers.get('authorization'))
    ).toEqual(['Bearer test-token', 'Bearer test-token', null]);
  });

  test('refuses redirects to other protocols', async () => {
    const { context, fetcher } = setup(() => redirectTo('ftp://a.test/file'));

    await expect(
      context.run(() => fetcher.fetch('https://a.test/'))
    ).rejects.toThrow('Unsupported redirect protocol: ftp:');
  });
});

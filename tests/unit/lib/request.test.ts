import { describe, expect, test } from 'vitest';

import { ValidationError } from '../../../src/errors/app-error.js';
import { createNeverAbortSignal } from '../../../src/lib/abort-utils.js';
import { Fetcher } from '../../../src/lib/fetcher.js';
import { Request } from '../../../src/lib/request.js';
import { parseRequestInit } from '../../../src/lib/request-init.js';
import { ExecutionContext } from '../../../src/services/context.js';
import { readText } from '../../helpers/fake-transport.js';

describe('Request', () => {
  describe('construction', () => {
    test('applies defaults', () => {
      const request = new Request('https://example.com/path');

      expect(request.method).toBe('GET');
      expect(request.url).toBe('https://example.com/path');
      expect(request.redirect).toBe('follow');
      expect(request.cache).toBeUndefined();
      expect(request.encodeResponseBody).toBe('automatic');
      expect(request.fetcher).toBeNull();
      expect(request.metadata).toBeNull();
      expect(request.integrity).toBe('');
      expect(request.keepalive).toBe(false);
      expect(request.body).toBeNull();
    });

    test('normalizes standard methods and keeps others as given', () => {
      expect(new Request('https://a.test/', { method: 'post' }).method).toBe(
        'POST'
      );
      expect(new Request('https://a.test/', { method: 'patch' }).method).toBe(
        'patch'
      );
    });

    test('accepts URL objects', () => {
      const request = new Request(new URL('https://a.test/x?y=1'));

      expect(request.url).toBe('https://a.test/x?y=1');
    });

    test('sets the content type implied by the body', async () => {
      const request = new Request('https://a.test/', {
        method: 'POST',
        body: 'payload',
      });

      expect(request.headers.get('content-type')).toBe(
        'text/plain;charset=UTF-8'
      );
      expect(await request.text()).toBe('payload');
    });

    test('keeps an explicit content type', () => {
      const request = new Request('https://a.test/', {
        method: 'POST',
        body: '{}',
        headers: { 'content-type': 'application/json' },
      });

      expect(request.headers.get('content-type')).toBe('application/json');
    });

    test('rejects malformed URLs, methods and bodies', () => {
      expect(() => new Request('/relative')).toThrow(ValidationError);
      expect(() => new Request('https://user:pw@a.test/')).toThrow(
        'Request URLs cannot include embedded credentials.'
      );
      expect(
        () => new Request('https://a.test/', { method: 'bad method' })
      ).toThrow('Invalid HTTP method: bad method');
      expect(() => new Request('https://a.test/', { body: 'x' })).toThrow(
        'Request with a GET or HEAD method cannot have a body.'
      );
      expect(
        () => new Request('https://a.test/', { method: 'HEAD', body: 'x' })
      ).toThrow(ValidationError);
    });

    test('validates init fields', () => {
      expect(() => parseRequestInit({ redirect: 'error' })).toThrow(
        'Invalid request init (redirect: '
      );
      expect(() => parseRequestInit({ keepalive: true })).toThrow(
        ValidationError
      );
      expect(() => parseRequestInit({ body: 42 })).toThrow(ValidationError);
      expect(() => parseRequestInit({ integrity: 'sha256-x' })).toThrow(
        ValidationError
      );
      expect(parseRequestInit({ redirect: 'manual' }).redirect).toBe('manual');
    });
  });

  describe('cache option', () => {
    test('accepts no-store and no-cache by default', () => {
      expect(new Request('https://a.test/', { cache: 'no-store' }).cache).toBe(
        'no-store'
      );
      expect(new Request('https://a.test/', { cache: 'no-cache' }).cache).toBe(
        'no-cache'
      );
    });

    test('rejects other cache modes', () => {
      expect(() => new Request('https://a.test/', { cache: 'reload' })).toThrow(
        'Unsupported cache mode: reload'
      );
    });

    test('follows the context compatibility flags', () => {
      const disabled = new ExecutionContext({
        flags: { cacheOptionEnabled: false },
      });
      const noStoreOnly = new ExecutionContext({
        flags: { cacheNoCache: false },
      });

      expect(() =>
        disabled.run(() => new Request('https://a.test/', { cache: 'no-store' }))
      ).toThrow("The 'cache' field on the request init is not implemented.");
      expect(() =>
        noStoreOnly.run(
          () => new Request('https://a.test/', { cache: 'no-cache' })
        )
      ).toThrow(ValidationError);
      expect(
        noStoreOnly.run(
          () => new Request('https://a.test/', { cache: 'no-store' })
        ).cache
      ).toBe('no-store');
    });
  });

  describe('from another request', () => {
    test('moves the body and leaves the source used', async () => {
      const original = new Request('https://a.test/', {
        method: 'POST',
        body: 'payload',
      });
      const copy = new Request(original);

      expect(original.bodyUsed).toBe(true);
      expect(copy.method).toBe('POST');
      expect(copy.headers.get('content-type')).toBe(
        'text/plain;charset=UTF-8'
      );
      expect(await copy.text()).toBe('payload');
    });

    test('rejects a source whose body was consumed', async () => {
      const original = new Request('https://a.test/', {
        method: 'POST',
        body: 'payload',
      });
      await original.text();

      expect(() => new Request(original)).toThrow(ValidationError);
    });

    test('overrides fields from init', () => {
      const original = new Request('https://a.test/', {
        headers: { 'x-one': '1' },
        redirect: 'manual',
      });
      const copy = new Request(original, { method: 'DELETE' });

      expect(copy.method).toBe('DELETE');
      expect(copy.redirect).toBe('manual');
      expect(copy.headers.get('x-one')).toBe('1');
    });

    test('copies fields from a request passed as init', () => {
      const template = new Request('https://template.test/', {
        method: 'PUT',
        body: 'from template',
      });
      const request = new Request('https://a.test/', template);

      expect(request.url).toBe('https://a.test/');
      expect(request.method).toBe('PUT');
      expect(template.bodyUsed).toBe(true);
    });
  });

  describe('coerce', () => {
    test('reuses a request when there is nothing to override', () => {
      const request = new Request('https://a.test/');

      expect(Request.coerce(request)).toBe(request);
      expect(Request.coerce(request, {})).toBe(request);
    });

    test('builds a new request otherwise', () => {
      const request = new Request('https://a.test/');
      const coerced = Request.coerce(request, { method: 'PUT' });

      expect(coerced).not.toBe(request);
      expect(coerced.method).toBe('PUT');
      expect(Request.coerce('https://b.test/').url).toBe('https://b.test/');
    });
  });

  describe('clone', () => {
    test('copies fields and gives each side its own headers', async () => {
      const request = new Request('https://a.test/', {
        method: 'POST',
        body: 'twice',
        metadata: { tenant: 'test' },
      });
      const copy = request.clone();
      copy.headers.set('x-extra', '1');

      expect(request.headers.has('x-extra')).toBe(false);
      expect(copy.metadata).toEqual({ tenant: 'test' });
      expect(await copy.text()).toBe('twice');
      expect(await request.text()).toBe('twice');
    });

    test('metadata is never shared with the caller or the copy', () => {
      const metadata = { tenant: 'a', tags: ['one'] };
      const request = new Request('https://a.test/', { metadata });
      const copy = request.clone();

      metadata.tenant = 'b';
      metadata.tags.push('two');
      if (copy.metadata) copy.metadata['tenant'] = 'c';

      expect(copy.metadata).not.toBe(request.metadata);
      expect(request.metadataJson).toBe('{"tenant":"a","tags":["one"]}');
      expect(copy.metadataJson).toBe('{"tenant":"c","tags":["one"]}');
    });

    test('metadata must be cloneable', () => {
      expect(
        () =>
          new Request('https://a.test/', {
            metadata: { callback: () => undefined },
          })
      ).toThrow('metadata must be structured-cloneable.');
    });
  });

  describe('signals', () => {
    test('exposes the caller signal and uses it for cancellation', () => {
      const controller = new AbortController();
      const request = new Request('https://a.test/', {
        signal: controller.signal,
      });

      expect(request.signal).toBe(controller.signal);
      expect(request.cancellationSignal).toBe(controller.signal);
    });

    test('a never-aborting signal is not wired for cancellation', () => {
      const signal = createNeverAbortSignal();
      const request = new Request('https://a.test/', { signal });

      expect(request.signal).toBe(signal);
      expect(request.cancellationSignal).toBeNull();
    });

    test('without a caller signal the request has its own idle signal', () => {
      const request = new Request('https://a.test/');

      expect(request.signal.aborted).toBe(false);
      expect(request.cancellationSignal).toBeNull();
    });
  });

  test('metadataJson serializes metadata', () => {
    expect(
      new Request('https://a.test/', { metadata: { colo: 'test' } })
        .metadataJson
    ).toBe('{"colo":"test"}');
    expect(new Request('https://a.test/').metadataJson).toBeNull();
  });

  test('carries a fetcher', () => {
    const fetcher = Fetcher.forChannel(0);

    expect(new Request('https://a.test/', { fetcher }).fetcher).toBe(fetcher);
  });

  test('toTransportRequest snapshots the request', async () => {
    const request = new Request('https://a.test/', {
      method: 'PUT',
      body: 'abc',
      cache: 'no-store',
    });
    const transport = request.toTransportRequest();
    request.headers.set('x-later', '1');

    expect(transport.method).toBe('PUT');
    expect(transport.expectedBodySize).toBe(3);
    expect(transport.cache).toBe('no-store');
    expect(transport.headers.has('x-later')).toBe(false);
    expect(transport.body ? await readText(transport.body) : null).toBe('abc');
  });
});

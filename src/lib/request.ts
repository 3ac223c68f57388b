import { ValidationError } from '../errors/app-error.js';
import { getCompatibilityFlags } from '../services/context.js';
import { createNeverAbortSignal, neverAborts } from './abort-utils.js';
import { Body } from './body.js';
import { type ExtractedBody, extractBody } from './body-extract.js';
import type { Fetcher } from './fetcher.js';
import { isHttpToken, normalizeMethod } from './http-status.js';
import {
  copyMetadata,
  isEmptyInit,
  parseRequestInit,
  type ParsedRequestInit,
  type RedirectMode,
  type RequestInit,
  type ResponseBodyEncoding,
} from './request-init.js';
import type { CacheMode, TransportRequest } from './transport.js';

export type RequestInfo = Request | string | URL;

/**
 * Fully validated fields of a Request. Built by the public constructor from
 * user input, or directly by clone and redirect handling.
 *
 * @internal
 */
export class RequestParts {
  constructor(
    readonly method: string,
    readonly url: string,
    readonly headers: Headers,
    readonly body: ExtractedBody | null,
    readonly redirect: RedirectMode,
    readonly cache: CacheMode | undefined,
    readonly encodeResponseBody: ResponseBodyEncoding,
    readonly fetcher: Fetcher | null,
    readonly signal: AbortSignal | null,
    readonly metadata: Record<string, unknown> | null
  ) {}
}

function parseRequestUrl(value: string | URL): string {
  let url: URL;
  try {
    url = value instanceof URL ? value : new URL(value);
  } catch (error: unknown) {
    throw new ValidationError(`Failed to parse URL: ${String(value)}`, {
      url: String(value),
      cause: error,
    });
  }
  if (url.username || url.password) {
    throw new ValidationError(
      'Request URLs cannot include embedded credentials.',
      { url: url.href }
    );
  }
  return url.href;
}

function validateMethod(method: string): string {
  if (!isHttpToken(method)) {
    throw new ValidationError(`Invalid HTTP method: ${method}`, { method });
  }
  return normalizeMethod(method);
}

function validateCacheMode(cache: string | undefined): CacheMode | undefined {
  if (cache === undefined) return undefined;

  const flags = getCompatibilityFlags();
  if (!flags.cacheOptionEnabled) {
    throw new ValidationError(
      "The 'cache' field on the request init is not implemented."
    );
  }
  if (cache === 'no-store') return cache;
  if (cache === 'no-cache' && flags.cacheNoCache) return cache;
  throw new ValidationError(`Unsupported cache mode: ${cache}`, { cache });
}

function initFromRequest(request: Request): ParsedRequestInit {
  return {
    method: request.method,
    headers: request.headers,
    redirect: request.redirect,
    cache: request.cache,
    encodeResponseBody: request.encodeResponseBody,
    signal: request.externalSignal,
    fetcher: request.fetcher,
    metadata: request.metadata,
  };
}

function buildRequestParts(
  input: RequestInfo,
  init: RequestInit | Request | undefined
): RequestParts {
  const base = input instanceof Request ? input : null;
  const bodySource = init instanceof Request ? init : base;
  const options =
    init instanceof Request
      ? initFromRequest(init)
      : parseRequestInit(init ?? {});

  const url = input instanceof Request ? input.url : parseRequestUrl(input);
  const method = validateMethod(options.method ?? base?.method ?? 'GET');
  const headers = new Headers(options.headers ?? base?.headers);

  let body: ExtractedBody | null = null;
  if (options.body !== undefined && options.body !== null) {
    body = extractBody(options.body);
  } else if (
    options.body === undefined &&
    bodySource &&
    (bodySource.body || bodySource.bodyUsed)
  ) {
    if (bodySource.bodyUsed) {
      throw new ValidationError(
        'Cannot construct a Request from a Request whose body has already been used.'
      );
    }
    body = bodySource.takeBody();
  }

  if (body && (method === 'GET' || method === 'HEAD')) {
    throw new ValidationError(
      'Request with a GET or HEAD method cannot have a body.',
      { method }
    );
  }
  if (body?.contentType && !headers.has('content-type')) {
    headers.set('content-type', body.contentType);
  }

  const cache =
    options.cache !== undefined
      ? validateCacheMode(options.cache)
      : base?.cache;
  const signal =
    options.signal !== undefined
      ? options.signal
      : (base?.externalSignal ?? null);

  return new RequestParts(
    method,
    url,
    headers,
    body,
    options.redirect ?? base?.redirect ?? 'follow',
    cache,
    options.encodeResponseBody ?? base?.encodeResponseBody ?? 'automatic',
    options.fetcher !== undefined ? options.fetcher : (base?.fetcher ?? null),
    signal,
    options.metadata !== undefined ? options.metadata : (base?.metadata ?? null)
  );
}

export interface RedirectAdjustment {
  url: string;
  method: string;
  headers: Headers;
  dropBody: boolean;
}

export class Request extends Body {
  readonly method: string;
  readonly url: string;
  readonly headers: Headers;
  readonly redirect: RedirectMode;
  readonly cache: CacheMode | undefined;
  readonly encodeResponseBody: ResponseBodyEncoding;
  readonly fetcher: Fetcher | null;
  readonly metadata: Record<string, unknown> | null;
  readonly integrity = '';
  readonly keepalive = false;

  /** Signal supplied by the caller, exposed as-is. */
  readonly externalSignal: AbortSignal | null;
  /** Set only when the caller's signal can actually fire. */
  readonly cancellationSignal: AbortSignal | null;
  private readonly exposedSignal: AbortSignal;

  constructor(input: RequestInfo, init?: RequestInit | Request);
  /** @internal */
  constructor(input: RequestParts);
  constructor(input: RequestInfo | RequestParts, init?: RequestInit | Request) {
    const parts =
      input instanceof RequestParts ? input : buildRequestParts(input, init);
    const headers = parts.headers;
    super(parts.body, headers);

    this.method = parts.method;
    this.url = parts.url;
    this.headers = headers;
    this.redirect = parts.redirect;
    this.cache = parts.cache;
    this.encodeResponseBody = parts.encodeResponseBody;
    this.fetcher = parts.fetcher;
    this.metadata = copyMetadata(parts.metadata);
    this.externalSignal = parts.signal;

    const external = parts.signal;
    this.cancellationSignal =
      external && !neverAborts(external) ? external : null;
    this.exposedSignal = external ?? createNeverAbortSignal();
    this.bodySignal = this.cancellationSignal;
  }

  /**
   * Reuses `input` when no override is given, otherwise builds a new
   * Request. Both paths yield the same fields.
   */
  static coerce(input: RequestInfo, init?: RequestInit | Request): Request {
    if (
      input instanceof Request &&
      (init === undefined || (!(init instanceof Request) && isEmptyInit(init)))
    ) {
      return input;
    }
    return new Request(input, init);
  }

  get signal(): AbortSignal {
    return this.exposedSignal;
  }

  /** Metadata serialised for the transport, or null when there is none. */
  get metadataJson(): string | null {
    return this.metadata ? JSON.stringify(this.metadata) : null;
  }

  clone(): Request {
    return new Request(this.copyParts(this.cloneBody()));
  }

  /**
   * Moves this request's body out for a new owner.
   *
   * @internal
   */
  takeBody(): ExtractedBody | null {
    return this.transferBody();
  }

  /**
   * The request to send after a followed redirect. The (rewound) body moves
   * to the new request unless the redirect drops it.
   *
   * @internal
   */
  followRedirect(adjustment: RedirectAdjustment): Request {
    let body: ExtractedBody | null = null;
    if (adjustment.dropBody) {
      this.nullify();
    } else {
      this.rewind();
      body = this.transferBody();
    }
    return new Request(
      new RequestParts(
        adjustment.method,
        adjustment.url,
        adjustment.headers,
        body,
        this.redirect,
        this.cache,
        this.encodeResponseBody,
        this.fetcher,
        this.externalSignal,
        this.metadata
      )
    );
  }

  /** Snapshot handed to a transport for one call. */
  toTransportRequest(): TransportRequest {
    return {
      method: this.method,
      url: this.url,
      headers: new Headers(this.headers),
      body: this.body,
      expectedBodySize: this.expectedBodySize,
      cache: this.cache,
      signal: this.cancellationSignal,
    };
  }

  private copyParts(body: ExtractedBody | null): RequestParts {
    return new RequestParts(
      this.method,
      this.url,
      new Headers(this.headers),
      body,
      this.redirect,
      this.cache,
      this.encodeResponseBody,
      this.fetcher,
      this.externalSignal,
      this.metadata
    );
  }
}

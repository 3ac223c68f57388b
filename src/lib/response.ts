import { AsyncLocalStorage } from 'node:async_hooks';
import { STATUS_CODES } from 'node:http';

import { z } from 'zod';

import { config } from '../config/index.js';
import { StateError, ValidationError } from '../errors/app-error.js';
import { logDebug } from '../services/logger.js';
import { Body, BODY_USED_MESSAGE } from './body.js';
import {
  type BodyInit,
  type ExtractedBody,
  extractBody,
} from './body-extract.js';
import {
  acceptsEncodings,
  decodeBodyStream,
  encodeBodyStream,
  parseContentEncodings,
} from './content-encoding.js';
import {
  isNullBodyStatus,
  isRedirectStatus,
  isValidReasonPhrase,
} from './http-status.js';
import {
  copyMetadata,
  type HeadersInit,
  metadataSchema,
  type ResponseBodyEncoding,
} from './request-init.js';
import type { UpgradedSocket } from './transport.js';

export type ResponseType = 'default' | 'error';

function isUpgradedSocket(value: unknown): value is UpgradedSocket {
  return (
    typeof value === 'object' &&
    value !== null &&
    'couple' in value &&
    typeof value.couple === 'function'
  );
}

const responseInitSchema = z.object({
  status: z.number().int().optional(),
  statusText: z.string().optional(),
  headers: z
    .custom<HeadersInit>(
      (value) => typeof value === 'object' && value !== null,
      'headers must be a header list'
    )
    .optional(),
  webSocket: z
    .custom<UpgradedSocket>(isUpgradedSocket, 'webSocket must be a socket')
    .nullable()
    .optional(),
  encodeBody: z.enum(['automatic', 'manual']).optional(),
  metadata: metadataSchema,
});

export type ResponseInit = z.input<typeof responseInitSchema>;

/**
 * Receives a response on its way out of the runtime.
 */
export interface ResponseSink {
  /** Writes the status line and headers; returns where the body goes. */
  send(
    status: number,
    statusText: string,
    headers: Headers,
    expectedBodySize: number | undefined
  ): WritableStream<Uint8Array>;
  /** Accepts an upgrade and returns the peer to couple with. */
  acceptWebSocket(headers: Headers): UpgradedSocket;
}

export interface SendOptions {
  allowWebSocket: boolean;
}

/** @internal */
export class ResponseParts {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly headers: Headers,
    readonly body: ExtractedBody | null,
    readonly urlList: readonly string[],
    readonly webSocket: UpgradedSocket | null,
    readonly encodeBody: ResponseBodyEncoding,
    readonly signal: AbortSignal | null,
    readonly trailers: Promise<Headers> | null,
    readonly metadata: Record<string, unknown> | null
  ) {}
}

function initFromResponse(response: Response): ResponseInit {
  return {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
    webSocket: response.webSocket,
    encodeBody: response.encodeBody,
    metadata: response.metadata,
  };
}

function parseResponseInit(
  init: ResponseInit | Response
): z.output<typeof responseInitSchema> {
  const parsed = responseInitSchema.safeParse(
    init instanceof Response ? initFromResponse(init) : init
  );
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const detail = issue
      ? `${issue.path.join('.') || 'init'}: ${issue.message}`
      : 'invalid value';
    throw new ValidationError(`Invalid response init (${detail}).`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function buildResponseParts(
  bodyInit: BodyInit | null | undefined,
  init: ResponseInit | Response | undefined
): ResponseParts {
  const options = parseResponseInit(init ?? {});
  const status = options.status ?? 200;
  const webSocket = options.webSocket ?? null;
  const statusText = options.statusText ?? '';

  if (webSocket ? status !== 101 : status < 200 || status > 599) {
    throw new ValidationError(
      webSocket
        ? 'Responses with a WebSocket must have status code 101.'
        : `Response status code must be in the range 200 to 599, got ${status}.`,
      { status }
    );
  }
  if (!isValidReasonPhrase(statusText)) {
    throw new ValidationError('Invalid status text.', { statusText });
  }

  const headers = new Headers(options.headers);
  let body: ExtractedBody | null = null;
  if (bodyInit !== undefined && bodyInit !== null) {
    if (isNullBodyStatus(status)) {
      throw new ValidationError(
        `Response with null body status (${status}) cannot have a body.`,
        { status }
      );
    }
    if (webSocket) {
      throw new ValidationError(
        'Responses with a WebSocket cannot have a body.'
      );
    }
    body = extractBody(bodyInit);
    if (body.contentType && !headers.has('content-type')) {
      headers.set('content-type', body.contentType);
    }
  }

  return new ResponseParts(
    status,
    statusText,
    headers,
    body,
    [],
    webSocket,
    options.encodeBody ?? 'automatic',
    null,
    null,
    options.metadata ?? null
  );
}

export interface HttpResponseInit {
  method: string;
  urlList: readonly string[];
  status: number;
  statusText?: string;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
  webSocket?: UpgradedSocket | null;
  encoding: ResponseBodyEncoding;
  signal: AbortSignal | null;
  trailers?: Promise<Headers> | null;
  metadata?: Record<string, unknown> | null;
}

function discardStream(stream: ReadableStream<Uint8Array>): void {
  void stream.cancel().catch((error: unknown) => {
    logDebug('Discarding response body failed', { error });
  });
}

/**
 * Wraps a raw transport result. HEAD responses and null-body statuses lose
 * their body and trailers; with automatic encoding a gzip, deflate or br
 * body is decoded as it is read.
 */
export function makeHttpResponse(init: HttpResponseInit): Response {
  let stream = init.body;
  let trailers = init.trailers ?? null;

  if (init.method === 'HEAD' || isNullBodyStatus(init.status)) {
    if (stream) discardStream(stream);
    stream = null;
    trailers = null;
  }

  if (stream && init.encoding === 'automatic') {
    const encodings = parseContentEncodings(
      init.headers.get('content-encoding')
    );
    if (encodings) stream = decodeBodyStream(stream, encodings);
  }

  const body: ExtractedBody | null = stream
    ? { impl: { kind: 'stream', source: stream }, contentType: null }
    : null;

  return new Response(
    new ResponseParts(
      init.status,
      init.statusText || (STATUS_CODES[init.status] ?? ''),
      init.headers,
      body,
      [...init.urlList],
      init.webSocket ?? null,
      init.encoding,
      init.signal,
      trailers,
      init.metadata ?? null
    )
  );
}

function toLocation(url: string | URL): string {
  if (url instanceof URL) return url.href;
  if (URL.canParse(url)) return new URL(url).href;
  if (URL.canParse(url, config.fetcher.fakeBaseUrl)) return url;
  throw new ValidationError(`Invalid redirect URL: ${url}`, { url });
}

export class Response extends Body {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly urlList: readonly string[];
  readonly webSocket: UpgradedSocket | null;
  readonly encodeBody: ResponseBodyEncoding;
  readonly trailers: Promise<Headers> | null;
  readonly metadata: Record<string, unknown> | null;
  private readonly asyncContext = AsyncLocalStorage.snapshot();
  private readonly signal: AbortSignal | null;

  constructor(body?: BodyInit | null, init?: ResponseInit | Response);
  /** @internal */
  constructor(parts: ResponseParts);
  constructor(
    body?: BodyInit | ResponseParts | null,
    init?: ResponseInit | Response
  ) {
    const parts =
      body instanceof ResponseParts ? body : buildResponseParts(body, init);
    super(parts.body, parts.headers);

    this.status = parts.status;
    this.statusText = parts.statusText;
    this.headers = parts.headers;
    this.urlList = parts.urlList;
    this.webSocket = parts.webSocket;
    this.encodeBody = parts.encodeBody;
    this.trailers = parts.trailers;
    this.metadata = copyMetadata(parts.metadata);
    this.signal = parts.signal;
    this.bodySignal = parts.signal;
  }

  static redirect(url: string | URL, status = 302): Response {
    if (!isRedirectStatus(status)) {
      throw new ValidationError(`Invalid redirect status: ${status}`, {
        status,
      });
    }
    const headers = new Headers({ location: toLocation(url) });
    return new Response(
      new ResponseParts(
        status,
        STATUS_CODES[status] ?? '',
        headers,
        null,
        [],
        null,
        'automatic',
        null,
        null,
        null
      )
    );
  }

  /** A network-error sentinel: status 0 and nothing else. */
  static error(): Response {
    return new Response(
      new ResponseParts(
        0,
        '',
        new Headers(),
        null,
        [],
        null,
        'automatic',
        null,
        null,
        null
      )
    );
  }

  static json(value: unknown, init?: ResponseInit | Response): Response {
    const text = JSON.stringify(value);
    if (typeof text !== 'string') {
      throw new ValidationError('Value cannot be serialized as JSON.');
    }
    const options = init instanceof Response ? initFromResponse(init) : init;
    const headers = new Headers(options?.headers);
    if (!headers.has('content-type')) {
      headers.set('content-type', 'application/json');
    }
    return new Response(text, { ...options, headers });
  }

  get type(): ResponseType {
    return this.status === 0 ? 'error' : 'default';
  }

  get ok(): boolean {
    return this.status >= 200 && this.status <= 299;
  }

  get redirected(): boolean {
    return this.urlList.length > 1;
  }

  get url(): string {
    return this.urlList.at(-1) ?? '';
  }

  clone(): Response {
    if (this.webSocket) {
      throw new StateError('Cannot clone a response with a WebSocket.');
    }
    return new Response(
      new ResponseParts(
        this.status,
        this.statusText,
        new Headers(this.headers),
        this.cloneBody(),
        [...this.urlList],
        null,
        this.encodeBody,
        this.signal,
        this.trailers,
        this.metadata
      )
    );
  }

  /**
   * Writes this response to `sink`. Upgrades are only legal when the caller
   * handles them; anything else is a contract violation.
   */
  async send(
    sink: ResponseSink,
    options: SendOptions,
    requestHeaders?: Headers
  ): Promise<void> {
    if (this.webSocket) {
      if (!options.allowWebSocket) {
        throw new StateError(
          'A WebSocket response can only be sent through the upgrade path.',
          false
        );
      }
      const peer = sink.acceptWebSocket(new Headers(this.headers));
      await this.webSocket.couple(peer);
      return;
    }

    await this.runInBodyContext(async () => {
      const headers = new Headers(this.headers);
      let stream = this.body;
      if (this.bodyUsed || stream?.locked) {
        throw new StateError(BODY_USED_MESSAGE);
      }
      let expectedBodySize = this.expectedBodySize;

      if (stream && this.encodeBody === 'automatic') {
        const encodings = parseContentEncodings(
          headers.get('content-encoding')
        );
        if (encodings) {
          const acceptEncoding = requestHeaders?.get('accept-encoding') ?? null;
          if (acceptsEncodings(acceptEncoding, encodings)) {
            stream = encodeBodyStream(stream, encodings);
            expectedBodySize = undefined;
            headers.delete('content-length');
          } else {
            headers.delete('content-encoding');
          }
        }
      }

      const writable = sink.send(
        this.status,
        this.statusText,
        headers,
        expectedBodySize
      );
      if (stream) {
        await stream.pipeTo(writable);
      } else {
        await writable.close();
      }
    });
  }

  protected override runInBodyContext<T>(fn: () => T): T {
    return this.asyncContext(fn);
  }
}

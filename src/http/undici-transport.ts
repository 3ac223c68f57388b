import { STATUS_CODES } from 'node:http';
import { Readable } from 'node:stream';

import { type Dispatcher, request as undiciRequest } from 'undici';

import { CapabilityError } from '../errors/app-error.js';
import type {
  ClientMetadata,
  SubrequestChannel,
  Transport,
  TransportRequest,
  TransportResponse,
} from '../lib/transport.js';
import { logDebug } from '../services/logger.js';

const SUPPORTED_METHODS = new Set<string>([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

function isSupportedMethod(method: string): method is Dispatcher.HttpMethod {
  return SUPPORTED_METHODS.has(method);
}

type RawHeaders = Record<string, string | string[] | undefined>;

export function toHeaders(raw: RawHeaders | null | undefined): Headers {
  const headers = new Headers();
  if (!raw) return headers;
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.append(name, value);
    }
  }
  return headers;
}

function toOutgoingHeaders(
  request: TransportRequest,
  metadataHeader: string | undefined,
  metadataJson: string | null
): Record<string, string> {
  const headers = new Headers(request.headers);

  if (request.cache === 'no-store' && !headers.has('cache-control')) {
    headers.set('cache-control', 'no-store');
  } else if (request.cache === 'no-cache') {
    if (!headers.has('cache-control')) headers.set('cache-control', 'no-cache');
    if (!headers.has('pragma')) headers.set('pragma', 'no-cache');
  }
  if (
    request.body &&
    request.expectedBodySize !== undefined &&
    !headers.has('content-length')
  ) {
    headers.set('content-length', String(request.expectedBodySize));
  }
  if (metadataHeader && metadataJson !== null) {
    headers.set(metadataHeader, metadataJson);
  }

  return Object.fromEntries(headers);
}

function collectTrailers(
  body: Readable,
  trailers: RawHeaders
): Promise<Headers> {
  return new Promise((resolve) => {
    body.once('close', () => {
      resolve(toHeaders(trailers));
    });
  });
}

export interface UndiciTransportOptions {
  /** Defaults to undici's global dispatcher. */
  dispatcher?: Dispatcher;
  /** Sends the request metadata JSON under this header name. */
  metadataHeader?: string;
  metadataJson?: string | null;
  headersTimeout?: number;
  bodyTimeout?: number;
}

/**
 * Plain HTTP client over undici's `request`. Redirects are never followed
 * here; the caller owns redirect policy.
 */
export class UndiciTransport implements Transport {
  constructor(private readonly options: UndiciTransportOptions = {}) {}

  async request(request: TransportRequest): Promise<TransportResponse> {
    const { method } = request;
    if (!isSupportedMethod(method)) {
      throw new CapabilityError(
        `HTTP method ${method} is not supported by this transport.`
      );
    }

    const response = await undiciRequest(request.url, {
      method,
      headers: toOutgoingHeaders(
        request,
        this.options.metadataHeader,
        this.options.metadataJson ?? null
      ),
      body: request.body ? Readable.fromWeb(request.body) : null,
      signal: request.signal ?? undefined,
      ...(this.options.dispatcher
        ? { dispatcher: this.options.dispatcher }
        : {}),
      ...(this.options.headersTimeout !== undefined
        ? { headersTimeout: this.options.headersTimeout }
        : {}),
      ...(this.options.bodyTimeout !== undefined
        ? { bodyTimeout: this.options.bodyTimeout }
        : {}),
    });

    return {
      status: response.statusCode,
      statusText: STATUS_CODES[response.statusCode] ?? '',
      headers: toHeaders(response.headers),
      body: Readable.toWeb(response.body),
      trailers: collectTrailers(response.body, response.trailers),
    };
  }
}

export interface UndiciChannelOptions {
  dispatcher?: Dispatcher;
  metadataHeader?: string;
  headersTimeout?: number;
  bodyTimeout?: number;
}

/** A subrequest channel whose clients reach the network through undici. */
export class UndiciChannel implements SubrequestChannel {
  constructor(private readonly options: UndiciChannelOptions = {}) {}

  startRequest(metadata: ClientMetadata): Transport {
    logDebug('Starting HTTP subrequest', {
      operation: metadata.operationName,
    });
    return new UndiciTransport({
      ...this.options,
      metadataJson: metadata.metadataJson,
    });
  }
}

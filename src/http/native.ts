import {
  createServer,
  type IncomingMessage,
  type OutgoingHttpHeaders,
  type Server,
} from 'node:http';
import { Readable } from 'node:stream';

import { CapabilityError } from '../errors/app-error.js';
import { toError } from '../errors.js';
import {
  dispatchFetchEvent,
  FetchEvent,
  type FetchListener,
} from '../lib/fetch-event.js';
import { Request } from '../lib/request.js';
import { Response, type ResponseSink } from '../lib/response.js';
import type { UpgradedSocket } from '../lib/transport.js';
import {
  ExecutionContext,
  type ExecutionContextOptions,
} from '../services/context.js';
import { logDebug, logError, logInfo } from '../services/logger.js';

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

export function createRequestAbortSignal(req: IncomingMessage): {
  signal: AbortSignal;
  cleanup: () => void;
} {
  const controller = new AbortController();
  let cleanedUp = false;

  const abortRequest = (): void => {
    if (cleanedUp) return;
    if (!controller.signal.aborted) controller.abort();
  };

  if (req.destroyed) {
    abortRequest();
    return {
      signal: controller.signal,
      cleanup: () => {
        cleanedUp = true;
      },
    };
  }

  const onClose = (): void => {
    // A normal close after a complete body is not a cancellation.
    if (req.complete) return;
    abortRequest();
  };

  req.once('aborted', abortRequest);
  req.once('close', onClose);
  req.once('error', abortRequest);

  return {
    signal: controller.signal,
    cleanup: () => {
      cleanedUp = true;
      req.off('aborted', abortRequest);
      req.off('close', onClose);
      req.off('error', abortRequest);
    },
  };
}

export function drainRequest(req: IncomingMessage): void {
  if (req.readableEnded) return;
  req.resume();
}

// rawHeaders alternates names and values, in the order received.
function toRequestHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  const raw = req.rawHeaders;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    headers.append(raw[i], raw[i + 1]);
  }
  return headers;
}

/** Builds a Request for an inbound message; the body streams from `req`. */
export function toRequest(
  req: IncomingMessage,
  signal: AbortSignal,
  protocol: 'http' | 'https' = 'http'
): Request {
  const headers = toRequestHeaders(req);
  const host = headers.get('host') ?? 'localhost';
  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(`${protocol}://${host}${req.url ?? '/'}`, {
    method,
    headers,
    body: hasBody ? Readable.toWeb(req) : null,
    signal,
  });
}

// ---------------------------------------------------------------------------
// Response sink
// ---------------------------------------------------------------------------

function toOutgoingHeaders(headers: Headers): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = {};
  for (const [name, value] of headers) {
    if (name === 'set-cookie') continue;
    outgoing[name] = value;
  }
  const cookies = headers.getSetCookie();
  if (cookies.length > 0) outgoing['set-cookie'] = cookies;
  return outgoing;
}

/** The parts of a node:http ServerResponse the sink writes through. */
export interface NodeResponseTarget {
  readonly headersSent: boolean;
  writeHead(
    statusCode: number,
    statusMessage: string | undefined,
    headers: OutgoingHttpHeaders
  ): unknown;
  write(chunk: Uint8Array): boolean;
  end(): unknown;
  once(event: 'drain', listener: () => void): unknown;
  destroy(error?: Error): unknown;
}

/** Writes responses onto a node:http ServerResponse. */
export class NodeResponseSink implements ResponseSink {
  constructor(private readonly res: NodeResponseTarget) {}

  get headersSent(): boolean {
    return this.res.headersSent;
  }

  send(
    status: number,
    statusText: string,
    headers: Headers,
    expectedBodySize: number | undefined
  ): WritableStream<Uint8Array> {
    const outgoing = toOutgoingHeaders(headers);
    if (expectedBodySize !== undefined && !headers.has('content-length')) {
      outgoing['content-length'] = expectedBodySize;
    }
    const { res } = this;
    res.writeHead(status, statusText || undefined, outgoing);

    return new WritableStream<Uint8Array>({
      async write(chunk) {
        if (res.write(chunk)) return;
        await new Promise<void>((resolve) => {
          res.once('drain', resolve);
        });
      },
      close() {
        res.end();
      },
      abort(reason: unknown) {
        res.destroy(toError(reason));
      },
    });
  }

  acceptWebSocket(): UpgradedSocket {
    throw new CapabilityError(
      'WebSocket upgrades are not handled by the node:http adapter.'
    );
  }
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export interface NodeHandlerOptions {
  /** Settings for the execution context created per inbound request. */
  context?: ExecutionContextOptions;
  /** Produces the response when the listener made no decision. */
  fallback?: (request: Request) => Response | Promise<Response>;
  protocol?: 'http' | 'https';
}

function defaultFallback(): Response {
  return new Response('Internal Server Error', {
    status: 500,
    statusText: 'Internal Server Error',
  });
}

/**
 * Adapts a fetch listener to node:http. Each inbound message runs in a
 * fresh execution context.
 */
export function createNodeHandler(
  listener: FetchListener,
  options: NodeHandlerOptions = {}
): (req: IncomingMessage, res: NodeResponseTarget) => Promise<void> {
  const fallback = options.fallback ?? defaultFallback;

  return async (req, res) => {
    const { signal, cleanup } = createRequestAbortSignal(req);
    const context = new ExecutionContext(options.context);
    const sink = new NodeResponseSink(res);

    try {
      await context.run(async () => {
        const request = toRequest(req, signal, options.protocol);
        const event = new FetchEvent(request);
        const result = await dispatchFetchEvent(
          event,
          listener,
          sink,
          context,
          { allowWebSocket: false }
        );
        if (result.kind === 'responded') return;

        logDebug('Using fallback response', {
          reason: result.kind,
          url: request.url,
        });
        const response = await fallback(request);
        await response.send(sink, { allowWebSocket: false }, request.headers);
      });
    } catch (error: unknown) {
      const err = toError(error);
      logError('Inbound request failed', err);
      if (sink.headersSent) {
        res.destroy(err);
      } else {
        res.writeHead(500, 'Internal Server Error', {
          'content-type': 'text/plain; charset=utf-8',
        });
        res.write(Buffer.from('Internal Server Error'));
        res.end();
      }
    } finally {
      cleanup();
      drainRequest(req);
    }
  };
}

export function createNodeServer(
  listener: FetchListener,
  options: NodeHandlerOptions = {}
): Server {
  const handler = createNodeHandler(listener, options);
  const server = createServer((req, res) => {
    void handler(req, res);
  });
  server.on('listening', () => {
    logInfo('HTTP server listening', { address: server.address() });
  });
  return server;
}

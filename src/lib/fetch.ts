import { config } from '../config/index.js';
import {
  AppError,
  CapabilityError,
  TransmissionError,
  ValidationError,
} from '../errors/app-error.js';
import { getErrorMessage } from '../errors.js';
import { ExecutionContext } from '../services/context.js';
import { raceWithSignal } from './abort-utils.js';
import type { Fetcher } from './fetcher.js';
import { RedirectFollower } from './fetch-redirect.js';
import { fetchTelemetry } from './fetch-telemetry.js';
import { Request, type RequestInfo } from './request.js';
import type { RequestInit } from './request-init.js';
import { makeHttpResponse, type Response } from './response.js';
import type { TransportResponse } from './transport.js';

function toTransmissionError(error: unknown, url: string): AppError {
  if (error instanceof AppError) return error;
  return new TransmissionError(
    `Network request failed: ${getErrorMessage(error)}`,
    url,
    { cause: error }
  );
}

function requireHttpUrl(url: string): void {
  const { protocol } = new URL(url);
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError(
      `Fetch API cannot load: ${url}. Only http: and https: URLs are supported.`,
      { url }
    );
  }
}

async function sendOnce(
  fetcher: Fetcher,
  context: ExecutionContext,
  request: Request
): Promise<TransportResponse> {
  requireHttpUrl(request.url);
  const client = fetcher.getClient(context, request.metadataJson, 'fetch');
  const telemetry = fetchTelemetry.start(request.url, request.method);

  try {
    const response = await raceWithSignal(
      client.request(request.toTransportRequest()),
      request.cancellationSignal
    );
    fetchTelemetry.recordResponse(telemetry, response.status);
    return response;
  } catch (error: unknown) {
    fetchTelemetry.recordError(telemetry, error);
    throw toTransmissionError(error, request.url);
  }
}

function toRequestInput(fetcher: Fetcher, input: RequestInfo): RequestInfo {
  if (input instanceof Request) return input;
  return fetcher.parseUrl(input instanceof URL ? input.href : input);
}

/**
 * Runs one logical fetch: builds the request, dispatches it through the
 * fetcher and follows redirects when the request asks for it. Nothing is
 * retried.
 */
export async function fetchImpl(
  fetcher: Fetcher | null,
  input: RequestInfo,
  init?: RequestInit | Request
): Promise<Response> {
  const effective =
    fetcher ?? (input instanceof Request ? input.fetcher : null);
  if (!effective) {
    throw new CapabilityError(
      'No fetcher is available to route this request.'
    );
  }

  const context = ExecutionContext.current();
  const request = Request.coerce(toRequestInput(effective, input), init);

  const follower = new RedirectFollower(
    (current) => sendOnce(effective, context, current),
    config.fetcher.maxRedirects
  );
  const { request: last, response, urlList } =
    await follower.fetchWithRedirects(request);

  return makeHttpResponse({
    method: last.method,
    urlList,
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
    body: response.body,
    webSocket: response.webSocket ?? null,
    encoding: last.encodeResponseBody,
    signal: last.cancellationSignal,
    trailers: response.trailers ?? null,
  });
}

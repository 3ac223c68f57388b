import { TransmissionError } from '../errors/app-error.js';
import { throwIfAborted } from './abort-utils.js';
import { isRedirectStatus } from './http-status.js';
import type { RedirectAdjustment, Request } from './request.js';
import type { TransportResponse } from './transport.js';

export function cancelResponseBody(response: TransportResponse): void {
  const cancelPromise = response.body?.cancel();
  if (!cancelPromise) return;

  void cancelPromise.catch(() => undefined);
}

type SendRequest = (request: Request) => Promise<TransportResponse>;

export interface RedirectResult {
  /** The request that produced `response`. */
  request: Request;
  response: TransportResponse;
  urlList: string[];
}

function resolveRedirectTarget(baseUrl: string, location: string): string {
  if (!URL.canParse(location, baseUrl)) {
    throw new TransmissionError('Invalid redirect target.', baseUrl);
  }
  const resolved = new URL(location, baseUrl);
  if (resolved.username || resolved.password) {
    throw new TransmissionError(
      'Redirect target includes credentials.',
      resolved.href
    );
  }
  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    throw new TransmissionError(
      `Unsupported redirect protocol: ${resolved.protocol}`,
      resolved.href
    );
  }
  return resolved.href;
}

function rewritesToGet(status: number, method: string): boolean {
  if (status === 303) return method !== 'GET' && method !== 'HEAD';
  return (status === 301 || status === 302) && method === 'POST';
}

/**
 * Method, header and body changes the Fetch standard applies when a
 * redirect is followed.
 */
export function adjustForRedirect(
  request: Request,
  status: number,
  nextUrl: string
): RedirectAdjustment {
  const headers = new Headers(request.headers);
  let method = request.method;
  let dropBody = false;

  if (rewritesToGet(status, method)) {
    method = 'GET';
    dropBody = true;
    const contentHeaders = [...headers.keys()].filter((name) =>
      name.startsWith('content-')
    );
    for (const name of contentHeaders) headers.delete(name);
  }

  if (new URL(nextUrl).origin !== new URL(request.url).origin) {
    headers.delete('authorization');
  }

  return { url: nextUrl, method, headers, dropBody };
}

export class RedirectFollower {
  constructor(
    private readonly send: SendRequest,
    private readonly maxRedirects: number
  ) {}

  async fetchWithRedirects(initial: Request): Promise<RedirectResult> {
    let request = initial;
    const urlList = [initial.url];
    const redirectLimit = Math.max(0, this.maxRedirects);

    for (let redirectCount = 0; ; redirectCount += 1) {
      throwIfAborted(request.cancellationSignal);
      const response = await this.send(request);

      const location = response.headers.get('location');
      if (
        request.redirect !== 'follow' ||
        !isRedirectStatus(response.status) ||
        location === null
      ) {
        return { request, response, urlList };
      }

      cancelResponseBody(response);
      if (redirectCount >= redirectLimit) {
        throw new TransmissionError('Too many redirects.', request.url);
      }

      const nextUrl = resolveRedirectTarget(request.url, location);
      const adjustment = adjustForRedirect(request, response.status, nextUrl);
      if (!adjustment.dropBody && !request.canRewind()) {
        throw new TransmissionError(
          'A request with a one-time-use body encountered a redirect requiring the body to be retransmitted.',
          request.url
        );
      }

      request = request.followRedirect(adjustment);
      urlList.push(nextUrl);
    }
  }
}

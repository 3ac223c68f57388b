import type { Transport } from '../lib/transport.js';

export type FailureSource = 'deferred-proxy' | 'other';

/**
 * Observes one inbound request and its subrequests. Every hook defaults to a
 * no-op; subclasses override only what they collect.
 */
export class RequestObserver {
  /**
   * The event reached the listener. An observer destroyed without seeing
   * this means the event was canceled before any script ran.
   */
  delivered(): void {}

  /** No more script will run on behalf of this request. */
  jsDone(): void {}

  /**
   * A failure the transport wrapper would not otherwise see, e.g. one that
   * was replaced by an error response or happened asynchronously.
   */
  reportFailure(_error: unknown, _source: FailureSource = 'other'): void {}

  /** Wrap an outgoing client so its usage is counted. */
  wrapTransport(transport: Transport): Transport {
    return transport;
  }
}

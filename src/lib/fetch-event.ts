import { StateError } from '../errors/app-error.js';
import { getErrorMessage, toError } from '../errors.js';
import { ExecutionContext } from '../services/context.js';
import { logError, logWarn } from '../services/logger.js';
import type { Request } from './request.js';
import type { Response, ResponseSink } from './response.js';

type EventState =
  | { kind: 'awaiting' }
  | { kind: 'responded'; promise: Promise<Response> }
  | { kind: 'sent' };

export type FetchEventPhase = EventState['kind'];

/**
 * One inbound request. The listener decides the response at most once;
 * the host takes the decision exactly once.
 */
export class FetchEvent {
  readonly type = 'fetch';
  private state: EventState = { kind: 'awaiting' };
  private passThrough = false;
  private readonly waitUntilTasks: Promise<unknown>[] = [];

  constructor(readonly request: Request) {}

  get phase(): FetchEventPhase {
    return this.state.kind;
  }

  get passThroughRequested(): boolean {
    return this.passThrough;
  }

  respondWith(response: Response | PromiseLike<Response>): void {
    if (this.state.kind !== 'awaiting') {
      throw new StateError(
        'FetchEvent.respondWith() has already been called; it can only be called once.'
      );
    }
    const promise = Promise.resolve(response);
    // Observed later through getResponsePromise().
    void promise.catch(() => undefined);
    this.state = { kind: 'responded', promise };
  }

  /**
   * Hands the decision to the host. `null` means the listener never
   * responded, which is not a failure.
   */
  getResponsePromise(): Promise<Response> | null {
    switch (this.state.kind) {
      case 'awaiting':
        return null;
      case 'responded': {
        const { promise } = this.state;
        this.state = { kind: 'sent' };
        return promise;
      }
      case 'sent':
        throw new StateError('The response has already been sent.', false);
    }
  }

  passThroughOnException(): void {
    this.passThrough = true;
  }

  waitUntil(promise: Promise<unknown>): void {
    this.waitUntilTasks.push(promise);
  }

  /** Settles every waitUntil() task; failures are logged, not thrown. */
  async settleWaitUntil(): Promise<void> {
    const results = await Promise.allSettled(this.waitUntilTasks);
    for (const result of results) {
      if (result.status === 'rejected') {
        logWarn('waitUntil() task failed', {
          error: getErrorMessage(result.reason),
        });
      }
    }
  }
}

export type FetchListener = (event: FetchEvent) => void | Promise<void>;

export type DispatchResult =
  | { kind: 'responded' }
  | { kind: 'no-decision' }
  | { kind: 'pass-through'; error: Error };

export interface DispatchOptions {
  /** Whether the sink can take an upgraded socket. Defaults to true. */
  allowWebSocket?: boolean;
}

/**
 * Runs `listener` for `event` inside `context` and delivers the decision
 * to `sink`. Errors propagate unless the listener asked for pass-through.
 */
export async function dispatchFetchEvent(
  event: FetchEvent,
  listener: FetchListener,
  sink: ResponseSink,
  context: ExecutionContext = ExecutionContext.current(),
  options: DispatchOptions = {}
): Promise<DispatchResult> {
  const { observer } = context;

  return context.run(async (): Promise<DispatchResult> => {
    try {
      observer.delivered();
      await listener(event);
      const promise = event.getResponsePromise();
      if (!promise) {
        observer.jsDone();
        return { kind: 'no-decision' };
      }

      const response = await promise;
      observer.jsDone();
      await response.send(
        sink,
        { allowWebSocket: options.allowWebSocket ?? true },
        event.request.headers
      );
      return { kind: 'responded' };
    } catch (error: unknown) {
      const err = toError(error);
      observer.reportFailure(err);
      if (event.passThroughRequested) {
        logWarn('Fetch listener failed; passing the request through', {
          error: err.message,
        });
        return { kind: 'pass-through', error: err };
      }
      logError('Fetch listener failed', err);
      throw err;
    } finally {
      await event.settleWaitUntil();
    }
  });
}

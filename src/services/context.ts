import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

import { type CompatibilityFlags, config } from '../config/index.js';
import { CapabilityError, StateError } from '../errors/app-error.js';
import type {
  SubrequestChannel,
  Transport,
  TransportRequest,
} from '../lib/transport.js';
import { RequestObserver } from './observer.js';

export interface ExecutionContextOptions {
  /** Numbered channels; a fetcher's channel number indexes this table. */
  channels?:
    | ReadonlyMap<number, SubrequestChannel>
    | readonly SubrequestChannel[];
  observer?: RequestObserver;
  flags?: Partial<CompatibilityFlags>;
}

const contextStorage = new AsyncLocalStorage<ExecutionContext>();

function toChannelTable(
  channels: ExecutionContextOptions['channels']
): ReadonlyMap<number, SubrequestChannel> {
  if (!channels) return new Map();
  if (channels instanceof Map) return channels;
  return new Map(Array.from(channels.entries()));
}

/**
 * Permits exactly one call through the wrapped transport.
 */
function singleUse(transport: Transport): Transport {
  let used = false;
  const claim = (): void => {
    if (used) {
      throw new StateError(
        'A transport handle can only be used for a single call.',
        false
      );
    }
    used = true;
  };

  const wrapped: Transport = {
    request: (request: TransportRequest) => {
      claim();
      return transport.request(request);
    },
  };
  if (transport.connect) {
    const connect = transport.connect.bind(transport);
    wrapped.connect = (address, options) => {
      claim();
      return connect(address, options);
    };
  }
  if (transport.customEvent) {
    const customEvent = transport.customEvent.bind(transport);
    wrapped.customEvent = (event) => {
      claim();
      return customEvent(event);
    };
  }
  if (transport.call) {
    const call = transport.call.bind(transport);
    wrapped.call = (method, args) => {
      claim();
      return call(method, args);
    };
  }
  return wrapped;
}

/**
 * One short-lived, single-threaded logical context (typically one inbound
 * request). Code running inside `run()` sees it through `current()`.
 */
export class ExecutionContext {
  readonly id: string = randomUUID();
  readonly observer: RequestObserver;
  readonly flags: Readonly<CompatibilityFlags>;
  private readonly channels: ReadonlyMap<number, SubrequestChannel>;

  constructor(options: ExecutionContextOptions = {}) {
    this.channels = toChannelTable(options.channels);
    this.observer = options.observer ?? new RequestObserver();
    this.flags = { ...config.compat, ...options.flags };
  }

  static current(): ExecutionContext {
    const context = contextStorage.getStore();
    if (!context) {
      throw new StateError(
        'This operation requires an active execution context.',
        false
      );
    }
    return context;
  }

  static tryCurrent(): ExecutionContext | undefined {
    return contextStorage.getStore();
  }

  run<T>(fn: () => T): T {
    return contextStorage.run(this, fn);
  }

  getSubrequestChannel(channel: number): SubrequestChannel {
    const entry = this.channels.get(channel);
    if (!entry) {
      throw new CapabilityError(
        `No subrequest channel ${channel} is configured in this context.`
      );
    }
    return entry;
  }

  getHttpClient(
    channel: number,
    isInHouse: boolean,
    metadataJson: string | null,
    operationName: string
  ): Transport {
    const client = this.getSubrequestChannel(channel).startRequest({
      metadataJson,
      operationName,
    });
    return this.wrapSubrequest(client, isInHouse);
  }

  /**
   * Applies the per-subrequest policy to a freshly created client: single
   * use, and metrics wrapping unless the destination is in-house.
   */
  wrapSubrequest(client: Transport, isInHouse: boolean): Transport {
    const counted = isInHouse ? client : this.observer.wrapTransport(client);
    return singleUse(counted);
  }
}

/**
 * Flags of the active context, or the configured defaults outside one.
 */
export function getCompatibilityFlags(): Readonly<CompatibilityFlags> {
  return ExecutionContext.tryCurrent()?.flags ?? config.compat;
}

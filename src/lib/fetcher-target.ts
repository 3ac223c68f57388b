import { CapabilityError, StateError } from '../errors/app-error.js';
import type { ExecutionContext } from '../services/context.js';
import type { Fetcher } from './fetcher.js';
import type {
  CrossContextOutgoingFactory,
  OutgoingFactory,
  SubrequestChannel,
  Transport,
} from './transport.js';

export const FETCHER_BRAND: unique symbol = Symbol('sandbox-fetch.fetcher');

export function isFetcher(value: unknown): value is Fetcher {
  return typeof value === 'object' && value !== null && FETCHER_BRAND in value;
}

/** Where a fetcher sends its calls. */
export type FetcherTarget =
  | { kind: 'channel'; channel: number }
  | { kind: 'factory'; factory: OutgoingFactory; context: ExecutionContext }
  | { kind: 'cross-context'; factory: CrossContextOutgoingFactory };

export interface ClientRequest {
  isInHouse: boolean;
  metadataJson: string | null;
  operationName: string;
}

interface TargetResolver<T extends FetcherTarget> {
  getClient(
    target: T,
    context: ExecutionContext,
    request: ClientRequest
  ): Transport;
  getSubrequestChannel(
    target: T,
    context: ExecutionContext
  ): SubrequestChannel;
}

const channelResolver: TargetResolver<
  Extract<FetcherTarget, { kind: 'channel' }>
> = {
  getClient(target, context, request) {
    return context.getHttpClient(
      target.channel,
      request.isInHouse,
      request.metadataJson,
      request.operationName
    );
  },
  getSubrequestChannel(target, context) {
    return context.getSubrequestChannel(target.channel);
  },
};

const factoryResolver: TargetResolver<
  Extract<FetcherTarget, { kind: 'factory' }>
> = {
  getClient(target, context, request) {
    if (target.context !== context) {
      throw new StateError(
        'Cannot use a fetcher created in another execution context.'
      );
    }
    return context.wrapSubrequest(
      target.factory.newSingleUseClient(request.metadataJson),
      request.isInHouse
    );
  },
  getSubrequestChannel(target) {
    if (!target.factory.getSubrequestChannel) {
      throw new CapabilityError(
        'This fetcher cannot be transferred to another execution context.'
      );
    }
    return target.factory.getSubrequestChannel();
  },
};

const crossContextResolver: TargetResolver<
  Extract<FetcherTarget, { kind: 'cross-context' }>
> = {
  getClient(target, context, request) {
    return context.wrapSubrequest(
      target.factory.newSingleUseClient(context, request.metadataJson),
      request.isInHouse
    );
  },
  getSubrequestChannel(target, context) {
    if (!target.factory.getSubrequestChannel) {
      throw new CapabilityError(
        'This fetcher cannot be transferred to another execution context.'
      );
    }
    return target.factory.getSubrequestChannel(context);
  },
};

export function resolveClient(
  target: FetcherTarget,
  context: ExecutionContext,
  request: ClientRequest
): Transport {
  switch (target.kind) {
    case 'channel':
      return channelResolver.getClient(target, context, request);
    case 'factory':
      return factoryResolver.getClient(target, context, request);
    case 'cross-context':
      return crossContextResolver.getClient(target, context, request);
  }
}

export function resolveSubrequestChannel(
  target: FetcherTarget,
  context: ExecutionContext
): SubrequestChannel {
  switch (target.kind) {
    case 'channel':
      return channelResolver.getSubrequestChannel(target, context);
    case 'factory':
      return factoryResolver.getSubrequestChannel(target, context);
    case 'cross-context':
      return crossContextResolver.getSubrequestChannel(target, context);
  }
}

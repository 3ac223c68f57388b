import { z } from 'zod';

import { config } from '../config/index.js';
import {
  CapabilityError,
  StateError,
  TransmissionError,
  ValidationError,
} from '../errors/app-error.js';
import {
  ExecutionContext,
  getCompatibilityFlags,
} from '../services/context.js';
import type { BodyInit } from './body-extract.js';
import { fetchImpl } from './fetch.js';
import {
  FETCHER_BRAND,
  type FetcherTarget,
  resolveClient,
  resolveSubrequestChannel,
} from './fetcher-target.js';
import type { Request, RequestInfo } from './request.js';
import type { RequestInit } from './request-init.js';
import type { Response } from './response.js';
import { encodeSerialized } from './serialization.js';
import type {
  CrossContextOutgoingFactory,
  EventOutcome,
  OutgoingFactory,
  QueueEventMessage,
  QueueRetryBatch,
  QueueRetryMessage,
  SocketAddress,
  SocketHandle,
  SocketOptions,
  SubrequestChannel,
  Transport,
} from './transport.js';

export type GetResultType = 'text' | 'arrayBuffer' | 'json' | 'stream';

export interface FetcherOptions {
  /** Reject schemeless or hostless URLs. Defaults to true. */
  requiresHost?: boolean;
  /** In-house destinations skip the observer's transport wrapping. */
  isInHouse?: boolean;
}

export interface PutOptions {
  /** Absolute expiry, seconds since the epoch. */
  expiration?: number;
  /** Expiry relative to now, in seconds. */
  expirationTtl?: number;
}

export interface QueueMessage {
  id: string;
  timestamp: Date | number;
  attempts: number;
  body?: unknown;
  serializedBody?: Uint8Array;
}

export interface QueueResult {
  outcome: EventOutcome;
  ackAll: boolean;
  retryBatch: QueueRetryBatch;
  explicitAcks: readonly string[];
  retryMessages: readonly QueueRetryMessage[];
}

export interface ScheduledOptions {
  scheduledTime?: Date | number;
  cron?: string;
}

export interface ScheduledResult {
  outcome: EventOutcome;
  noRetry: boolean;
}

export type RpcMethod = (...args: unknown[]) => Promise<unknown>;

// Names that resolve to the verbs below and never to a remote method.
const FIXED_METHOD_NAMES = new Set([
  'fetch',
  'connect',
  'get',
  'put',
  'delete',
  'queue',
  'scheduled',
]);

const GET_RESULT_TYPES = new Set<string>([
  'text',
  'arrayBuffer',
  'json',
  'stream',
]);

const queueMessageSchema = z.object({
  id: z.string().min(1),
  timestamp: z.union([z.date(), z.number()]),
  attempts: z.number().int().nonnegative(),
  body: z.unknown().optional(),
  serializedBody: z
    .custom<Uint8Array>((value) => value instanceof Uint8Array)
    .optional(),
});

function toQueueEventMessage(message: QueueMessage): QueueEventMessage {
  const parsed = queueMessageSchema.safeParse(message);
  if (!parsed.success) {
    throw new ValidationError('Invalid queue message.', {
      issues: parsed.error.issues,
    });
  }

  const { id, timestamp, attempts, body, serializedBody } = parsed.data;
  if ((body === undefined) === (serializedBody === undefined)) {
    throw new ValidationError(
      'Each queue message must have exactly one of "body" or "serializedBody".',
      { id }
    );
  }

  return {
    id,
    timestamp: timestamp instanceof Date ? timestamp : new Date(timestamp),
    attempts,
    serializedBody: serializedBody ?? encodeSerialized(body),
  };
}

const ADDRESS_PATTERN = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d+)$/;

function parseSocketAddress(address: string | SocketAddress): SocketAddress {
  if (typeof address !== 'string') return address;

  const match = ADDRESS_PATTERN.exec(address);
  const hostname = match?.[1] ?? match?.[2];
  const port = match ? Number.parseInt(match[3] ?? '', 10) : Number.NaN;
  if (!hostname || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid socket address: ${address}`, {
      address,
    });
  }
  return { hostname, port };
}

async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

/**
 * A logical destination for outgoing calls. The target decides which
 * backend serves a call; the verbs are the same for every target.
 */
export class Fetcher {
  readonly [FETCHER_BRAND] = true;
  readonly requiresHost: boolean;
  readonly isInHouse: boolean;

  private constructor(
    private readonly target: FetcherTarget,
    options: FetcherOptions
  ) {
    this.requiresHost = options.requiresHost ?? true;
    this.isInHouse = options.isInHouse ?? false;
  }

  /** A destination in the execution context's channel table. */
  static forChannel(channel: number, options: FetcherOptions = {}): Fetcher {
    if (!Number.isInteger(channel) || channel < 0) {
      throw new ValidationError(`Invalid channel number: ${channel}`, {
        channel,
      });
    }
    return new Fetcher({ kind: 'channel', channel }, options);
  }

  /** A factory usable only from the current execution context. */
  static forFactory(
    factory: OutgoingFactory,
    options: FetcherOptions = {}
  ): Fetcher {
    return new Fetcher(
      { kind: 'factory', factory, context: ExecutionContext.current() },
      options
    );
  }

  static forCrossContextFactory(
    factory: CrossContextOutgoingFactory,
    options: FetcherOptions = {}
  ): Fetcher {
    return new Fetcher({ kind: 'cross-context', factory }, options);
  }

  /**
   * A fresh single-use client for one call. Valid only while `context` is
   * alive.
   */
  getClient(
    context: ExecutionContext,
    metadataJson: string | null,
    operationName: string
  ): Transport {
    return resolveClient(this.target, context, {
      isInHouse: this.isInHouse,
      metadataJson,
      operationName,
    });
  }

  /** Resolves this destination to something another context can start. */
  getSubrequestChannel(context: ExecutionContext): SubrequestChannel {
    return resolveSubrequestChannel(this.target, context);
  }

  parseUrl(url: string): URL {
    if (this.requiresHost) {
      if (!URL.canParse(url)) {
        throw new ValidationError(
          `Fetch API cannot load: ${url}. An absolute URL is required.`,
          { url }
        );
      }
      return new URL(url);
    }
    if (!URL.canParse(url, config.fetcher.fakeBaseUrl)) {
      throw new ValidationError(`Fetch API cannot load: ${url}`, { url });
    }
    return new URL(url, config.fetcher.fakeBaseUrl);
  }

  fetch(input: RequestInfo, init?: RequestInit | Request): Promise<Response> {
    return fetchImpl(this, input, init);
  }

  get(url: string, type?: 'text'): Promise<string | null>;
  get(url: string, type: 'arrayBuffer'): Promise<ArrayBuffer | null>;
  get(url: string, type: 'json'): Promise<unknown>;
  get(
    url: string,
    type: 'stream'
  ): Promise<ReadableStream<Uint8Array> | null>;
  async get(
    url: string,
    type: GetResultType = 'text'
  ): Promise<unknown> {
    this.requireGetPutDelete('get');
    if (!GET_RESULT_TYPES.has(type)) {
      throw new ValidationError(`Unknown get() result type: ${type}`, {
        type,
      });
    }

    const response = await this.fetch(this.parseUrl(url), { method: 'GET' });
    if (response.status === 404) {
      await discardBody(response);
      return null;
    }
    if (!response.ok) {
      await discardBody(response);
      throw new TransmissionError(
        `HTTP GET request failed: ${response.status} ${response.statusText}`,
        response.url
      );
    }

    switch (type) {
      case 'arrayBuffer':
        return response.arrayBuffer();
      case 'json':
        return response.json();
      case 'stream':
        return response.body;
      case 'text':
        return response.text();
    }
  }

  async put(
    url: string,
    body: BodyInit,
    options: PutOptions = {}
  ): Promise<void> {
    this.requireGetPutDelete('put');
    const target = this.parseUrl(url);
    if (options.expiration !== undefined) {
      target.searchParams.set('expiration', String(options.expiration));
    }
    if (options.expirationTtl !== undefined) {
      target.searchParams.set('expiration_ttl', String(options.expirationTtl));
    }

    const response = await this.fetch(target, { method: 'PUT', body });
    await discardBody(response);
    if (!response.ok) {
      throw new TransmissionError(
        `HTTP PUT request failed: ${response.status} ${response.statusText}`,
        response.url
      );
    }
  }

  async delete(url: string): Promise<void> {
    this.requireGetPutDelete('delete');
    const response = await this.fetch(this.parseUrl(url), {
      method: 'DELETE',
    });
    await discardBody(response);
    if (!response.ok && response.status !== 404) {
      throw new TransmissionError(
        `HTTP DELETE request failed: ${response.status} ${response.statusText}`,
        response.url
      );
    }
  }

  connect(
    address: string | SocketAddress,
    options: SocketOptions = {}
  ): SocketHandle {
    const socketAddress = parseSocketAddress(address);
    const client = this.getClient(ExecutionContext.current(), null, 'connect');
    if (!client.connect) {
      throw new CapabilityError('This fetcher does not support connect().');
    }
    return client.connect(socketAddress, options);
  }

  async queue(
    queueName: string,
    messages: readonly QueueMessage[]
  ): Promise<QueueResult> {
    this.requireExtraHandlers('queue');
    const eventMessages = messages.map(toQueueEventMessage);
    const client = this.getClient(ExecutionContext.current(), null, 'queue');
    if (!client.customEvent) {
      throw new CapabilityError('This fetcher cannot deliver queue events.');
    }

    const result = await client.customEvent({
      type: 'queue',
      queueName,
      messages: eventMessages,
    });
    if (result.type !== 'queue') {
      throw new StateError(
        'Destination answered a queue event with a different event result.',
        false
      );
    }
    return {
      outcome: result.outcome,
      ackAll: result.ackAll,
      retryBatch: result.retryBatch,
      explicitAcks: result.explicitAcks,
      retryMessages: result.retryMessages,
    };
  }

  async scheduled(options: ScheduledOptions = {}): Promise<ScheduledResult> {
    this.requireExtraHandlers('scheduled');
    const scheduledTime =
      options.scheduledTime instanceof Date
        ? options.scheduledTime
        : new Date(options.scheduledTime ?? Date.now());
    const client = this.getClient(
      ExecutionContext.current(),
      null,
      'scheduled'
    );
    if (!client.customEvent) {
      throw new CapabilityError(
        'This fetcher cannot deliver scheduled events.'
      );
    }

    const result = await client.customEvent({
      type: 'scheduled',
      scheduledTime,
      cron: options.cron ?? '',
    });
    if (result.type !== 'scheduled') {
      throw new StateError(
        'Destination answered a scheduled event with a different event result.',
        false
      );
    }
    return { outcome: result.outcome, noRetry: !result.retry };
  }

  /**
   * Resolves a property name to a remote method. Returns null for the fixed
   * verbs and for `then`, so a fetcher is never mistaken for a thenable.
   */
  getRpcMethod(name: string): RpcMethod | null {
    if (FIXED_METHOD_NAMES.has(name) || name === 'then') return null;
    if (!getCompatibilityFlags().jsRpc) {
      throw new CapabilityError(
        `The RPC receiver does not implement the method "${name}".`
      );
    }
    return this.getRpcMethodInternal(name);
  }

  /** As getRpcMethod, without the compatibility gate. */
  getRpcMethodInternal(name: string): RpcMethod | null {
    if (FIXED_METHOD_NAMES.has(name) || name === 'then') return null;
    return (...args: unknown[]) => this.callRpc(name, args);
  }

  private async callRpc(name: string, args: unknown[]): Promise<unknown> {
    const client = this.getClient(ExecutionContext.current(), null, 'rpc');
    if (!client.call) {
      throw new CapabilityError('This fetcher does not support RPC calls.');
    }
    return client.call(name, args);
  }

  private requireGetPutDelete(verb: string): void {
    if (!getCompatibilityFlags().fetcherGetPutDelete) {
      throw new CapabilityError(`Fetcher.${verb}() is not enabled.`);
    }
  }

  private requireExtraHandlers(verb: string): void {
    if (!getCompatibilityFlags().serviceBindingExtraHandlers) {
      throw new CapabilityError(`Fetcher.${verb}() is not enabled.`);
    }
  }
}

/**
 * Property access on the returned object resolves remote methods through
 * `getRpcMethod`. Fixed verb names and `then` read as undefined.
 */
export function createRpcStub(
  fetcher: Fetcher
): Readonly<Record<string, RpcMethod | undefined>> {
  return new Proxy<Record<string, RpcMethod | undefined>>(
    {},
    {
      get(_target, property) {
        if (typeof property !== 'string') return undefined;
        return fetcher.getRpcMethod(property) ?? undefined;
      },
    }
  );
}

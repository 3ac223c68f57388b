import type { ExecutionContext } from '../services/context.js';

export type CacheMode = 'no-store' | 'no-cache';

/**
 * Request shape handed to a transport. The body stream is fresh for every
 * call; `expectedBodySize` is known only for buffer-backed bodies.
 */
export interface TransportRequest {
  method: string;
  url: string;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
  expectedBodySize: number | undefined;
  cache: CacheMode | undefined;
  signal: AbortSignal | null;
}

/**
 * Peer of an upgraded connection. The protocol engine lives outside this
 * package; responses only carry the handle and couple it to the sink's side.
 */
export interface UpgradedSocket {
  couple(peer: UpgradedSocket): Promise<void>;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
  webSocket?: UpgradedSocket;
  trailers?: Promise<Headers>;
}

export interface SocketAddress {
  hostname: string;
  port: number;
}

export interface SocketOptions {
  secureTransport?: 'off' | 'on' | 'starttls';
  allowHalfOpen?: boolean;
}

/** Raw socket produced by a transport's connect path. */
export interface SocketHandle {
  readonly readable: ReadableStream<Uint8Array>;
  readonly writable: WritableStream<Uint8Array>;
  readonly closed: Promise<void>;
  close(): Promise<void>;
}

export interface QueueRetryBatch {
  retry: boolean;
  delaySeconds?: number;
}

export interface QueueRetryMessage {
  msgId: string;
  delaySeconds?: number;
}

export interface QueueEventMessage {
  id: string;
  timestamp: Date;
  attempts: number;
  serializedBody: Uint8Array;
}

export type TransportEvent =
  | {
      type: 'queue';
      queueName: string;
      messages: readonly QueueEventMessage[];
    }
  | {
      type: 'scheduled';
      scheduledTime: Date;
      cron: string;
    };

export type EventOutcome =
  | 'ok'
  | 'exception'
  | 'exceededCpu'
  | 'exceededMemory'
  | 'canceled'
  | 'unknown';

export type TransportEventResult =
  | {
      type: 'queue';
      outcome: EventOutcome;
      ackAll: boolean;
      retryBatch: QueueRetryBatch;
      explicitAcks: readonly string[];
      retryMessages: readonly QueueRetryMessage[];
    }
  | {
      type: 'scheduled';
      outcome: EventOutcome;
      retry: boolean;
    };

/**
 * A short-lived handle performing exactly one outgoing call. Optional
 * members are capabilities a destination may lack.
 */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
  connect?(address: SocketAddress, options: SocketOptions): SocketHandle;
  customEvent?(event: TransportEvent): Promise<TransportEventResult>;
  call?(method: string, args: readonly unknown[]): Promise<unknown>;
}

export interface ClientMetadata {
  metadataJson: string | null;
  operationName: string;
}

/**
 * A destination that can be handed to another execution context and
 * started from there.
 */
export interface SubrequestChannel {
  startRequest(metadata: ClientMetadata): Transport;
}

/** Ad-hoc factory bound to the context that created it. */
export interface OutgoingFactory {
  newSingleUseClient(metadataJson: string | null): Transport;
  getSubrequestChannel?(): SubrequestChannel;
}

/** Factory that works from any execution context. */
export interface CrossContextOutgoingFactory {
  newSingleUseClient(
    context: ExecutionContext,
    metadataJson: string | null
  ): Transport;
  getSubrequestChannel?(context: ExecutionContext): SubrequestChannel;
}

export { config } from './config/index.js';
export type { CompatibilityFlags } from './config/index.js';
export {
  AppError,
  CancellationError,
  CapabilityError,
  DecodingError,
  StateError,
  TransmissionError,
  ValidationError,
} from './errors/app-error.js';
export {
  createNodeHandler,
  createNodeServer,
  NodeResponseSink,
} from './http/native.js';
export type {
  NodeHandlerOptions,
  NodeResponseTarget,
} from './http/native.js';
export { UndiciChannel, UndiciTransport } from './http/undici-transport.js';
export type {
  UndiciChannelOptions,
  UndiciTransportOptions,
} from './http/undici-transport.js';
export { createNeverAbortSignal } from './lib/abort-utils.js';
export { Body } from './lib/body.js';
export type { BodyInit } from './lib/body-extract.js';
export { fetchImpl } from './lib/fetch.js';
export { dispatchFetchEvent, FetchEvent } from './lib/fetch-event.js';
export type {
  DispatchOptions,
  DispatchResult,
  FetchEventPhase,
  FetchListener,
} from './lib/fetch-event.js';
export type { FetchChannelEvent } from './lib/fetch-telemetry.js';
export { createRpcStub, Fetcher } from './lib/fetcher.js';
export type {
  FetcherOptions,
  GetResultType,
  PutOptions,
  QueueMessage,
  QueueResult,
  RpcMethod,
  ScheduledOptions,
  ScheduledResult,
} from './lib/fetcher.js';
export { Request } from './lib/request.js';
export type { RequestInfo } from './lib/request.js';
export type {
  HeadersInit,
  RedirectMode,
  RequestInit,
  ResponseBodyEncoding,
} from './lib/request-init.js';
export { makeHttpResponse, Response } from './lib/response.js';
export type {
  HttpResponseInit,
  ResponseInit,
  ResponseSink,
  ResponseType,
  SendOptions,
} from './lib/response.js';
export {
  decodeSerialized,
  deserializeRequest,
  deserializeResponse,
  encodeSerialized,
  serializeRequest,
  serializeResponse,
} from './lib/serialization.js';
export type {
  SerializedRequest,
  SerializedResponse,
} from './lib/serialization.js';
export type * from './lib/transport.js';
export {
  ExecutionContext,
  getCompatibilityFlags,
} from './services/context.js';
export type { ExecutionContextOptions } from './services/context.js';
export { RequestObserver } from './services/observer.js';
export type { FailureSource } from './services/observer.js';

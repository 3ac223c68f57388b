import { deserialize, serialize } from 'node:v8';

import { z } from 'zod';

import { DecodingError, ValidationError } from '../errors/app-error.js';
import { extractBody } from './body-extract.js';
import { Request, RequestParts } from './request.js';
import { Response, ResponseParts } from './response.js';

const headerEntriesSchema = z.array(z.tuple([z.string(), z.string()]));
const bodyBytesSchema = z
  .custom<Uint8Array>(
    (value) => value instanceof Uint8Array,
    'body must be bytes'
  )
  .nullable();
const metadataRecordSchema = z.record(z.string(), z.unknown()).nullable();

const serializedRequestSchema = z.strictObject({
  kind: z.literal('request'),
  method: z.string(),
  url: z.url(),
  headers: headerEntriesSchema,
  redirect: z.enum(['follow', 'manual']),
  cache: z.enum(['no-store', 'no-cache']).nullable(),
  encodeResponseBody: z.enum(['automatic', 'manual']),
  metadata: metadataRecordSchema,
  body: bodyBytesSchema,
});

const serializedResponseSchema = z.strictObject({
  kind: z.literal('response'),
  status: z.number().int().min(0).max(599),
  statusText: z.string(),
  headers: headerEntriesSchema,
  urlList: z.array(z.string()),
  encodeBody: z.enum(['automatic', 'manual']),
  metadata: metadataRecordSchema,
  body: bodyBytesSchema,
});

export type SerializedRequest = z.infer<typeof serializedRequestSchema>;
export type SerializedResponse = z.infer<typeof serializedResponseSchema>;

function parseRecord<T>(
  schema: z.ZodType<T>,
  value: unknown,
  what: string
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodingError(`Invalid serialized ${what}.`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function headerEntries(headers: Headers): [string, string][] {
  return [...headers];
}

async function readBodyBytes(
  body: Request | Response
): Promise<Uint8Array | null> {
  if (body.body === null) return null;
  return body.bytes();
}

/**
 * Plain record for a request crossing an isolation boundary. The body is
 * read from a clone so `request` stays usable. Fetcher and signal do not
 * cross.
 */
export async function serializeRequest(
  request: Request
): Promise<SerializedRequest> {
  return {
    kind: 'request',
    method: request.method,
    url: request.url,
    headers: headerEntries(request.headers),
    redirect: request.redirect,
    cache: request.cache ?? null,
    encodeResponseBody: request.encodeResponseBody,
    metadata: request.metadata,
    body: await readBodyBytes(request.clone()),
  };
}

export function deserializeRequest(value: unknown): Request {
  const record = parseRecord(serializedRequestSchema, value, 'request');
  return new Request(
    new RequestParts(
      record.method,
      record.url,
      new Headers(record.headers),
      record.body ? extractBody(record.body) : null,
      record.redirect,
      record.cache ?? undefined,
      record.encodeResponseBody,
      null,
      null,
      record.metadata
    )
  );
}

/** Upgraded sockets cannot be serialized. */
export async function serializeResponse(
  response: Response
): Promise<SerializedResponse> {
  if (response.webSocket) {
    throw new ValidationError('Cannot serialize a response with a WebSocket.');
  }
  return {
    kind: 'response',
    status: response.status,
    statusText: response.statusText,
    headers: headerEntries(response.headers),
    urlList: [...response.urlList],
    encodeBody: response.encodeBody,
    metadata: response.metadata,
    body: await readBodyBytes(response.clone()),
  };
}

export function deserializeResponse(value: unknown): Response {
  const record = parseRecord(serializedResponseSchema, value, 'response');
  return new Response(
    new ResponseParts(
      record.status,
      record.statusText,
      new Headers(record.headers),
      record.body ? extractBody(record.body) : null,
      record.urlList,
      null,
      record.encodeBody,
      null,
      null,
      record.metadata
    )
  );
}

/** Structured-clone encoding of any cloneable value. */
export function encodeSerialized(value: unknown): Uint8Array {
  try {
    return serialize(value);
  } catch (error: unknown) {
    throw new ValidationError('Value could not be serialized.', {
      cause: error,
    });
  }
}

export function decodeSerialized(bytes: Uint8Array): unknown {
  try {
    return deserialize(bytes);
  } catch (error: unknown) {
    throw new DecodingError('Serialized data is corrupt.', { cause: error });
  }
}

import { ValidationError } from '../errors/app-error.js';
import { BodyBuffer } from './body-buffer.js';
import { serializeFormData } from './form-data.js';

/** Sources a Request or Response body can be created from. */
export type BodyInit =
  | ReadableStream<Uint8Array>
  | string
  | ArrayBuffer
  | ArrayBufferView
  | Blob
  | FormData
  | URLSearchParams;

/**
 * Backing of a non-null body. Stream-only bodies cannot be replayed;
 * buffer-backed ones derive their stream lazily from the retained buffer.
 */
export type BodyImpl =
  | { kind: 'stream'; source: ReadableStream<Uint8Array> }
  | {
      kind: 'buffer';
      buffer: BodyBuffer;
      source: ReadableStream<Uint8Array> | null;
    };

export interface ExtractedBody {
  impl: BodyImpl;
  contentType: string | null;
}

function fromBuffer(
  buffer: BodyBuffer,
  contentType: string | null
): ExtractedBody {
  return { impl: { kind: 'buffer', buffer, source: null }, contentType };
}

function copyBytes(init: ArrayBuffer | ArrayBufferView): Uint8Array {
  if (init instanceof ArrayBuffer) return new Uint8Array(init.slice(0));
  return new Uint8Array(
    init.buffer.slice(init.byteOffset, init.byteOffset + init.byteLength)
  );
}

export function isBodyInit(value: unknown): value is BodyInit {
  return (
    typeof value === 'string' ||
    value instanceof ReadableStream ||
    value instanceof ArrayBuffer ||
    ArrayBuffer.isView(value) ||
    value instanceof Blob ||
    value instanceof FormData ||
    value instanceof URLSearchParams
  );
}

/**
 * The Fetch "extract a body" algorithm: maps a body source to its canonical
 * backing and the content type it implies.
 */
export function extractBody(init: BodyInit): ExtractedBody {
  if (typeof init === 'string') {
    return fromBuffer(BodyBuffer.fromString(init), 'text/plain;charset=UTF-8');
  }
  if (init instanceof ReadableStream) {
    if (init.locked) {
      throw new ValidationError(
        'This ReadableStream is locked and cannot be used as a body.'
      );
    }
    return { impl: { kind: 'stream', source: init }, contentType: null };
  }
  if (init instanceof URLSearchParams) {
    return fromBuffer(
      BodyBuffer.fromString(init.toString()),
      'application/x-www-form-urlencoded;charset=UTF-8'
    );
  }
  if (init instanceof FormData) {
    const { blob, contentType } = serializeFormData(init);
    return fromBuffer(BodyBuffer.fromBlob(blob), contentType);
  }
  if (init instanceof Blob) {
    return fromBuffer(BodyBuffer.fromBlob(init), init.type || null);
  }
  if (init instanceof ArrayBuffer || ArrayBuffer.isView(init)) {
    return fromBuffer(BodyBuffer.fromBytes(copyBytes(init)), null);
  }
  throw new ValidationError('Unsupported body initializer type.');
}

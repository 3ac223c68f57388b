import { Duplex } from 'node:stream';
import {
  createBrotliCompress,
  createBrotliDecompress,
  createDeflate,
  createGunzip,
  createGzip,
  createInflate,
} from 'node:zlib';

import { logDebug } from '../services/logger.js';

export type ContentEncoding = 'gzip' | 'deflate' | 'br';

function extractEncodingTokens(value: string): string[] {
  const tokens: string[] = [];
  let i = 0;
  const len = value.length;

  while (i < len) {
    while (
      i < len &&
      (value.charCodeAt(i) === 44 || value.charCodeAt(i) <= 32)
    ) {
      i += 1;
    }
    if (i >= len) break;

    const start = i;
    while (i < len && value.charCodeAt(i) !== 44) i += 1;

    const token = value.slice(start, i).trim().toLowerCase();
    if (token) tokens.push(token);

    if (i < len && value.charCodeAt(i) === 44) i += 1;
  }

  return tokens;
}

function isSupportedContentEncoding(
  encoding: string
): encoding is ContentEncoding {
  return encoding === 'gzip' || encoding === 'deflate' || encoding === 'br';
}

/**
 * Codings listed in a `content-encoding` value, identity removed. `null`
 * when there is nothing to do or a coding is not one we handle.
 */
export function parseContentEncodings(
  value: string | null
): ContentEncoding[] | null {
  if (!value) return null;
  const tokens = extractEncodingTokens(value).filter(
    (token) => token !== 'identity'
  );
  if (tokens.length === 0) return null;
  if (!tokens.every(isSupportedContentEncoding)) {
    logDebug('Leaving body with unsupported content-encoding untouched', {
      encoding: value,
    });
    return null;
  }
  return tokens.filter(isSupportedContentEncoding);
}

function pipeThroughNode(
  stream: ReadableStream<Uint8Array>,
  transform: Duplex
): ReadableStream<Uint8Array> {
  const pair = Duplex.toWeb(transform);
  return stream.pipeThrough<Uint8Array>(pair);
}

function createDecompressor(encoding: ContentEncoding): Duplex {
  switch (encoding) {
    case 'gzip':
      return createGunzip();
    case 'deflate':
      return createInflate();
    case 'br':
      return createBrotliDecompress();
  }
}

function createCompressor(encoding: ContentEncoding): Duplex {
  switch (encoding) {
    case 'gzip':
      return createGzip();
    case 'deflate':
      return createDeflate();
    case 'br':
      return createBrotliCompress();
  }
}

/** Undoes the listed codings, last applied first. */
export function decodeBodyStream(
  stream: ReadableStream<Uint8Array>,
  encodings: readonly ContentEncoding[]
): ReadableStream<Uint8Array> {
  return encodings
    .slice()
    .reverse()
    .reduce(
      (current, encoding) =>
        pipeThroughNode(current, createDecompressor(encoding)),
      stream
    );
}

/** Applies the listed codings in order. */
export function encodeBodyStream(
  stream: ReadableStream<Uint8Array>,
  encodings: readonly ContentEncoding[]
): ReadableStream<Uint8Array> {
  return encodings.reduce(
    (current, encoding) => pipeThroughNode(current, createCompressor(encoding)),
    stream
  );
}

/**
 * Whether an `accept-encoding` value admits every coding. A missing header
 * admits anything.
 */
export function acceptsEncodings(
  acceptEncoding: string | null,
  encodings: readonly ContentEncoding[]
): boolean {
  if (acceptEncoding === null) return true;
  const accepted = new Map<string, number>();
  for (const entry of extractEncodingTokens(acceptEncoding)) {
    const [coding = '', ...params] = entry.split(';').map((p) => p.trim());
    const q = params.find((p) => p.startsWith('q='));
    accepted.set(coding, q ? Number.parseFloat(q.slice(2)) : 1);
  }
  return encodings.every((encoding) => {
    const weight = accepted.get(encoding) ?? accepted.get('*');
    return weight !== undefined && weight > 0;
  });
}

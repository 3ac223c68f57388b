import { DecodingError, StateError } from '../errors/app-error.js';
import { raceWithSignal, throwIfAborted } from './abort-utils.js';
import type { BodyImpl, ExtractedBody } from './body-extract.js';

export const BODY_USED_MESSAGE =
  'Body has already been used. It can only be used once. Use tee() first if you need to read it twice.';

const utf8Decoder = new TextDecoder();

async function readAllChunks(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  signal: AbortSignal | null
): Promise<ArrayBuffer> {
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    for (;;) {
      throwIfAborted(signal);
      const { done, value } = await raceWithSignal(reader.read(), signal);
      if (done) break;
      chunks.push(value);
      total += value.byteLength;
    }
  } catch (error: unknown) {
    void reader.cancel(error).catch(() => undefined);
    throw error;
  }

  const buffer = new ArrayBuffer(total);
  const out = new Uint8Array(buffer);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return buffer;
}

function essence(contentType: string | null): string {
  if (!contentType) return '';
  const semiIndex = contentType.indexOf(';');
  const mediaType =
    semiIndex === -1 ? contentType : contentType.slice(0, semiIndex);
  return mediaType.trim().toLowerCase();
}

/**
 * Body behaviour shared by Request and Response.
 *
 * The stream returned by `body` keeps one identity for the life of the
 * backing; what it reads from may be swapped underneath (clone tees a
 * stream-only source) until the first read marks the body used.
 */
export abstract class Body {
  private impl: BodyImpl | null;
  private exposed: ReadableStream<Uint8Array> | null = null;
  private disturbed = false;
  // Non-owning: the subclass owns this header list.
  private readonly headersRef: Headers;
  protected bodySignal: AbortSignal | null = null;

  protected constructor(init: ExtractedBody | null, headers: Headers) {
    this.impl = init?.impl ?? null;
    this.headersRef = headers;
  }

  get body(): ReadableStream<Uint8Array> | null {
    const impl = this.impl;
    if (!impl) return null;
    this.exposed ??= this.createExposedStream(impl);
    return this.exposed;
  }

  get bodyUsed(): boolean {
    return this.disturbed;
  }

  async arrayBuffer(): Promise<ArrayBuffer> {
    return this.consume();
  }

  async bytes(): Promise<Uint8Array> {
    return new Uint8Array(await this.consume());
  }

  async text(): Promise<string> {
    return utf8Decoder.decode(await this.consume());
  }

  async json(): Promise<unknown> {
    const text = await this.text();
    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new DecodingError('Body is not valid JSON.', { cause: error });
    }
  }

  async formData(): Promise<FormData> {
    const contentType = this.headersRef.get('content-type');
    const buffer = await this.consume();
    const mediaType = essence(contentType);

    if (mediaType === 'multipart/form-data' && contentType) {
      try {
        return await new globalThis.Response(buffer, {
          headers: { 'content-type': contentType },
        }).formData();
      } catch (error: unknown) {
        throw new DecodingError('Failed to parse multipart/form-data body.', {
          cause: error,
        });
      }
    }

    if (mediaType === 'application/x-www-form-urlencoded') {
      const formData = new FormData();
      new URLSearchParams(utf8Decoder.decode(buffer)).forEach((value, key) => {
        formData.append(key, value);
      });
      return formData;
    }

    throw new DecodingError(
      'Unrecognized Content-Type header value. FormData can only parse multipart/form-data and application/x-www-form-urlencoded bodies.'
    );
  }

  async blob(): Promise<Blob> {
    const type = this.headersRef.get('content-type') ?? '';
    return new Blob([await this.consume()], { type });
  }

  /** True if this body is null or buffer-backed. */
  canRewind(): boolean {
    return this.impl?.kind !== 'stream';
  }

  /**
   * Re-derives a fresh stream from the retained buffer and clears the used
   * state. Calling this on a stream-only body is a programming error.
   */
  rewind(): void {
    const impl = this.impl;
    if (impl?.kind === 'stream') {
      throw new StateError('Cannot rewind a stream-only body.', false);
    }
    if (impl) impl.source = null;
    this.exposed = null;
    this.disturbed = false;
  }

  /** Drops to the empty-body state. */
  nullify(): void {
    if (this.impl?.kind === 'buffer') this.impl.buffer.release();
    this.impl = null;
    this.exposed = null;
    this.disturbed = false;
  }

  /** Byte length when it is known without reading. */
  protected get expectedBodySize(): number | undefined {
    if (!this.impl) return 0;
    return this.impl.kind === 'buffer'
      ? this.impl.buffer.byteLength
      : undefined;
  }

  /** Runs a deferred body read. Subclasses restore a captured context. */
  protected runInBodyContext<T>(fn: () => T): T {
    return fn();
  }

  /**
   * Duplicate backing for clone(): buffers are shared, stream-only sources
   * are teed so both sides read every chunk in order at their own pace.
   */
  protected cloneBody(): ExtractedBody | null {
    const impl = this.impl;
    if (!impl) return null;
    if (this.disturbed) throw new StateError(BODY_USED_MESSAGE);

    if (impl.kind === 'buffer') {
      return {
        impl: { kind: 'buffer', buffer: impl.buffer.clone(), source: null },
        contentType: null,
      };
    }

    const [mine, theirs] = impl.source.tee();
    impl.source = mine;
    return { impl: { kind: 'stream', source: theirs }, contentType: null };
  }

  /**
   * Moves the backing to a new owner; this body is left used.
   */
  protected transferBody(): ExtractedBody | null {
    if (this.disturbed) throw new StateError(BODY_USED_MESSAGE);
    const impl = this.impl;
    if (!impl) return null;

    this.impl = null;
    this.exposed = null;
    this.disturbed = true;
    return { impl, contentType: null };
  }

  private async consume(): Promise<ArrayBuffer> {
    if (this.disturbed) throw new StateError(BODY_USED_MESSAGE);

    // The stream is created here too, so its pulls run in the body context.
    return this.runInBodyContext(async () => {
      const stream = this.body;
      if (!stream) return new ArrayBuffer(0);
      if (stream.locked) throw new StateError(BODY_USED_MESSAGE);

      this.disturbed = true;
      return readAllChunks(stream.getReader(), this.bodySignal);
    });
  }

  private createExposedStream(impl: BodyImpl): ReadableStream<Uint8Array> {
    let reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
    const acquire = (): ReadableStreamDefaultReader<Uint8Array> => {
      if (reader) return reader;
      let source: ReadableStream<Uint8Array>;
      if (impl.kind === 'buffer') {
        impl.source ??= impl.buffer.createStream();
        source = impl.source;
      } else {
        source = impl.source;
      }
      reader = source.getReader();
      return reader;
    };

    return new ReadableStream<Uint8Array>(
      {
        pull: async (controller) => {
          this.disturbed = true;
          const { done, value } = await acquire().read();
          if (done) {
            controller.close();
          } else {
            controller.enqueue(value);
          }
        },
        cancel: async (reason: unknown) => {
          this.disturbed = true;
          await acquire().cancel(reason);
        },
      },
      { highWaterMark: 0 }
    );
  }
}

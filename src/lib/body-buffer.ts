import { StateError } from '../errors/app-error.js';

/**
 * A byte allocation shared by a body, its clones and every stream derived
 * from them. The last `release()` drops the allocation.
 */
export class RefcountedBytes {
  private allocation: Uint8Array | null;
  private refs = 1;

  constructor(allocation: Uint8Array) {
    this.allocation = allocation;
  }

  get refCount(): number {
    return this.refs;
  }

  get released(): boolean {
    return this.allocation === null;
  }

  addRef(): this {
    if (!this.allocation) {
      throw new StateError('Cannot share a released buffer.', false);
    }
    this.refs += 1;
    return this;
  }

  release(): void {
    if (!this.allocation) return;
    this.refs -= 1;
    if (this.refs === 0) this.allocation = null;
  }

  get bytes(): Uint8Array {
    if (!this.allocation) {
      throw new StateError('Buffer was released.', false);
    }
    return this.allocation;
  }
}

type BufferOwner =
  | { kind: 'bytes'; owner: RefcountedBytes; offset: number; length: number }
  | { kind: 'blob'; blob: Blob };

const encoder = new TextEncoder();

/**
 * Retained source of a buffer-backed body. Either a trimmed view over a
 * shared allocation or a Blob; both derive any number of fresh streams.
 */
export class BodyBuffer {
  private constructor(private readonly source: BufferOwner) {}

  static fromBytes(bytes: Uint8Array): BodyBuffer {
    return new BodyBuffer({
      kind: 'bytes',
      owner: new RefcountedBytes(bytes),
      offset: 0,
      length: bytes.byteLength,
    });
  }

  /**
   * Encodes into a worst-case sized allocation and keeps a view of the
   * written prefix, so the text is encoded exactly once.
   */
  static fromString(text: string): BodyBuffer {
    const allocation = new Uint8Array(text.length * 3);
    const { written } = encoder.encodeInto(text, allocation);
    return new BodyBuffer({
      kind: 'bytes',
      owner: new RefcountedBytes(allocation),
      offset: 0,
      length: written,
    });
  }

  static fromBlob(blob: Blob): BodyBuffer {
    return new BodyBuffer({ kind: 'blob', blob });
  }

  get kind(): BufferOwner['kind'] {
    return this.source.kind;
  }

  get byteLength(): number {
    return this.source.kind === 'bytes'
      ? this.source.length
      : this.source.blob.size;
  }

  /** Bytes of a raw allocation; `null` for Blob-backed buffers. */
  get view(): Uint8Array | null {
    if (this.source.kind !== 'bytes') return null;
    const { owner, offset, length } = this.source;
    return owner.bytes.subarray(offset, offset + length);
  }

  clone(): BodyBuffer {
    if (this.source.kind === 'blob') return new BodyBuffer(this.source);
    return new BodyBuffer({
      ...this.source,
      owner: this.source.owner.addRef(),
    });
  }

  release(): void {
    if (this.source.kind === 'bytes') this.source.owner.release();
  }

  /**
   * A new stream over the retained bytes. The stream holds its own
   * reference until it is drained or cancelled.
   */
  createStream(): ReadableStream<Uint8Array> {
    if (this.source.kind === 'blob') return this.source.blob.stream();

    const { owner, offset, length } = this.source;
    owner.addRef();
    let held = true;
    const drop = (): void => {
      if (!held) return;
      held = false;
      owner.release();
    };

    return new ReadableStream<Uint8Array>({
      pull(controller) {
        if (length > 0) {
          controller.enqueue(owner.bytes.subarray(offset, offset + length));
        }
        controller.close();
        drop();
      },
      cancel() {
        drop();
      },
    });
  }
}

import type { ReadableStream } from 'node:stream/web';
import type { MaybePromise } from './MaybePromise.mts';

/**
 * A pull-based source of bytes. Each read returns at most `maxBytes` bytes, and an
 * empty buffer once the source is exhausted (and for every read after that).
 */
export interface ChunkSource {
  read(maxBytes: number): MaybePromise<Buffer>;
}

type Chunk = Uint8Array | string;

export type ChunkInput =
  | Chunk
  | ReadableStream<Uint8Array>
  | Iterable<Chunk>
  | AsyncIterable<Chunk>;

interface ChunkIterator {
  next(): MaybePromise<IteratorResult<unknown>>;
}

export const EMPTY = /*@__PURE__*/ Buffer.alloc(0);

export function makeChunkSource(input: ChunkInput | ChunkSource): ChunkSource {
  if (typeof input === 'string') {
    return new IteratorChunkSource(iterate([Buffer.from(input, 'utf-8')]));
  }
  if (input instanceof Uint8Array) {
    return new IteratorChunkSource(iterate([input]));
  }
  if (isChunkSource(input)) {
    return input;
  }
  if (isReadableStream(input)) {
    const reader = input.getReader();
    return new IteratorChunkSource({
      next: async () => {
        const next = await reader.read();
        return next.done ? { done: true, value: undefined } : { done: false, value: next.value };
      },
    });
  }
  if (isAsyncIterable(input)) {
    return new IteratorChunkSource(input[Symbol.asyncIterator]());
  }
  return new IteratorChunkSource(input[Symbol.iterator]());
}

/**
 * Serves at most `limit` bytes from the source, then behaves as if the source is
 * exhausted. Fewer bytes are returned if the source ends early.
 */
export function limitChunkSource(source: ChunkSource, limit: number): ChunkSource {
  let remaining = limit;
  return {
    read(maxBytes) {
      if (remaining <= 0) {
        return EMPTY;
      }
      const result = source.read(Math.min(maxBytes, remaining));
      if (result instanceof Promise) {
        return result.then((chunk) => {
          remaining -= chunk.byteLength;
          return chunk;
        });
      }
      remaining -= result.byteLength;
      return result;
    },
  };
}

export async function readAll(source: ChunkSource, chunkSize = 65536): Promise<Buffer> {
  const parts: Buffer[] = [];
  while (true) {
    const chunk = await source.read(chunkSize);
    if (!chunk.byteLength) {
      return Buffer.concat(parts);
    }
    parts.push(chunk);
  }
}

class IteratorChunkSource implements ChunkSource {
  /** @internal */ declare private readonly _iterator: ChunkIterator;
  /** @internal */ declare private _pending: Buffer;
  /** @internal */ declare private _done: boolean;

  constructor(iterator: ChunkIterator) {
    this._iterator = iterator;
    this._pending = EMPTY;
    this._done = false;
  }

  read(maxBytes: number): MaybePromise<Buffer> {
    if (maxBytes <= 0) {
      throw new RangeError('invalid read size');
    }
    if (this._pending.byteLength) {
      return this._take(maxBytes);
    }
    if (this._done) {
      return EMPTY;
    }
    const next = this._iterator.next();
    if ('then' in next) {
      return next.then((result) => this._receive(result, maxBytes));
    }
    return this._receive(next, maxBytes);
  }

  /** @internal */
  private _receive(result: IteratorResult<unknown>, maxBytes: number): MaybePromise<Buffer> {
    if (result.done) {
      this._done = true;
      return EMPTY;
    }
    const chunk = toBuffer(result.value);
    if (!chunk.byteLength) {
      // empty chunks carry no information; skip them so that EMPTY always means exhausted
      return this.read(maxBytes);
    }
    this._pending = chunk;
    return this._take(maxBytes);
  }

  /** @internal */
  private _take(maxBytes: number) {
    const pending = this._pending;
    if (pending.byteLength <= maxBytes) {
      this._pending = EMPTY;
      return pending;
    }
    this._pending = pending.subarray(maxBytes);
    return pending.subarray(0, maxBytes);
  }
}

function* iterate<T>(values: T[]) {
  yield* values;
}

function isChunkSource(input: object): input is ChunkSource {
  // node Readables also have a read method, but must be consumed by iterating
  return 'read' in input && typeof input.read === 'function' && !isAsyncIterable(input);
}

function isReadableStream(input: object): input is ReadableStream<Uint8Array> {
  return 'getReader' in input && typeof input.getReader === 'function';
}

function isAsyncIterable(input: object): input is AsyncIterable<unknown> {
  return Symbol.asyncIterator in input;
}

function toBuffer(value: unknown): Buffer {
  if (typeof value === 'string') {
    return Buffer.from(value, 'utf-8');
  }
  if (Buffer.isBuffer(value)) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  throw new TypeError('invalid stream type: must contain bytes or UTF-8 text');
}

import { ParseError } from '../core/ParseError.mts';
import { EMPTY, type ChunkSource } from './ChunkSource.mts';

const DEFAULT_READ_SIZE = 65536;
const NEWLINE = 0x0a;

/**
 * Wraps a {@link ChunkSource} with a replay buffer, so that parsers can read ahead and
 * then give back any bytes they did not consume.
 */
export class LazyStream {
  /** @internal */ declare private readonly _source: ChunkSource;
  /** @internal */ declare private readonly _readSize: number;
  /** @internal */ declare private _replay: Buffer;
  /** @internal */ declare private _bytesRead: number;

  constructor(source: ChunkSource, readSize = DEFAULT_READ_SIZE) {
    this._source = source;
    this._readSize = readSize;
    this._replay = EMPTY;
    this._bytesRead = 0;
  }

  /** total bytes consumed so far (ungot bytes are not counted) */
  get bytesRead() {
    return this._bytesRead;
  }

  /**
   * Returns up to `size` bytes, or an empty buffer if the source is exhausted.
   */
  async read(size = this._readSize): Promise<Buffer> {
    let result: Buffer;
    const replay = this._replay;
    if (replay.byteLength) {
      if (replay.byteLength <= size) {
        result = replay;
        this._replay = EMPTY;
      } else {
        result = replay.subarray(0, size);
        this._replay = replay.subarray(size);
      }
    } else {
      result = await this._source.read(size);
    }
    this._bytesRead += result.byteLength;
    return result;
  }

  /**
   * Pushes bytes back onto the front of the stream. They will be returned (in the same
   * order) by the next reads, before any older ungot bytes or new data from the source.
   *
   * The buffer is not copied, so must not be modified afterwards.
   */
  unget(data: Buffer) {
    if (!data.byteLength) {
      return;
    }
    this._replay = this._replay.byteLength ? Buffer.concat([data, this._replay]) : data;
    this._bytesRead -= data.byteLength;
  }

  /**
   * Reads exactly `size` bytes, unless the source is exhausted first.
   */
  async readExact(size: number): Promise<Buffer> {
    const first = await this.read(size);
    if (first.byteLength === size || !first.byteLength) {
      return first;
    }
    const parts = [first];
    let remaining = size - first.byteLength;
    while (remaining > 0) {
      const next = await this.read(remaining);
      if (!next.byteLength) {
        break;
      }
      parts.push(next);
      remaining -= next.byteLength;
    }
    return Buffer.concat(parts);
  }

  /**
   * Reads up to and including the next `\n` (so `\r\n` endings are also included in the
   * result), or all remaining data if the source ends first.
   *
   * @throws {ParseError} LINE_TOO_LONG if no line ending is found in the first
   * `maxLength` bytes. The stream is left unchanged in this case.
   */
  async readLine(maxLength: number): Promise<Buffer> {
    const parts: Buffer[] = [];
    let length = 0;
    while (length < maxLength) {
      const chunk = await this.read(Math.min(maxLength - length, this._readSize));
      if (!chunk.byteLength) {
        break;
      }
      const end = chunk.indexOf(NEWLINE);
      if (end !== -1) {
        this.unget(chunk.subarray(end + 1));
        parts.push(chunk.subarray(0, end + 1));
        return parts.length === 1 ? parts[0]! : Buffer.concat(parts);
      }
      parts.push(chunk);
      length += chunk.byteLength;
    }
    if (length >= maxLength) {
      this.unget(Buffer.concat(parts));
      throw new ParseError('LINE_TOO_LONG', 'line too long');
    }
    return Buffer.concat(parts);
  }

  /**
   * Reads and discards everything remaining in the stream.
   *
   * @returns the number of bytes discarded
   */
  async drain(): Promise<number> {
    let total = 0;
    while (true) {
      const chunk = await this.read(this._readSize);
      if (!chunk.byteLength) {
        return total;
      }
      total += chunk.byteLength;
    }
  }
}

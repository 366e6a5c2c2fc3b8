import {
  CLAIMED,
  type ChunkResult,
  type FileInfo,
  type UploadHandler,
  type UploadHandlerFactory,
} from './UploadHandler.mts';
import { InMemoryUploadedFile, type UploadedFile } from './UploadedFile.mts';

/**
 * Keeps files in memory, up to `maxSize` bytes. Once a file is larger than this, all data
 * received so far is passed on to the next handler, along with all subsequent chunks.
 */
export class MemoryUploadHandler implements UploadHandler {
  /** @internal */ declare private readonly _maxSize: number;
  /** @internal */ declare private _info: FileInfo | null;
  /** @internal */ declare private _parts: Buffer[];
  /** @internal */ declare private _size: number;
  /** @internal */ declare private _passing: boolean;

  constructor(maxSize: number) {
    this._maxSize = maxSize;
    this._reset(null);
  }

  newFile(info: FileInfo) {
    this._reset(info);
  }

  receiveDataChunk(chunk: Buffer): ChunkResult {
    if (this._passing) {
      return chunk;
    }
    if (this._size + chunk.byteLength > this._maxSize) {
      this._passing = true;
      const all = this._parts.length ? Buffer.concat([...this._parts, chunk]) : chunk;
      this._parts = [];
      this._size = 0;
      return all;
    }
    this._parts.push(chunk);
    this._size += chunk.byteLength;
    return CLAIMED;
  }

  fileComplete(): UploadedFile | undefined {
    const info = this._info;
    if (this._passing || !info) {
      return undefined;
    }
    const data = Buffer.concat(this._parts, this._size);
    this._reset(null);
    return new InMemoryUploadedFile(info, data);
  }

  abortFile() {
    this._reset(null);
  }

  /** @internal */
  private _reset(info: FileInfo | null) {
    this._info = info;
    this._parts = [];
    this._size = 0;
    this._passing = false;
  }
}

export const memoryUploadHandler: UploadHandlerFactory = ({ limits }) =>
  new MemoryUploadHandler(limits.maxFileMemorySize);

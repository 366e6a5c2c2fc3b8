import { createReadStream } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { FileInfo } from './UploadHandler.mts';

export interface UploadedFile {
  readonly fieldName: string;
  /** the client's filename (reduced to its basename unless `preservePath` is set) */
  readonly filename: string;
  readonly contentType: string | undefined;
  readonly charset: string | undefined;
  readonly contentTypeExtra: ReadonlyMap<string, string>;
  readonly size: number;
  readonly storage: 'memory' | 'temporary';
  /** location on disk (for temporary files) */
  readonly path?: string | undefined;

  read(): Promise<Buffer>;
  stream(): Readable;
  /** deletes any stored data. Afterwards the file can no-longer be read */
  release(): Promise<void>;
}

abstract class BaseUploadedFile {
  declare public readonly fieldName: string;
  declare public readonly filename: string;
  declare public readonly contentType: string | undefined;
  declare public readonly charset: string | undefined;
  declare public readonly contentTypeExtra: ReadonlyMap<string, string>;
  declare public readonly size: number;

  constructor(info: FileInfo, size: number) {
    this.fieldName = info.fieldName;
    this.filename = info.filename;
    this.contentType = info.contentType;
    this.charset = info.charset;
    this.contentTypeExtra = info.contentTypeExtra;
    this.size = size;
  }

  abstract get storage(): 'memory' | 'temporary';

  toJSON() {
    return {
      fieldName: this.fieldName,
      filename: this.filename,
      contentType: this.contentType,
      charset: this.charset,
      size: this.size,
      storage: this.storage,
    };
  }
}

export class InMemoryUploadedFile extends BaseUploadedFile implements UploadedFile {
  /** @internal */ declare private _data: Buffer | null;

  constructor(info: FileInfo, data: Buffer) {
    super(info, data.byteLength);
    this._data = data;
  }

  get storage() {
    return 'memory' as const;
  }

  async read() {
    return this._get();
  }

  stream() {
    return Readable.from([this._get()]);
  }

  async release() {
    this._data = null;
  }

  /** @internal */
  private _get() {
    if (!this._data) {
      throw new Error('file has been released');
    }
    return this._data;
  }
}

export class TemporaryUploadedFile extends BaseUploadedFile implements UploadedFile {
  declare public readonly path: string;
  /** @internal */ declare private _released: boolean;

  constructor(info: FileInfo, path: string, size: number) {
    super(info, size);
    this.path = path;
    this._released = false;
  }

  get storage() {
    return 'temporary' as const;
  }

  async read() {
    this._check();
    return readFile(this.path);
  }

  stream() {
    this._check();
    return createReadStream(this.path);
  }

  async release() {
    this._released = true;
    await rm(this.path, { force: true });
  }

  /** @internal */
  private _check() {
    if (this._released) {
      throw new Error('file has been released');
    }
  }
}

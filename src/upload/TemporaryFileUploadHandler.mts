import { open, rm, writeFile, type FileHandle } from 'node:fs/promises';
import type { Logger } from '../util/log.mts';
import type { TempFileStorage } from './tempFileStorage.mts';
import {
  CLAIMED,
  type ChunkResult,
  type FileInfo,
  type UploadHandler,
  type UploadHandlerFactory,
} from './UploadHandler.mts';
import { TemporaryUploadedFile, type UploadedFile } from './UploadedFile.mts';

const FILE_MODE = 0o600;

/**
 * Writes files to the temporary storage. Claims all data it receives, so should be the
 * last handler.
 */
export class TemporaryFileUploadHandler implements UploadHandler {
  /** @internal */ declare private readonly _storage: TempFileStorage;
  /** @internal */ declare private readonly _log: Logger;
  /** @internal */ declare private _info: FileInfo | null;
  /** @internal */ declare private _path: string | null;
  /** @internal */ declare private _handle: FileHandle | null;
  /** @internal */ declare private _written: number;

  constructor(storage: TempFileStorage, log: Logger) {
    this._storage = storage;
    this._log = log;
    this._info = null;
    this._path = null;
    this._handle = null;
    this._written = 0;
  }

  newFile(info: FileInfo) {
    this._info = info;
    this._path = null;
    this._handle = null;
    this._written = 0;
  }

  async receiveDataChunk(chunk: Buffer): Promise<ChunkResult> {
    const handle = this._handle ?? (await this._open());
    await handle.write(chunk);
    this._written += chunk.byteLength;
    return CLAIMED;
  }

  async fileComplete(): Promise<UploadedFile | undefined> {
    const info = this._info;
    if (!info) {
      return undefined;
    }
    let path = this._path;
    const handle = this._handle;
    this._handle = null;
    if (handle) {
      await handle.close();
    }
    if (!path) {
      // nothing was written: store an empty file
      path = await this._storage.nextFile();
      await writeFile(path, '', { mode: FILE_MODE, flag: 'wx' });
    }
    this._info = null;
    this._path = null;
    this._log(2, `stored ${JSON.stringify(info.filename)} (${this._written} bytes) in ${path}`);
    return new TemporaryUploadedFile(info, path, this._written);
  }

  async abortFile() {
    const handle = this._handle;
    const path = this._path;
    this._info = null;
    this._handle = null;
    this._path = null;
    try {
      await handle?.close();
    } finally {
      if (path) {
        await rm(path, { force: true });
      }
    }
  }

  /** @internal */
  private async _open() {
    const path = await this._storage.nextFile();
    this._path = path;
    const handle = await open(path, 'wx', FILE_MODE);
    this._handle = handle;
    return handle;
  }
}

export const temporaryFileUploadHandler: UploadHandlerFactory = ({ storage, log }) =>
  new TemporaryFileUploadHandler(storage, log);

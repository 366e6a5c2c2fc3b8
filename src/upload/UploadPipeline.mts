import { ParseError } from '../core/ParseError.mts';
import { ErrorAccumulator } from '../util/ErrorAccumulator.mts';
import {
  CLAIMED,
  UploadInstruction,
  type FileInfo,
  type UploadHandler,
} from './UploadHandler.mts';
import type { UploadedFile } from './UploadedFile.mts';

/**
 * Passes each file through a chain of upload handlers.
 */
export class UploadPipeline {
  /** @internal */ declare private readonly _handlers: UploadHandler[];
  /** @internal */ declare private readonly _received: number[];
  /** @internal */ declare private _active: boolean;

  constructor(handlers: UploadHandler[]) {
    this._handlers = handlers;
    this._received = handlers.map(() => 0);
    this._active = false;
  }

  /** the smallest chunk size requested by any handler */
  chunkSize(defaultSize: number) {
    let size = defaultSize;
    for (const handler of this._handlers) {
      if (handler.chunkSize !== undefined && handler.chunkSize > 0) {
        size = Math.min(size, handler.chunkSize);
      }
    }
    return size;
  }

  async begin(info: FileInfo) {
    this._received.fill(0);
    this._active = true;
    for (const handler of this._handlers) {
      await wrapStorageErrors(() => handler.newFile?.(info));
    }
  }

  /**
   * Offers the file to handlers which can take over the whole body.
   *
   * @returns the file if a handler took it
   */
  async handleRawData(
    info: FileInfo,
    body: AsyncIterable<Buffer>,
  ): Promise<UploadedFile | undefined> {
    for (const handler of this._handlers) {
      if (!handler.handleRawData) {
        continue;
      }
      let started = false;
      const tracked: AsyncIterable<Buffer> = {
        [Symbol.asyncIterator]: () => {
          started = true;
          return body[Symbol.asyncIterator]();
        },
      };
      const file = await wrapStorageErrors(() => handler.handleRawData?.(info, tracked));
      if (file) {
        this._active = false;
        return file;
      }
      if (started) {
        throw new ParseError('STORAGE_FAILURE', 'failed to store upload', {
          message: 'upload handler read the file but did not return it',
        });
      }
    }
    return undefined;
  }

  /**
   * Sends a chunk of the current file through the handlers.
   *
   * @returns SKIP_FILE or STOP_UPLOAD if a handler requested it, otherwise null
   */
  async write(chunk: Buffer): Promise<UploadInstruction | null> {
    let data = chunk;
    for (let i = 0; i < this._handlers.length; ++i) {
      const handler = this._handlers[i]!;
      const offset = this._received[i]!;
      this._received[i] = offset + data.byteLength;
      const result = await wrapStorageErrors(() => handler.receiveDataChunk(data, offset));
      if (result === CLAIMED) {
        return null;
      }
      if (result instanceof UploadInstruction) {
        return result;
      }
      if (!result.byteLength) {
        return null;
      }
      data = result;
    }
    throw new ParseError('STORAGE_FAILURE', 'failed to store upload', {
      message: 'no upload handler accepted the data',
    });
  }

  /**
   * @returns the file from the first handler which stored it
   */
  async complete(): Promise<UploadedFile | undefined> {
    this._active = false;
    for (let i = 0; i < this._handlers.length; ++i) {
      const handler = this._handlers[i]!;
      const size = this._received[i]!;
      const file = await wrapStorageErrors(() => handler.fileComplete(size));
      if (file) {
        return file;
      }
    }
    return undefined;
  }

  /**
   * Tells every handler to discard the current file (if there is one). All handlers are
   * called even if some fail.
   */
  async abort(reason: unknown) {
    if (!this._active) {
      return;
    }
    this._active = false;
    const errors = new ErrorAccumulator();
    await errors.runAll(this._handlers.map((handler) => () => handler.abortFile?.(reason)));
    if (errors.hasError) {
      throw storageFailure(errors.error);
    }
  }

  async uploadComplete() {
    for (const handler of this._handlers) {
      await wrapStorageErrors(() => handler.uploadComplete?.());
    }
  }
}

async function wrapStorageErrors<T>(fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    throw storageFailure(error);
  }
}

const storageFailure = (error: unknown) =>
  error instanceof ParseError
    ? error
    : new ParseError('STORAGE_FAILURE', 'failed to store upload', {
        message: `failed to store upload: ${error instanceof Error ? error.message : error}`,
        cause: error,
      });

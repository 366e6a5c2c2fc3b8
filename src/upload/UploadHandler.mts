import type { ParserLimits } from '../core/ParserLimits.mts';
import type { Logger } from '../util/log.mts';
import type { MaybePromise } from '../util/MaybePromise.mts';
import type { TempFileStorage } from './tempFileStorage.mts';
import type { UploadedFile } from './UploadedFile.mts';

export class UploadInstruction extends Error {}

/** the handler has stored the chunk; later handlers will not see it */
export const CLAIMED = /*@__PURE__*/ new UploadInstruction('CLAIMED');
/** discard the current file (the rest of the part is skipped) */
export const SKIP_FILE = /*@__PURE__*/ new UploadInstruction('SKIP_FILE');
/** stop parsing, returning the fields and files received so far */
export const STOP_UPLOAD = /*@__PURE__*/ new UploadInstruction('STOP_UPLOAD');

/** a Buffer to pass (possibly different) data on to the next handler, or an instruction */
export type ChunkResult = Buffer | UploadInstruction;

export interface FileInfo {
  readonly fieldName: string;
  readonly filename: string;
  readonly contentType: string | undefined;
  readonly charset: string | undefined;
  readonly contentTypeExtra: ReadonlyMap<string, string>;
  /** the part's Content-Length header, if it was sent (not verified) */
  readonly contentLength: number | undefined;
}

/**
 * Receives the content of uploaded files. Handlers are called in order for each chunk of
 * data, and can either store the chunk, or pass it on to the next handler.
 */
export interface UploadHandler {
  /** the largest chunk this handler wants to receive */
  readonly chunkSize?: number | undefined;

  newFile?(info: FileInfo): MaybePromise<void>;

  /**
   * Offered the whole body of the file before any chunks are sent. To take over the file,
   * return an uploaded file. To decline, return undefined without reading from `body`.
   */
  handleRawData?(info: FileInfo, body: AsyncIterable<Buffer>): MaybePromise<UploadedFile | undefined>;

  /**
   * @param offset the number of bytes this handler has received for the file so far
   */
  receiveDataChunk(chunk: Buffer, offset: number): MaybePromise<ChunkResult>;

  /**
   * @param size the number of bytes this handler received for the file
   * @returns the stored file, or undefined if this handler did not store the file
   */
  fileComplete(size: number): MaybePromise<UploadedFile | undefined>;

  /** the current file was cancelled; release anything stored for it */
  abortFile?(reason: unknown): MaybePromise<void>;

  /** called once after all parts have been parsed successfully */
  uploadComplete?(): MaybePromise<void>;
}

export interface UploadHandlerContext {
  readonly limits: ParserLimits;
  /** temporary storage for this parse (the directory is only created if used) */
  readonly storage: TempFileStorage;
  readonly log: Logger;
}

/** creates a new handler for each parse */
export type UploadHandlerFactory = (context: UploadHandlerContext) => UploadHandler;

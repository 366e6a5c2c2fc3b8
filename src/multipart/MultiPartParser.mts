import { ParseError } from '../core/ParseError.mts';
import { makeParserLimits, type ParserLimits, type ParserOptions } from '../core/ParserLimits.mts';
import { Base64ChunkDecoder, decodeBase64, InvalidBase64Error } from '../util/base64.mts';
import { decodeText } from '../util/charset.mts';
import {
  limitChunkSource,
  makeChunkSource,
  type ChunkInput,
  type ChunkSource,
} from '../util/ChunkSource.mts';
import { ErrorAccumulator } from '../util/ErrorAccumulator.mts';
import { LazyStream } from '../util/LazyStream.mts';
import { NO_LOG, type Logger } from '../util/log.mts';
import { MultiValueMap } from '../util/MultiValueMap.mts';
import { memoryUploadHandler } from '../upload/MemoryUploadHandler.mts';
import { makeTempFileStorage } from '../upload/tempFileStorage.mts';
import { temporaryFileUploadHandler } from '../upload/TemporaryFileUploadHandler.mts';
import type { UploadedFile } from '../upload/UploadedFile.mts';
import {
  SKIP_FILE,
  STOP_UPLOAD,
  type FileInfo,
  type UploadHandlerFactory,
} from '../upload/UploadHandler.mts';
import { UploadPipeline } from '../upload/UploadPipeline.mts';
import { BoundaryScanner } from './BoundaryScanner.mts';
import { parseContentType } from './contentType.mts';
import type { PartDescriptor } from './types.mts';

export interface MultiPartParserOptions extends ParserOptions {
  /**
   * Storage for uploaded files, tried in order.
   * @default [memoryUploadHandler, temporaryFileUploadHandler]
   */
  uploadHandlers?: UploadHandlerFactory[] | undefined;
  /** the request's Content-Length, if known. The body is not read past this */
  contentLength?: number | undefined;
  log?: Logger | undefined;
}

export interface ParseResult {
  fields: MultiValueMap<string>;
  files: MultiValueMap<UploadedFile>;
  /** true if an upload handler stopped the upload early */
  stopped: boolean;
  /** deletes all uploaded files (and their temporary directory) */
  release(): Promise<void>;
}

export const DEFAULT_UPLOAD_HANDLERS: readonly UploadHandlerFactory[] = [
  memoryUploadHandler,
  temporaryFileUploadHandler,
];

/**
 * Parses a `multipart/form-data` request body into fields and files.
 */
export class MultiPartParser {
  /** @internal */ declare private readonly _boundary: string;
  /** @internal */ declare private readonly _source: ChunkSource;
  /** @internal */ declare private readonly _limits: ParserLimits;
  /** @internal */ declare private readonly _handlerFactories: readonly UploadHandlerFactory[];
  /** @internal */ declare private readonly _contentLength: number | undefined;
  /** @internal */ declare private readonly _log: Logger;
  /** @internal */ declare private _used: boolean;

  /**
   * @param contentType the request's Content-Type header
   * @throws {ParseError} INVALID_CONTENT_TYPE if the content type is not multipart, or does
   * not have a valid boundary
   */
  constructor(
    contentType: string | undefined,
    input: ChunkInput | ChunkSource,
    {
      uploadHandlers = [...DEFAULT_UPLOAD_HANDLERS],
      contentLength,
      log = NO_LOG,
      ...options
    }: MultiPartParserOptions = {},
  ) {
    this._boundary = getMultipartBoundary(contentType);
    if (contentLength !== undefined && (!Number.isInteger(contentLength) || contentLength < 0)) {
      throw new ParseError('INVALID_REQUEST', 'invalid content-length');
    }
    this._limits = makeParserLimits(options);
    this._handlerFactories = uploadHandlers;
    this._contentLength = contentLength;
    this._log = log;
    const source = makeChunkSource(input);
    this._source = contentLength === undefined ? source : limitChunkSource(source, contentLength);
    this._used = false;
  }

  /**
   * Reads the whole body. On failure, any stored files are deleted before the returned
   * promise rejects.
   *
   * @throws {ParseError}
   */
  async parse(): Promise<ParseResult> {
    if (this._used) {
      throw new Error('parse can only be called once');
    }
    this._used = true;

    const limits = this._limits;
    const log = this._log;
    const storage = makeTempFileStorage(limits.tempDir);
    const fields = new MultiValueMap<string>();
    const files = new MultiValueMap<UploadedFile>();
    const release = async () => {
      const errors = new ErrorAccumulator();
      await errors.runAll([...files.values().map((file) => () => file.release()), storage.release]);
      errors.throwIfError();
    };
    const result: ParseResult = { fields, files, stopped: false, release };

    if (this._contentLength === 0) {
      return result;
    }

    const context = { limits, storage, log };
    const pipeline = new UploadPipeline(this._handlerFactories.map((factory) => factory(context)));
    const readSize = pipeline.chunkSize(limits.chunkSize);
    const stream = new LazyStream(this._source, readSize);
    const scanner = new BoundaryScanner(stream, this._boundary, limits.lineLengthLimit);
    const totals = { parts: 0, fieldsMemory: 0 };

    try {
      while (await scanner.nextPart(readSize)) {
        const header = await scanner.readHeaders(limits);
        if (header.type === 'skip') {
          if (limits.strict) {
            throw header.error;
          }
          log(1, `skipping part: ${header.error.body}`);
          await scanner.skipPart(readSize);
          continue;
        }

        const part = header.descriptor;
        if (++totals.parts > limits.maxFieldCount) {
          throw new ParseError('TOO_MANY_FIELDS', 'too many fields');
        }
        if (part.filename === undefined) {
          const value = await this._readField(scanner, part, readSize, totals);
          fields.append(part.name, value);
          log(2, `received field ${JSON.stringify(part.name)}`);
        } else if (!part.filename) {
          // an empty file input is submitted as a part with no filename
          log(2, `skipping empty file input ${JSON.stringify(part.name)}`);
          await scanner.skipPart(readSize);
        } else {
          const file = await this._readFile(scanner, part, part.filename, pipeline, readSize);
          if (file === 'stopped') {
            log(1, `upload stopped by handler at ${JSON.stringify(part.name)}`);
            result.stopped = true;
            break;
          }
          if (file) {
            files.append(part.name, file);
            log(2, `received file ${JSON.stringify(part.name)}: ${JSON.stringify(file.filename)}`);
          }
        }
      }
      if (result.stopped) {
        await stream.drain();
      } else {
        await scanner.finish();
      }
      await pipeline.uploadComplete();
      return result;
    } catch (error: unknown) {
      const cleanup = new ErrorAccumulator();
      await cleanup.runAll([() => pipeline.abort(error), release]);
      if (cleanup.hasError) {
        log(1, `failed to clean up after error: ${errorMessage(cleanup.error)}`);
      }
      throw error;
    }
  }

  /** @internal */
  private async _readField(
    scanner: BoundaryScanner,
    part: PartDescriptor,
    readSize: number,
    totals: { fieldsMemory: number },
  ) {
    const limits = this._limits;
    const overhead = Buffer.byteLength(part.name, 'utf-8') + 2;
    const chunks: Buffer[] = [];
    let size = 0;
    while (true) {
      const chunk = await scanner.readBody(readSize);
      if (!chunk) {
        break;
      }
      size += chunk.byteLength;
      if (size > limits.maxFieldSize) {
        throw new ParseError('FIELD_TOO_LARGE', `value for ${JSON.stringify(part.name)} too long`);
      }
      if (totals.fieldsMemory + overhead + size > limits.maxFieldsMemorySize) {
        throw new ParseError('DATA_TOO_BIG', 'form data too large');
      }
      chunks.push(chunk);
    }
    totals.fieldsMemory += overhead + size;

    let raw: Buffer = Buffer.concat(chunks, size);
    if (part.transferEncoding === 'base64') {
      raw = decodeBase64(raw) ?? raw;
    }
    return decodeText(raw, [part.charset, limits.defaultCharset]);
  }

  /** @internal */
  private async _readFile(
    scanner: BoundaryScanner,
    part: PartDescriptor,
    filename: string,
    pipeline: UploadPipeline,
    readSize: number,
  ): Promise<UploadedFile | 'stopped' | undefined> {
    const info: FileInfo = {
      fieldName: part.name,
      filename,
      contentType: part.contentType,
      charset: part.charset,
      contentTypeExtra: part.contentTypeExtra,
      contentLength: part.contentLength,
    };
    await pipeline.begin(info);

    const maxFileSize = this._limits.maxFileSize;
    const body: AsyncIterable<Buffer> = {
      [Symbol.asyncIterator]: () =>
        readFileBody(scanner, readSize, part.transferEncoding === 'base64', (size) => {
          if (size > maxFileSize) {
            throw new ParseError(
              'FILE_TOO_LARGE',
              `uploaded file for ${JSON.stringify(part.name)}: ${JSON.stringify(filename)} too large`,
            );
          }
        }),
    };

    const rawFile = await pipeline.handleRawData(info, body);
    if (rawFile) {
      await scanner.skipPart(readSize);
      return rawFile;
    }

    for await (const chunk of body) {
      const instruction = await pipeline.write(chunk);
      if (instruction === SKIP_FILE) {
        this._log(1, `upload of ${JSON.stringify(filename)} skipped by handler`);
        await pipeline.abort(SKIP_FILE);
        await scanner.skipPart(readSize);
        return undefined;
      }
      if (instruction === STOP_UPLOAD) {
        await pipeline.abort(STOP_UPLOAD);
        return 'stopped';
      }
    }
    return pipeline.complete();
  }
}

async function* readFileBody(
  scanner: BoundaryScanner,
  readSize: number,
  base64: boolean,
  checkSize: (size: number) => void,
): AsyncGenerator<Buffer, void, undefined> {
  const decoder = base64 ? new Base64ChunkDecoder() : null;
  let size = 0;
  const decode = (fn: () => Buffer) => {
    try {
      return fn();
    } catch (error: unknown) {
      if (error instanceof InvalidBase64Error) {
        throw new ParseError('MALFORMED_PART', 'invalid base64 file content', { cause: error });
      }
      throw error;
    }
  };

  while (true) {
    const chunk = await scanner.readBody(readSize);
    if (!chunk) {
      break;
    }
    const data = decoder ? decode(() => decoder.decode(chunk)) : chunk;
    if (data.byteLength) {
      size += data.byteLength;
      checkSize(size);
      yield data;
    }
  }
  if (decoder) {
    const tail = decode(() => decoder.end());
    if (tail.byteLength) {
      size += tail.byteLength;
      checkSize(size);
      yield tail;
    }
  }
}

const BOUNDARY = /^[0-9A-Za-z'()+_,\-./:=? ]{0,69}[0-9A-Za-z'()+_,\-./:=?]$/;

/**
 * @throws {ParseError} INVALID_CONTENT_TYPE if the content type is not multipart, or does
 * not have a valid boundary
 */
export function getMultipartBoundary(contentType: string | undefined): string {
  const parsed = parseContentType(contentType);
  if (!parsed?.mime.startsWith('multipart/')) {
    throw new ParseError('INVALID_CONTENT_TYPE', 'invalid content-type', { statusCode: 415 });
  }
  const boundary = parsed.params.get('boundary');
  if (!boundary) {
    throw new ParseError('INVALID_CONTENT_TYPE', 'multipart boundary not found');
  }
  if (!BOUNDARY.test(boundary)) {
    throw new ParseError('INVALID_CONTENT_TYPE', 'invalid multipart boundary');
  }
  return boundary;
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

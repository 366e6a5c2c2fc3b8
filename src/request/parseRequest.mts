import { makeParserLimits } from '../core/ParserLimits.mts';
import { makeChunkSource, type ChunkInput, type ChunkSource } from '../util/ChunkSource.mts';
import { LazyStream } from '../util/LazyStream.mts';
import { HttpRequest, type HttpRequestOptions } from './HttpRequest.mts';
import { readRequestHead } from './requestHead.mts';

export interface ParseRequestOptions extends HttpRequestOptions {
  /**
   * Maximum size of the request line and headers.
   * @default 16384 (matching Node.js's default)
   */
  maxRequestHeaderSize?: number | undefined;
}

const DEFAULT_MAX_REQUEST_HEADER_SIZE = 16 * 1024;

/**
 * Reads the head of a raw HTTP request. The body is not read until it is requested
 * through {@link HttpRequest.parseBody} or {@link HttpRequest.readBody}.
 *
 * @throws {ParseError} if the request head is invalid
 * @throws {RangeError} if the options are invalid
 */
export async function parseRequest(
  input: ChunkInput | ChunkSource,
  {
    maxRequestHeaderSize = DEFAULT_MAX_REQUEST_HEADER_SIZE,
    ...options
  }: ParseRequestOptions = {},
): Promise<HttpRequest> {
  if (!Number.isInteger(maxRequestHeaderSize) || maxRequestHeaderSize < 80) {
    throw new RangeError('maxRequestHeaderSize must be an integer of at least 80');
  }
  const limits = makeParserLimits(options);
  const stream = new LazyStream(makeChunkSource(input), limits.chunkSize);
  const head = await readRequestHead(stream, {
    lineLengthLimit: limits.lineLengthLimit,
    maxRequestHeaderSize,
  });
  return new HttpRequest(head, stream, limits, options);
}

export { HTTPError, type HTTPErrorOptions } from './core/HTTPError.mts';
export { ParseError, type ParseErrorCode, type ParseErrorOptions } from './core/ParseError.mts';
export {
  makeParserLimits,
  DEFAULT_LIMITS,
  type ParserLimits,
  type ParserOptions,
} from './core/ParserLimits.mts';

export {
  parseRequest,
  type ParseRequestOptions,
} from './request/parseRequest.mts';
export { HttpRequest, type HttpRequestOptions } from './request/HttpRequest.mts';
export type { RequestHead } from './request/requestHead.mts';
export { parseRequestTarget, type RequestTarget } from './request/target.mts';
export { parseURLEncoded, type URLEncodedLimits } from './request/urlencoded.mts';
export { parseCookies } from './request/cookies.mts';

export {
  MultiPartParser,
  getMultipartBoundary,
  DEFAULT_UPLOAD_HANDLERS,
  type MultiPartParserOptions,
  type ParseResult,
} from './multipart/MultiPartParser.mts';
export {
  parseContentType,
  parseDisposition,
  type ContentType,
  type Disposition,
  type HeaderParams,
} from './multipart/contentType.mts';
export type { PartDescriptor } from './multipart/types.mts';

export {
  CLAIMED,
  SKIP_FILE,
  STOP_UPLOAD,
  UploadInstruction,
  type ChunkResult,
  type FileInfo,
  type UploadHandler,
  type UploadHandlerContext,
  type UploadHandlerFactory,
} from './upload/UploadHandler.mts';
export {
  InMemoryUploadedFile,
  TemporaryUploadedFile,
  type UploadedFile,
} from './upload/UploadedFile.mts';
export { MemoryUploadHandler, memoryUploadHandler } from './upload/MemoryUploadHandler.mts';
export {
  TemporaryFileUploadHandler,
  temporaryFileUploadHandler,
} from './upload/TemporaryFileUploadHandler.mts';
export type { TempFileStorage } from './upload/tempFileStorage.mts';

export { registerCharset, decodeText, type Decoder } from './util/charset.mts';
export { MultiValueMap } from './util/MultiValueMap.mts';
export type { ChunkInput, ChunkSource } from './util/ChunkSource.mts';
export { makeLogger, logLevels, type Logger, type LogLevel } from './util/log.mts';

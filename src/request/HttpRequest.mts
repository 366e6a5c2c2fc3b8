import { ParseError } from '../core/ParseError.mts';
import type { ParserLimits } from '../core/ParserLimits.mts';
import { parseContentType, type ContentType } from '../multipart/contentType.mts';
import { MultiPartParser, type MultiPartParserOptions } from '../multipart/MultiPartParser.mts';
import type { UploadedFile } from '../upload/UploadedFile.mts';
import { decodeText } from '../util/charset.mts';
import { limitChunkSource, makeChunkSource, readAll, type ChunkSource } from '../util/ChunkSource.mts';
import { MultiValueMap } from '../util/MultiValueMap.mts';
import { parseCookies } from './cookies.mts';
import type { RequestHead } from './requestHead.mts';
import { DEFAULT_PORTS, parseRequestTarget, splitHostPort } from './target.mts';
import { parseURLEncoded } from './urlencoded.mts';

export interface HttpRequestOptions extends Omit<MultiPartParserOptions, 'contentLength'> {
  /**
   * The scheme to assume when the request-target does not include one (a raw request does
   * not record whether it arrived over TLS).
   * @default 'http'
   */
  scheme?: string | undefined;
}

/**
 * A parsed request head, with lazy access to the body.
 */
export class HttpRequest {
  declare public readonly method: string;
  /** the path exactly as sent (not percent-decoded) */
  declare public readonly path: string;
  /** the query string without its leading `?` */
  declare public readonly queryString: string;
  declare public readonly protocol: string;
  declare public readonly scheme: string;
  declare public readonly host: string;
  /** the explicit port, or the default for the scheme */
  declare public readonly port: number | undefined;
  /** keyed by lowercase header name */
  declare public readonly headers: MultiValueMap<string>;
  /** the lowercase mime type from the Content-Type header */
  declare public readonly contentType: string | undefined;
  declare public readonly contentLength: number | undefined;

  /** @internal */ declare private readonly _stream: ChunkSource;
  /** @internal */ declare private readonly _options: HttpRequestOptions;
  /** @internal */ declare private readonly _limits: ParserLimits;
  /** @internal */ declare private readonly _contentTypeParams: ContentType['params'];
  /** @internal */ declare private _query: MultiValueMap<string> | null;
  /** @internal */ declare private _cookies: Map<string, string> | null;
  /** @internal */ declare private _post: MultiValueMap<string>;
  /** @internal */ declare private _files: MultiValueMap<UploadedFile>;
  /** @internal */ declare private _stopped: boolean;
  /** @internal */ declare private _releaseFiles: () => Promise<void>;
  /** @internal */ declare private _bodyParse: Promise<void> | null;
  /** @internal */ declare private _rawBody: Promise<Buffer> | null;
  /** @internal */ declare private _streamTaken: boolean;

  /**
   * @param body the bytes following the request head
   * @throws {ParseError} INVALID_REQUEST if the host or content-length are missing or
   * invalid
   */
  constructor(
    head: RequestHead,
    body: ChunkSource,
    limits: ParserLimits,
    { scheme = 'http', ...options }: HttpRequestOptions = {},
  ) {
    const target = parseRequestTarget(head.target, head.method);
    const headers = head.headers;
    this.method = head.method;
    this.path = target.path;
    this.queryString = target.queryString;
    this.protocol = head.protocol;
    this.scheme = target.scheme ?? scheme.toLowerCase();
    this.headers = headers;

    const rawHost = target.authority ?? getSingle(headers, 'host');
    if (rawHost === undefined) {
      throw new ParseError('INVALID_REQUEST', 'missing host header');
    }
    const host = splitHostPort(rawHost);
    if (!host) {
      throw new ParseError('INVALID_REQUEST', 'invalid host');
    }
    this.host = host.host;
    this.port = host.port ?? DEFAULT_PORTS.get(this.scheme);

    const contentType = parseContentType(headers.get('content-type'));
    this.contentType = contentType?.mime;
    this._contentTypeParams = contentType?.params ?? new Map();
    this.contentLength = readContentLength(headers.getAll('content-length'));

    this._stream = body;
    this._options = options;
    this._limits = limits;
    this._query = null;
    this._cookies = null;
    this._post = new MultiValueMap();
    this._files = new MultiValueMap();
    this._stopped = false;
    this._releaseFiles = async () => {};
    this._bodyParse = null;
    this._rawBody = null;
    this._streamTaken = false;
  }

  /**
   * The parsed query string.
   *
   * @throws {ParseError} TOO_MANY_FIELDS if there are more than `maxFieldCount` parameters
   */
  get query() {
    if (!this._query) {
      this._query = parseURLEncoded(this.queryString, this._limits);
    }
    return this._query;
  }

  get cookies(): ReadonlyMap<string, string> {
    if (!this._cookies) {
      this._cookies = parseCookies(this.headers.getAll('cookie'));
    }
    return this._cookies;
  }

  /** form fields from the body (empty until `parseBody` has completed) */
  get post() {
    return this._post;
  }

  /** uploaded files from the body (empty until `parseBody` has completed) */
  get files() {
    return this._files;
  }

  /** true if an upload handler stopped the upload before the end of the body */
  get stopped() {
    return this._stopped;
  }

  /** the path followed by `?` and the query string, if there is one */
  getFullPath() {
    return this.queryString ? `${this.path}?${this.queryString}` : this.path;
  }

  isSecure() {
    return this.scheme === 'https' || this.scheme === 'wss';
  }

  isAjax() {
    return this.headers.get('x-requested-with') === 'XMLHttpRequest';
  }

  /**
   * Parses `multipart/form-data` and `application/x-www-form-urlencoded` bodies into
   * `post` and `files`. Other content types leave both empty. Only the first call does
   * any work; later calls return the same result.
   *
   * @throws {ParseError}
   */
  parseBody(): Promise<void> {
    if (!this._bodyParse) {
      this._bodyParse = this._parseBody();
    }
    return this._bodyParse;
  }

  /**
   * Reads the whole body (bounded by `maxFieldsMemorySize`).
   *
   * @throws {ParseError} DATA_TOO_BIG if the body is too large
   */
  readBody(): Promise<Buffer> {
    if (!this._rawBody) {
      this._rawBody = this._readRawBody();
    }
    return this._rawBody;
  }

  /** deletes any uploaded files */
  release() {
    return this._releaseFiles();
  }

  /** @internal */
  private async _parseBody() {
    const contentType = this.contentType;
    if (contentType === 'multipart/form-data') {
      const source = this._rawBody ? makeChunkSource(await this._rawBody) : this._takeStream();
      const result = await new MultiPartParser(this.headers.get('content-type'), source, {
        ...this._options,
        ...this._limits,
        contentLength: this._rawBody ? undefined : this.contentLength,
      }).parse();
      this._post = result.fields;
      this._files = result.files;
      this._stopped = result.stopped;
      this._releaseFiles = result.release;
    } else if (contentType === 'application/x-www-form-urlencoded') {
      const limits = this._limits;
      const data = await this.readBody();
      const text = decodeText(data, [this._contentTypeParams.get('charset'), limits.defaultCharset]);
      this._post = parseURLEncoded(text, limits);
    }
  }

  /** @internal */
  private async _readRawBody() {
    const maxSize = this._limits.maxFieldsMemorySize;
    if (this.contentLength !== undefined && this.contentLength > maxSize) {
      throw new ParseError('DATA_TOO_BIG', 'request body too large');
    }
    const data = await readAll(limitChunkSource(this._takeStream(), maxSize + 1));
    if (data.byteLength > maxSize) {
      throw new ParseError('DATA_TOO_BIG', 'request body too large');
    }
    return data;
  }

  /** @internal */
  private _takeStream() {
    if (this._streamTaken) {
      throw new Error('request body has already been consumed');
    }
    this._streamTaken = true;
    const transferEncoding = this.headers.get('transfer-encoding');
    if (transferEncoding !== undefined && transferEncoding.toLowerCase() !== 'identity') {
      throw new ParseError('INVALID_REQUEST', 'unsupported transfer-encoding');
    }
    const contentLength = this.contentLength;
    return contentLength === undefined ? this._stream : limitChunkSource(this._stream, contentLength);
  }
}

function getSingle(headers: MultiValueMap<string>, name: string) {
  const values = headers.getAll(name);
  if (values.length > 1) {
    throw new ParseError('INVALID_REQUEST', `multiple ${name} headers`);
  }
  return values[0];
}

function readContentLength(values: readonly string[]) {
  if (!values.length) {
    return undefined;
  }
  // repeated headers (or comma separated values) must all agree
  const all = new Set(values.flatMap((value) => value.split(',').map((v) => v.trim())));
  const [value] = all;
  if (all.size !== 1 || value === undefined || !/^\d+$/.test(value)) {
    throw new ParseError('INVALID_REQUEST', 'invalid content-length');
  }
  return Number(value);
}

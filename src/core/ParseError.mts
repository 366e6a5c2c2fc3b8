import { HTTPError } from './HTTPError.mts';

export type ParseErrorCode =
  | 'LINE_TOO_LONG'
  | 'MALFORMED_PART'
  | 'FIELD_TOO_LARGE'
  | 'FILE_TOO_LARGE'
  | 'DATA_TOO_BIG'
  | 'TOO_MANY_FIELDS'
  | 'BOUNDARY_NOT_FOUND'
  | 'STORAGE_FAILURE'
  | 'INVALID_CONTENT_TYPE'
  | 'INVALID_REQUEST';

const STATUS_CODES: Record<ParseErrorCode, number> = {
  LINE_TOO_LONG: 400,
  MALFORMED_PART: 400,
  FIELD_TOO_LARGE: 413,
  FILE_TOO_LARGE: 413,
  DATA_TOO_BIG: 413,
  TOO_MANY_FIELDS: 413,
  BOUNDARY_NOT_FOUND: 400,
  STORAGE_FAILURE: 500,
  INVALID_CONTENT_TYPE: 400,
  INVALID_REQUEST: 400,
};

export interface ParseErrorOptions {
  statusCode?: number | undefined;
  message?: string | undefined;
  cause?: unknown;
}

/**
 * Raised when a request cannot be parsed. The `body` is safe to send to the client;
 * internal details (e.g. file system errors) are only available via `message` and `cause`.
 */
export class ParseError extends HTTPError {
  declare public readonly code: ParseErrorCode;

  constructor(
    code: ParseErrorCode,
    body: string,
    { statusCode, ...options }: ParseErrorOptions = {},
  ) {
    super(statusCode ?? STATUS_CODES[code], { body, ...options });
    this.code = code;
  }
}

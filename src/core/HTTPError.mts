import { STATUS_CODES } from 'node:http';

export interface HTTPErrorOptions {
  message?: string | undefined;
  statusMessage?: string | undefined;
  body?: string | undefined;
  cause?: unknown;
}

/**
 * An error which maps to a HTTP status code, so that callers serving a request can
 * respond without inspecting the error further.
 */
export class HTTPError extends Error {
  declare public readonly statusCode: number;
  declare public readonly statusMessage: string;
  declare public readonly body: string;

  constructor(
    statusCode: number,
    { message, statusMessage, body, ...options }: HTTPErrorOptions = {},
  ) {
    super(message ?? body, options);
    this.statusCode = statusCode | 0;
    this.statusMessage = statusMessage ?? STATUS_CODES[this.statusCode] ?? '-';
    this.body = body ?? '';
    this.name = `HTTPError(${this.statusCode} ${this.statusMessage})`;
  }
}

import { ParseError } from '../core/ParseError.mts';
import type { LazyStream } from '../util/LazyStream.mts';
import { MultiValueMap } from '../util/MultiValueMap.mts';

export interface RequestHead {
  method: string;
  /** the request-target exactly as sent */
  target: string;
  /** e.g. `HTTP/1.1` */
  protocol: string;
  /** keyed by lowercase header name */
  headers: MultiValueMap<string>;
}

export interface RequestHeadOptions {
  /** maximum length of any line in the head (including its line ending) */
  lineLengthLimit: number;
  /** maximum size of the whole head (request line, headers and the blank line) */
  maxRequestHeaderSize: number;
}

// https://datatracker.ietf.org/doc/html/rfc9112#section-3
const REQUEST_LINE = /^([!#$%&'*+\-.^_`|~0-9A-Za-z]+) (\S+) (HTTP\/\d\.\d)$/;
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Reads the request line and headers, leaving the stream positioned at the start of the
 * body.
 *
 * @throws {ParseError} INVALID_REQUEST if the head is malformed or incomplete, or
 * LINE_TOO_LONG (with status 431) if it exceeds the configured limits
 */
export async function readRequestHead(
  stream: LazyStream,
  { lineLengthLimit, maxRequestHeaderSize }: RequestHeadOptions,
): Promise<RequestHead> {
  let remaining = maxRequestHeaderSize;
  const nextLine = async () => {
    let line: Buffer;
    try {
      line = await stream.readLine(Math.min(lineLengthLimit, remaining));
    } catch (error: unknown) {
      if (error instanceof ParseError && error.code === 'LINE_TOO_LONG') {
        throw new ParseError(
          'LINE_TOO_LONG',
          remaining < lineLengthLimit ? 'request headers too large' : 'request header line too long',
          { statusCode: 431 },
        );
      }
      throw error;
    }
    remaining -= line.byteLength;
    if (!line.byteLength) {
      return null;
    }
    if (line[line.byteLength - 1] !== 0x0a) {
      throw new ParseError('INVALID_REQUEST', 'incomplete request headers');
    }
    return stripLineEnding(line).toString('latin1');
  };

  let requestLine = await nextLine();
  // clients may send empty lines before the request line
  while (requestLine === '') {
    requestLine = await nextLine();
  }
  if (requestLine === null) {
    throw new ParseError('INVALID_REQUEST', 'empty request');
  }
  const parts = REQUEST_LINE.exec(requestLine);
  if (!parts) {
    throw new ParseError('INVALID_REQUEST', 'invalid request line');
  }

  const headers = new MultiValueMap<string>();
  const pending: [string, string][] = [];
  while (true) {
    const line = await nextLine();
    if (line === null) {
      throw new ParseError('INVALID_REQUEST', 'incomplete request headers');
    }
    if (!line) {
      break;
    }
    if (line[0] === ' ' || line[0] === '\t') {
      // obsolete line folding
      const latest = pending[pending.length - 1];
      if (!latest) {
        throw new ParseError('INVALID_REQUEST', 'invalid header folding');
      }
      latest[1] += ' ' + line.trim();
      continue;
    }
    const sep = line.indexOf(':');
    const name = line.substring(0, sep);
    if (sep === -1 || !HEADER_NAME.test(name)) {
      throw new ParseError('INVALID_REQUEST', `invalid header: ${JSON.stringify(line)}`);
    }
    pending.push([name.toLowerCase(), line.substring(sep + 1).trim()]);
  }
  for (const [name, value] of pending) {
    headers.append(name, value);
  }

  return { method: parts[1]!, target: parts[2]!, protocol: parts[3]!, headers };
}

function stripLineEnding(line: Buffer) {
  let end = line.byteLength - 1;
  if (line[end - 1] === 0x0d) {
    --end;
  }
  return line.subarray(0, end);
}

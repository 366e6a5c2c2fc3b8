import { ParseError } from '../core/ParseError.mts';
import type { LazyStream } from '../util/LazyStream.mts';
import { getDispositionParam, parseContentType, parseDisposition, TOKEN } from './contentType.mts';
import type { PartDescriptor, PartHeaderResult } from './types.mts';

export interface PartHeaderOptions {
  lineLengthLimit: number;
  maxHeaderSize: number;
  paramCharset: string;
  preservePath: boolean;
}

type KnownHeader =
  | 'content-disposition'
  | 'content-type'
  | 'content-transfer-encoding'
  | 'content-length';

interface RawHeader {
  name: string;
  value: Buffer;
}

const KNOWN_HEADERS = new Set<string>([
  'content-disposition',
  'content-type',
  'content-transfer-encoding',
  'content-length',
]);

const isKnownHeader = (name: string): name is KnownHeader => KNOWN_HEADERS.has(name);

/**
 * Reads a part's header block (up to and including the blank line which ends it).
 *
 * Problems with the headers are returned as a `skip` result, leaving the stream
 * positioned somewhere inside the part; the caller should skip to the next boundary.
 *
 * @param boundaryLine `--` followed by the boundary. If a header line starts with this,
 * it is returned to the stream so that the next part can be found.
 * @throws {ParseError} BOUNDARY_NOT_FOUND if the input ends before the headers do
 */
export async function readPartHeaders(
  stream: LazyStream,
  boundaryLine: Buffer,
  { lineLengthLimit, maxHeaderSize, paramCharset, preservePath }: PartHeaderOptions,
): Promise<PartHeaderResult> {
  const headers = new Map<KnownHeader, Buffer>();
  let latest: RawHeader | null = null;
  let malformed: ParseError | null = null;
  let remaining = maxHeaderSize;

  const store = (header: RawHeader | null) => {
    const name = header?.name ?? '';
    if (header && isKnownHeader(name) && !headers.has(name)) {
      headers.set(name, trimWhitespace(header.value));
    }
  };

  while (true) {
    let line: Buffer;
    try {
      line = await stream.readLine(Math.min(lineLengthLimit, remaining));
    } catch (error: unknown) {
      if (error instanceof ParseError && error.code === 'LINE_TOO_LONG') {
        return skip(
          'LINE_TOO_LONG',
          remaining < lineLengthLimit ? 'part headers too large' : 'part header line too long',
        );
      }
      throw error;
    }
    if (!line.byteLength || line[line.byteLength - 1] !== 0x0a) {
      throw new ParseError('BOUNDARY_NOT_FOUND', 'unexpected end of form');
    }
    remaining -= line.byteLength;
    const content = stripLineEnding(line);
    if (!content.byteLength) {
      break;
    }
    if (content.subarray(0, boundaryLine.byteLength).equals(boundaryLine)) {
      // a part with no blank line after its headers; let the caller find the boundary
      stream.unget(line);
      return skip('MALFORMED_PART', 'missing blank line after part headers');
    }
    if (malformed) {
      continue; // keep consuming until the end of the block
    }
    const first = content[0];
    if (first === 0x20 || first === 0x09) {
      if (!latest) {
        malformed = new ParseError('MALFORMED_PART', 'malformed part header');
        continue;
      }
      // folded (continuation) line
      latest.value = Buffer.concat([latest.value, SPACE, trimWhitespace(content)]);
      continue;
    }
    store(latest);
    latest = null;
    const sep = content.indexOf(0x3a /* ':' */);
    if (sep <= 0 || !isToken(content.subarray(0, sep))) {
      malformed = new ParseError('MALFORMED_PART', 'malformed part header');
      continue;
    }
    latest = {
      name: content.toString('latin1', 0, sep).toLowerCase(),
      value: content.subarray(sep + 1),
    };
  }
  store(latest);
  if (malformed) {
    return { type: 'skip', error: malformed };
  }

  const rawDisposition = headers.get('content-disposition');
  if (!rawDisposition) {
    return skip('MALFORMED_PART', 'missing content-disposition');
  }
  const disposition = parseDisposition(rawDisposition, paramCharset);
  if (!disposition) {
    return skip('MALFORMED_PART', 'malformed content-disposition');
  }
  if (disposition.type !== 'form-data') {
    return skip('MALFORMED_PART', `unsupported content-disposition: ${disposition.type}`);
  }
  const name = getDispositionParam(disposition, 'name');
  if (name === undefined) {
    return skip('MALFORMED_PART', 'missing field name');
  }
  let filename = getDispositionParam(disposition, 'filename');
  if (filename !== undefined && !preservePath) {
    filename = osIndependentBasename(filename);
  }
  const contentType = parseContentType(headers.get('content-type')?.toString('latin1'));
  const transferEncoding = headers.get('content-transfer-encoding')?.toString('latin1');
  const contentLength = headers.get('content-length')?.toString('latin1');

  const descriptor: PartDescriptor = {
    dispositionType: disposition.type,
    name,
    filename,
    contentType: contentType?.mime,
    charset: contentType?.params.get('charset'),
    contentTypeExtra: contentType?.params ?? new Map<string, string>(),
    transferEncoding: transferEncoding?.toLowerCase(),
    contentLength:
      contentLength && /^[0-9]+$/.test(contentLength) ? Number(contentLength) : undefined,
  };
  return { type: 'part', descriptor: Object.freeze(descriptor) };
}

const skip = (code: 'MALFORMED_PART' | 'LINE_TOO_LONG', body: string): PartHeaderResult => ({
  type: 'skip',
  error: new ParseError(code, body),
});

export function osIndependentBasename(path: string) {
  for (let i = path.length; i-- > 0; ) {
    if (path[i] === '/' || path[i] === '\\') {
      path = path.slice(i + 1);
      break;
    }
  }
  return path === '..' || path === '.' ? '' : path;
}

function stripLineEnding(line: Buffer) {
  let end = line.byteLength;
  if (line[end - 1] === 0x0a) {
    --end;
    if (line[end - 1] === 0x0d) {
      --end;
    }
  }
  return line.subarray(0, end);
}

function trimWhitespace(value: Buffer) {
  let start = 0;
  let end = value.byteLength;
  while (start < end && (value[start] === 0x20 || value[start] === 0x09)) {
    ++start;
  }
  while (end > start && (value[end - 1] === 0x20 || value[end - 1] === 0x09)) {
    --end;
  }
  return value.subarray(start, end);
}

function isToken(value: Buffer) {
  for (const code of value) {
    if (!TOKEN[code]) {
      return false;
    }
  }
  return true;
}

const SPACE = /*@__PURE__*/ Buffer.from(' ');

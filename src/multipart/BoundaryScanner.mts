import { ParseError } from '../core/ParseError.mts';
import { StreamSearch } from '../forks/streamsearch/sbmh.mts';
import type { LazyStream } from '../util/LazyStream.mts';
import { readPartHeaders, type PartHeaderOptions } from './partHeaders.mts';
import type { PartHeaderResult } from './types.mts';

export const SEEKING_FIRST_BOUNDARY = 0;
export const IN_PART_HEADERS = 1;
export const IN_PART_BODY = 2;
export const FINAL_BOUNDARY_SEEN = 3;
export const DONE = 4;

export type ScannerState =
  | typeof SEEKING_FIRST_BOUNDARY
  | typeof IN_PART_HEADERS
  | typeof IN_PART_BODY
  | typeof FINAL_BOUNDARY_SEEN
  | typeof DONE;

const CR = 0x0d;
const LF = 0x0a;
const DASH = 0x2d;
const SPACE = 0x20;
const TAB = 0x09;

/**
 * Splits a multipart body into parts. Delimiters are `\r\n--boundary` (a bare `\n` is
 * also accepted), and the body must end with `--boundary--`.
 */
export class BoundaryScanner {
  /** @internal */ declare private readonly _stream: LazyStream;
  /** @internal */ declare private readonly _boundaryLine: Buffer;
  /** @internal */ declare private readonly _search: StreamSearch;
  /** @internal */ declare private readonly _lineLengthLimit: number;
  /** @internal */ declare private _state: ScannerState;
  /** @internal */ declare private _output: Buffer[];
  /** @internal */ declare private _pendingCR: boolean;
  /** @internal */ declare private _leadingNewline: boolean;
  /** @internal */ declare private _paddingError: ParseError | null;

  constructor(stream: LazyStream, boundary: string, lineLengthLimit: number) {
    this._stream = stream;
    this._boundaryLine = Buffer.from(`--${boundary}`, 'latin1');
    const needle = Buffer.from(`\n--${boundary}`, 'latin1');
    this._search = new StreamSearch(needle, (data, start, end, isSafe) => {
      if (this._state === IN_PART_BODY) {
        this._content(data, start, end, isSafe);
      }
    });
    this._lineLengthLimit = lineLengthLimit;
    this._state = SEEKING_FIRST_BOUNDARY;
    this._output = [];
    this._pendingCR = false;
    this._leadingNewline = false;
    this._paddingError = null;

    // allow matching the boundary immediately at the start of the content
    this._search.push(NEWLINE);
  }

  get state() {
    return this._state;
  }

  /**
   * Advances to the headers of the next part, skipping the preamble or anything left in
   * the current part.
   *
   * @returns false if there are no more parts
   * @throws {ParseError} BOUNDARY_NOT_FOUND if the input ends first
   */
  async nextPart(readSize: number): Promise<boolean> {
    while (this._state === SEEKING_FIRST_BOUNDARY || this._state === IN_PART_BODY) {
      await this._scan(readSize);
      this._output.length = 0;
    }
    return this._state === IN_PART_HEADERS;
  }

  /**
   * Reads the headers of the current part. Afterwards the scanner is positioned in the
   * part's body (even if the headers were rejected).
   *
   * A part whose delimiter line was too long is always returned as a `skip` result.
   */
  async readHeaders(options: PartHeaderOptions): Promise<PartHeaderResult> {
    if (this._state !== IN_PART_HEADERS) {
      throw new Error('not at part headers');
    }
    const result = await readPartHeaders(this._stream, this._boundaryLine, options);
    this._state = IN_PART_BODY;
    // an empty body has no line break before its delimiter
    this._leadingNewline = true;
    this._search.push(NEWLINE);
    const paddingError = this._paddingError;
    if (paddingError) {
      this._paddingError = null;
      return { type: 'skip', error: paddingError };
    }
    return result;
  }

  /**
   * Returns the next chunk of the current part's body (at most `readSize` bytes plus any
   * data which was held back while checking for a boundary), or null once the end of the
   * part has been reached.
   *
   * @throws {ParseError} BOUNDARY_NOT_FOUND if the input ends before the part does
   */
  async readBody(readSize: number): Promise<Buffer | null> {
    while (true) {
      const output = this._output;
      if (output.length) {
        this._output = [];
        return output.length === 1 ? output[0]! : Buffer.concat(output);
      }
      if (this._state !== IN_PART_BODY) {
        return null;
      }
      await this._scan(readSize);
    }
  }

  /** discards the rest of the current part */
  async skipPart(readSize: number) {
    while (await this.readBody(readSize)) {
      // discard
    }
  }

  /** discards everything after the final boundary (the epilogue) */
  async finish() {
    if (this._state === FINAL_BOUNDARY_SEEN) {
      await this._stream.drain();
      this._state = DONE;
    }
  }

  /** @internal */
  private async _scan(readSize: number) {
    const stream = this._stream;
    const chunk = await stream.read(readSize);
    if (!chunk.byteLength) {
      this._search.destroy();
      this._output.length = 0;
      throw new ParseError(
        'BOUNDARY_NOT_FOUND',
        this._state === SEEKING_FIRST_BOUNDARY
          ? 'multipart boundary not found'
          : 'unexpected end of form',
      );
    }
    const next = this._search.push(chunk);
    if (next === -1) {
      return;
    }
    stream.unget(chunk.subarray(next));
    const after = await stream.readExact(2);
    const first = after[0];
    const second = after[1];
    if (first === undefined || first === DASH) {
      if (second === undefined || second === DASH) {
        // --boundary-- (or truncated, which is treated leniently as the end)
        this._boundaryFound(FINAL_BOUNDARY_SEEN);
        return;
      }
    } else if (first === CR) {
      if (second === undefined) {
        this._boundaryFound(FINAL_BOUNDARY_SEEN);
        return;
      }
      if (second === LF) {
        this._boundaryFound(IN_PART_HEADERS);
        return;
      }
    } else if (first === LF) {
      stream.unget(after.subarray(1));
      this._boundaryFound(IN_PART_HEADERS);
      return;
    } else if (first === SPACE || first === TAB) {
      // transport padding
      stream.unget(after);
      try {
        await stream.readLine(this._lineLengthLimit);
      } catch (error: unknown) {
        if (!(error instanceof ParseError) || error.code !== 'LINE_TOO_LONG') {
          throw error;
        }
        await this._skipLine(readSize);
        this._paddingError = new ParseError('LINE_TOO_LONG', 'multipart delimiter line too long');
      }
      this._boundaryFound(IN_PART_HEADERS);
      return;
    }

    // the boundary was a prefix of something longer; it is content
    stream.unget(after);
    if (this._state === IN_PART_BODY) {
      this._flushCR();
      const needle = this._search.needle;
      this._output.push(this._leadingNewline ? needle.subarray(1) : needle);
      this._leadingNewline = false;
    }
  }

  /** @internal */
  private async _skipLine(readSize: number) {
    const stream = this._stream;
    while (true) {
      const chunk = await stream.read(readSize);
      if (!chunk.byteLength) {
        return;
      }
      const end = chunk.indexOf(LF);
      if (end !== -1) {
        stream.unget(chunk.subarray(end + 1));
        return;
      }
    }
  }

  /** @internal */
  private _boundaryFound(state: ScannerState) {
    this._pendingCR = false; // the CR was part of the delimiter
    this._leadingNewline = false;
    this._state = state;
  }

  /** @internal */
  private _content(data: Buffer, start: number, end: number, isSafe: boolean) {
    if (end <= start) {
      return;
    }
    if (this._leadingNewline) {
      // the newline pushed in readHeaders is not part of the content
      this._leadingNewline = false;
      if (++start === end) {
        return;
      }
    }
    this._flushCR();
    if (data[end - 1] === CR) {
      // might be part of a delimiter; hold it back until we know
      this._pendingCR = true;
      --end;
      if (end === start) {
        return;
      }
    }
    this._output.push(isSafe ? data.subarray(start, end) : Buffer.from(data.subarray(start, end)));
  }

  /** @internal */
  private _flushCR() {
    if (this._pendingCR) {
      this._output.push(CR_BUFFER);
      this._pendingCR = false;
    }
  }
}

const NEWLINE = /*@__PURE__*/ Buffer.from('\n');
const CR_BUFFER = /*@__PURE__*/ Buffer.from('\r');

import { EMPTY } from './ChunkSource.mts';

const WHITESPACE = /[\t\n\r ]+/g;
const BLOCKS = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const TAIL = /^[A-Za-z0-9+/]{2,3}$/;

export class InvalidBase64Error extends Error {}

/**
 * Incrementally decodes base64 data (as used by `Content-Transfer-Encoding: base64`).
 * Whitespace is ignored, and data is decoded in blocks of 4 characters, so chunks can
 * split the input at any point.
 */
export class Base64ChunkDecoder {
  /** @internal */ declare private _carry: string;
  /** @internal */ declare private _padded: boolean;

  constructor() {
    this._carry = '';
    this._padded = false;
  }

  /**
   * @throws {InvalidBase64Error} if the data is not valid base64
   */
  decode(chunk: Uint8Array): Buffer {
    const text = this._carry + Buffer.from(chunk).toString('latin1').replace(WHITESPACE, '');
    if (!text) {
      return EMPTY;
    }
    if (this._padded) {
      throw new InvalidBase64Error('data after base64 padding');
    }
    const usable = text.length - (text.length % 4);
    const block = text.substring(0, usable);
    this._carry = text.substring(usable);
    if (!BLOCKS.test(block)) {
      throw new InvalidBase64Error('invalid base64 data');
    }
    if (block.endsWith('=')) {
      this._padded = true;
    }
    return block ? Buffer.from(block, 'base64') : EMPTY;
  }

  /**
   * Decodes any remaining data. Unpadded input is accepted.
   *
   * @throws {InvalidBase64Error} if the remaining data is not valid base64
   */
  end(): Buffer {
    const carry = this._carry;
    this._carry = '';
    if (!carry) {
      return EMPTY;
    }
    if (this._padded || !TAIL.test(carry)) {
      throw new InvalidBase64Error('truncated base64 data');
    }
    return Buffer.from(carry, 'base64');
  }
}

/**
 * @returns the decoded data, or `undefined` if it is not valid base64
 */
export function decodeBase64(data: Uint8Array): Buffer | undefined {
  const decoder = new Base64ChunkDecoder();
  try {
    const body = decoder.decode(data);
    const tail = decoder.end();
    return tail.byteLength ? Buffer.concat([body, tail]) : body;
  } catch (error: unknown) {
    if (error instanceof InvalidBase64Error) {
      return undefined;
    }
    throw error;
  }
}

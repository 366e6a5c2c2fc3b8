import { decodeText, tryDecodeText } from '../util/charset.mts';
import { splitFirst } from '../util/splitFirst.mts';

export type HeaderParams = Map<string, string>;

export interface ContentType {
  mime: string;
  params: HeaderParams;
}

export function parseContentType(str: string | undefined): ContentType | null {
  if (!str) {
    return null;
  }
  const [mime, paramsStr] = splitFirst(str, ';');
  const params = new Map<string, string>();
  if (paramsStr?.trim()) {
    const matcher =
      /\s*([!#-'*+\-.0-:>-Z^-z|~]+)=(?:([!#-'*+\-.0-:>-Z^-z|~]+)|"((?:[^\x00-\x08\x0a-\x1f"\\\x7f]|\\.)*)")\s*(;|$)/gy;
    while (matcher.lastIndex !== paramsStr.length) {
      const match = matcher.exec(paramsStr);
      if (!match) {
        return null;
      }
      const key = match[1]!.toLowerCase();
      const value = match[2] ?? match[3]?.replaceAll(/\\(.)/g, '$1') ?? '';
      if (!params.has(key)) {
        params.set(key, value);
      }
    }
  }
  const normalisedMime = mime.trim().toLowerCase();
  if (!/^[!#-'*+\-.0-9A-Z^-z|~]+\/[!#-'*+\-.0-9A-Z^-z|~]+$/i.test(normalisedMime)) {
    return null;
  }
  return { mime: normalisedMime, params };
}

export interface ExtendedParam {
  /** the decoded value, or undefined if it could not be decoded */
  value: string | undefined;
  /** the value as it appeared in the header (still percent-encoded) */
  raw: string;
}

export interface Disposition {
  type: string;
  params: HeaderParams;
  /** RFC 2231 / RFC 5987 values (`name*=charset'lang'value`), keyed without the `*` */
  extended: Map<string, ExtendedParam>;
}

/**
 * Parses a Content-Disposition header value.
 *
 * @param paramCharset the charset used to decode non-extended parameter values
 * @returns the parsed disposition, or null if the value is malformed
 */
export function parseDisposition(buffer: Buffer, paramCharset: string): Disposition | null {
  if (!buffer.byteLength) {
    return null;
  }

  const disposition: Disposition = { type: '', params: new Map(), extended: new Map() };
  let i = 0;
  for (; i < buffer.byteLength; ++i) {
    if (!TOKEN[buffer[i]!]) {
      if (!i || !parseDispositionParams(buffer, i, disposition, paramCharset)) {
        return null;
      }
      break;
    }
  }

  disposition.type = buffer.toString('latin1', 0, i).toLowerCase();
  return disposition;
}

/**
 * Returns the best available value of a disposition parameter: the decoded extended
 * value, then the plain value, then the undecoded extended value.
 */
export function getDispositionParam(disposition: Disposition, name: string): string | undefined {
  const extended = disposition.extended.get(name);
  return extended?.value ?? disposition.params.get(name) ?? extended?.raw;
}

function parseDispositionParams(
  buffer: Buffer,
  i: number,
  { params, extended }: Disposition,
  paramCharset: string,
): boolean {
  const L = buffer.byteLength;
  while (i < L) {
    i = skipWhitespace(buffer, i);

    // Ended on whitespace
    if (i === L) {
      break;
    }

    // Check for malformed parameter
    if (buffer[i++] !== 59 /* ';' */) {
      return false;
    }

    i = skipWhitespace(buffer, i);

    // Allow (and ignore) a trailing ';'
    if (i === L) {
      break;
    }

    const nameStart = i;
    // Parse parameter name
    for (; i < L; ++i) {
      const code = buffer[i]!;
      if (!TOKEN[code]) {
        if (code === 61 /* '=' */) {
          break;
        }
        return false;
      }
    }

    // No value (malformed)
    if (i === L || i === nameStart) {
      return false;
    }

    const name = buffer.toString('latin1', nameStart, i).toLowerCase();
    if (name.endsWith('*')) {
      const charsetStart = ++i;
      // Parse charset name
      for (; i < L; ++i) {
        const code = buffer[i]!;
        if (!CHARSET[code]) {
          if (code !== 39 /* '\'' */) {
            return false;
          }
          break;
        }
      }

      // Incomplete charset (malformed)
      if (i === L) {
        return false;
      }

      const charset = buffer.toString('latin1', charsetStart, i);
      ++i; // Skip over the '\''

      // Parse language name (ignored)
      for (; i < L; ++i) {
        if (buffer[i] === 39 /* '\'' */) {
          break;
        }
      }

      // Incomplete language (malformed)
      if (i === L) {
        return false;
      }

      const valueStart = ++i; // Skip over the '\''

      // Parse value
      const bytes: number[] = [];
      let decodable = true;
      for (; i < L; ++i) {
        const code = buffer[i]!;
        if (EXTENDED_VALUE[code] === 1) {
          bytes.push(code);
          continue;
        }
        if (code !== 37 /* '%' */) {
          break;
        }
        const hexUpper = i + 2 < L ? HEX_VALUES[buffer[i + 1]!]! : 16;
        const hexLower = i + 2 < L ? HEX_VALUES[buffer[i + 2]!]! : 16;
        if (hexUpper === 16 || hexLower === 16) {
          // invalid escape: only the raw value is usable
          decodable = false;
          continue;
        }
        bytes.push((hexUpper << 4) + hexLower);
        i += 2;
      }

      const key = name.substring(0, name.length - 1);
      if (!extended.has(key)) {
        extended.set(key, {
          value:
            decodable && charset && i > valueStart
              ? tryDecodeText(Uint8Array.from(bytes), charset)
              : undefined,
          raw: buffer.toString('latin1', valueStart, i),
        });
      }
      continue;
    }

    // Non-extended value

    ++i; // Skip over '='

    // No value (malformed)
    if (i === L) {
      return false;
    }

    if (buffer[i] === 34 /* '"' */) {
      ++i;
      // Parse quoted value
      const valueBytes: number[] = [];
      let escaping = false;
      for (; i < L; ++i) {
        const code = buffer[i]!;
        if (escaping) {
          valueBytes.push(code);
          escaping = false;
          continue;
        }
        if (code === 92 /* '\\' */) {
          escaping = true;
          continue;
        }
        if (code === 34 /* '"' */) {
          break;
        }
        // Invalid unescaped quoted character (malformed)
        if (!QDTEXT[code]) {
          return false;
        }
        valueBytes.push(code);
      }

      // No end quote (malformed)
      if (i === L) {
        return false;
      }

      ++i; // Skip over double quote
      if (!params.has(name)) {
        params.set(name, decodeText(Uint8Array.from(valueBytes), [paramCharset]));
      }
      continue;
    }

    const valueStart = i;
    // Parse unquoted value
    for (; i < L; ++i) {
      if (!TOKEN[buffer[i]!]) {
        break;
      }
    }
    // No value (malformed)
    if (i === valueStart) {
      return false;
    }
    if (!params.has(name)) {
      params.set(name, decodeText(buffer.subarray(valueStart, i), [paramCharset]));
    }
  }

  return true;
}

function skipWhitespace(buffer: Buffer, i: number) {
  for (; i < buffer.byteLength; ++i) {
    const code = buffer[i];
    if (code !== 32 /* ' ' */ && code !== 9 /* '\t' */) {
      break;
    }
  }
  return i;
}

export const TOKEN = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256);
  values.set(
    // prettier-ignore
    [
         1, 0, 1, 1, 1, 1, 1, 0, 0, 1, 1, 0, 1, 1, 0,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 0, 0, 0, 0, 0,
      0, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 0, 0, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 1, 0, 1,
    ],
    33,
  );
  return values;
})();

const EXTENDED_VALUE = /*@__PURE__*/ (() => {
  const values = new Uint8Array(TOKEN);
  values.set([0, 1, 0, 0, 0, 0], 37);
  return values;
})();

const CHARSET = /*@__PURE__*/ (() => {
  const values = new Uint8Array(TOKEN);
  values.set([0, 0, 0, 0, 1, 0, 1, 0], 39);
  values.set([1, 0, 1, 1], 123);
  return values;
})();

const QDTEXT = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256);
  values.fill(1, 32, 256);
  values[0x09] = 1;
  values[0x22] = 0;
  values[0x5c] = 0;
  values[0x7f] = 0;
  return values;
})();

const HEX_VALUES = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256).fill(16);
  for (let i = 0; i < 10; ++i) {
    values[0x30 + i] = i;
  }
  for (let i = 0; i < 6; ++i) {
    values[0x41 + i] = i + 10;
    values[0x61 + i] = i + 10;
  }
  return values;
})();

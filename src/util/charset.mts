export interface TextDecoderOptions {
  fatal?: boolean;
  ignoreBOM?: boolean;
}

export interface Decoder {
  decode(input: Uint8Array, options?: { stream?: boolean | undefined }): string;
}

interface Charset {
  decoder: (options: TextDecoderOptions) => Decoder;
}

const CHARSETS = new Map<string, Charset>();

export function registerCharset(name: string, definition: Charset) {
  CHARSETS.set(name.toLowerCase(), definition);
}

export function findTextDecoder(
  charsetName: string,
  options: TextDecoderOptions = {},
): Decoder | undefined {
  const custom = CHARSETS.get(charsetName.toLowerCase());
  if (custom) {
    return custom.decoder(options);
  }
  try {
    return new TextDecoder(charsetName, options);
  } catch {
    return undefined;
  }
}

export const isKnownCharset = (charsetName: string) =>
  findTextDecoder(charsetName) !== undefined;

/**
 * Decodes the bytes using the first available charset. Invalid byte sequences become
 * U+FFFD.
 */
export function decodeText(data: Uint8Array, charsets: (string | undefined)[]): string {
  for (const charset of charsets) {
    if (charset) {
      const decoder = findTextDecoder(charset);
      if (decoder) {
        return decoder.decode(data);
      }
    }
  }
  return new TextDecoder().decode(data);
}

/**
 * Decodes the bytes strictly, returning `undefined` if the charset is not known or
 * the bytes are not valid in the charset.
 */
export function tryDecodeText(data: Uint8Array, charset: string): string | undefined {
  const decoder = findTextDecoder(charset, { fatal: true });
  if (!decoder) {
    return undefined;
  }
  try {
    return decoder.decode(data);
  } catch {
    return undefined;
  }
}

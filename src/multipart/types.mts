import type { ParseError } from '../core/ParseError.mts';

/**
 * Everything known about a part from its headers. Immutable once the headers have been
 * read.
 */
export interface PartDescriptor {
  readonly dispositionType: string;
  readonly name: string;
  /** present (possibly empty) if the part is a file */
  readonly filename?: string | undefined;
  readonly contentType?: string | undefined;
  readonly charset?: string | undefined;
  /** all Content-Type parameters (including `charset`) */
  readonly contentTypeExtra: ReadonlyMap<string, string>;
  /** lowercased Content-Transfer-Encoding */
  readonly transferEncoding?: string | undefined;
  readonly contentLength?: number | undefined;
}

export type PartHeaderResult =
  | { type: 'part'; descriptor: PartDescriptor }
  | { type: 'skip'; error: ParseError };

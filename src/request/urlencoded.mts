import { ParseError } from '../core/ParseError.mts';
import { MultiValueMap } from '../util/MultiValueMap.mts';

export interface URLEncodedLimits {
  maxFieldCount: number;
}

/**
 * Parses `application/x-www-form-urlencoded` data (also used for query strings). Blank
 * values are kept.
 *
 * @throws {ParseError} TOO_MANY_FIELDS if there are more than `maxFieldCount` pairs
 */
export function parseURLEncoded(
  data: string,
  { maxFieldCount }: URLEncodedLimits,
): MultiValueMap<string> {
  let count = 0;
  for (const pair of data.split('&')) {
    if (pair && ++count > maxFieldCount) {
      throw new ParseError('TOO_MANY_FIELDS', 'too many fields');
    }
  }
  return new MultiValueMap(new URLSearchParams(data));
}

import { parseURLEncoded } from './urlencoded.mts';
import 'lean-test';

describe('parseURLEncoded', () => {
  it('decodes pairs in order', () => {
    const values = parseURLEncoded('a=1&b=x+y&a=%C3%A9&empty=&flag', { maxFieldCount: 10 });

    expect(values.toObject()).equals({ a: ['1', 'é'], b: ['x y'], empty: [''], flag: [''] });
  });

  it('allows exactly maxFieldCount pairs', () => {
    expect(parseURLEncoded('a=1&b=2&&', { maxFieldCount: 2 }).size).equals(2);
    expect(() => parseURLEncoded('a=1&b=2&c=3', { maxFieldCount: 2 })).throws('too many fields');
  });

  it('returns an empty map for empty input', () => {
    expect(parseURLEncoded('', { maxFieldCount: 0 }).size).equals(0);
  });
});

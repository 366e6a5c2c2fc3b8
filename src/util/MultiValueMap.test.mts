import { MultiValueMap } from './MultiValueMap.mts';
import 'lean-test';

describe('MultiValueMap', () => {
  it('stores multiple values per key in arrival order', () => {
    const map = new MultiValueMap<string>();
    map.append('a', '1');
    map.append('b', '2');
    map.append('a', '3');

    expect(map.get('a')).equals('1');
    expect(map.getAll('a')).equals(['1', '3']);
    expect(map.getAll('b')).equals(['2']);
    expect(map.size).equals(3);
    expect([...map]).equals([
      ['a', '1'],
      ['b', '2'],
      ['a', '3'],
    ]);
    expect([...map.keys()]).equals(['a', 'b']);
    expect(map.values()).equals(['1', '2', '3']);
  });

  it('returns nothing for missing keys', () => {
    const map = new MultiValueMap<number>([['x', 1]]);

    expect(map.has('x')).isTrue();
    expect(map.has('y')).isFalse();
    expect(map.get('y')).isUndefined();
    expect(map.getAll('y')).equals([]);
  });

  it('returns copies of the stored values', () => {
    const map = new MultiValueMap<string>([['a', '1']]);
    const values = map.getAll('a');
    values.push('2');
    map.getAll('missing').push('3');

    expect(map.getAll('a')).equals(['1']);
    expect(map.has('missing')).isFalse();
    expect(map.size).equals(1);
  });

  it('converts to a plain object', () => {
    const map = new MultiValueMap<number>([
      ['x', 1],
      ['y', 2],
      ['x', 3],
    ]);

    expect(map.toObject()).equals({ x: [1, 3], y: [2] });
  });
});

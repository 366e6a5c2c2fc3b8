import { StreamSearch } from './sbmh.mts';
import 'lean-test';

const DELIMITER = '\n--b';

const tests = [
  {
    name: 'needle at the start',
    needle: DELIMITER,
    input: '\n--bpart',
    expected: ['', null, 'part'],
  },
  {
    name: 'content between needles',
    needle: DELIMITER,
    input: 'one\n--btwo\n--b',
    expected: ['one', null, 'two', null, ''],
  },
  {
    name: 'partial needles in content',
    needle: DELIMITER,
    input: 'a\n--c\n-\n--bz',
    expected: ['a\n--c\n-', null, 'z'],
  },
  { name: 'overlapping prefix', needle: 'aab', input: 'aaab', expected: ['a', null, ''] },
  { name: 'partial needle at the end', needle: DELIMITER, input: 'x\n--', expected: ['x\n--'] },
  {
    name: 'single byte needle',
    needle: '\n',
    input: 'a\n\nb',
    expected: ['a', null, '', null, 'b'],
  },
  { name: 'no input', needle: DELIMITER, input: '', expected: [''] },
];

describe('StreamSearch', () => {
  it(
    'reports the same content and matches for any chunking',
    ({ needle, input, expected }: any) => {
      const data = Buffer.from(input, 'latin1');
      for (let size = 1; size <= Math.max(data.byteLength, 1); ++size) {
        const results: CapturedResults = [];
        const ss = makeSearch(Buffer.from(needle, 'latin1'), results);
        for (let i = 0; i < data.byteLength; i += size) {
          ss.pushAll(data.subarray(i, i + size));
        }
        ss.destroy();

        expect(mergeParts(results)).equals(expected);
      }
    },
    { parameters: tests },
  );

  it('stops after the first match and returns the position after the needle', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from('--x'), collect(results));

    expect(ss.push(Buffer.from('ab--xcd--xef'))).equals(5);
    expect(results).equals(['ab']);
  });

  it('returns a position relative to the current chunk when the match began earlier', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from('--x'), collect(results));

    expect(ss.push(Buffer.from('ab-'))).equals(-1);
    expect(ss.push(Buffer.from('-xcd'))).equals(2);
    expect(results).equals(['ab']);
  });

  it('holds back a possible needle prefix until it is resolved', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from(DELIMITER), collect(results));

    expect(ss.push(Buffer.from('ab\n-'))).equals(-1);
    expect(results).equals(['ab']);

    expect(ss.push(Buffer.from('x'))).equals(-1);
    expect(results).equals(['ab', '\n-', 'x']);
  });

  it('reports held back data when destroyed', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from(DELIMITER), collect(results));

    ss.push(Buffer.from('ab\n-'));
    ss.destroy();
    expect(results).equals(['ab', '\n-']);

    ss.destroy();
    expect(results).equals(['ab', '\n-']);
  });

  it('matches a needle which began with a separately pushed byte', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from(DELIMITER), collect(results));

    expect(ss.push(Buffer.from('\n'))).equals(-1);
    expect(ss.push(Buffer.from('--b'))).equals(3);
    expect(results).equals([]);
  });

  it('only reports the valid part of the lookbehind', () => {
    const results: CapturedResults = [];
    const ss = new StreamSearch(Buffer.from('12341234'), collect(results));

    ss.push(Buffer.from('1234123'));
    ss.push(Buffer.from('12'));
    ss.push(Buffer.from('4'));
    ss.destroy();

    expect(results).equals(['1234123', '12', '4']);
  });

  it('rejects invalid needles', () => {
    expect(() => new StreamSearch(Buffer.alloc(0), () => {})).throws('invalid needle');
    expect(() => new StreamSearch(Buffer.alloc(65536), () => {})).throws('invalid needle');
  });
});

type CapturedResults = (string | null)[];

const collect =
  (target: CapturedResults) => (data: Buffer, start: number, end: number) => {
    target.push(data.toString('latin1', start, end));
  };

/** records every match as `null`, continuing the search after each one */
function makeSearch(needle: Buffer, target: CapturedResults) {
  const ss = new StreamSearch(needle, collect(target));
  return {
    pushAll(data: Buffer) {
      let rest = data;
      while (true) {
        const next = ss.push(rest);
        if (next === -1) {
          return;
        }
        target.push(null);
        rest = rest.subarray(next);
      }
    },
    destroy: () => ss.destroy(),
  };
}

function mergeParts(items: CapturedResults) {
  const result: CapturedResults = [];
  let partial = '';
  for (const item of items) {
    if (item === null) {
      result.push(partial, null);
      partial = '';
    } else {
      partial += item;
    }
  }
  result.push(partial);
  return result;
}

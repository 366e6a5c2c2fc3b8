import { getDispositionParam, parseContentType, parseDisposition } from './contentType.mts';
import 'lean-test';

describe('parseContentType', () => {
  it('returns the lowercased mime type and parameters', () => {
    const parsed = parseContentType('Multipart/Form-Data; Boundary=abc123; charset="utf\\-8"');

    expect(parsed?.mime).equals('multipart/form-data');
    expect(parsed?.params.get('boundary')).equals('abc123');
    expect(parsed?.params.get('charset')).equals('utf-8');
  });

  it('keeps the first value of duplicate parameters', () => {
    const parsed = parseContentType('text/plain; charset=latin1; charset=utf-8');

    expect(parsed?.params.get('charset')).equals('latin1');
  });

  it('allows a trailing semicolon', () => {
    expect(parseContentType('text/plain;')?.mime).equals('text/plain');
  });

  it('returns null for malformed values', () => {
    expect(parseContentType(undefined)).isNull();
    expect(parseContentType('')).isNull();
    expect(parseContentType('text')).isNull();
    expect(parseContentType('text/plain; foo')).isNull();
    expect(parseContentType('text/plain; foo="unterminated')).isNull();
  });
});

describe('parseDisposition', () => {
  it('parses the type and parameters', () => {
    const parsed = parseDisposition(
      Buffer.from('form-data; name="field 1"; filename=a.txt'),
      'utf-8',
    );

    expect(parsed?.type).equals('form-data');
    expect(parsed?.params.get('name')).equals('field 1');
    expect(parsed?.params.get('filename')).equals('a.txt');
  });

  it('unescapes quoted strings', () => {
    const parsed = parseDisposition(Buffer.from('form-data; name="a\\"b\\\\c"'), 'utf-8');

    expect(parsed?.params.get('name')).equals('a"b\\c');
  });

  it('decodes plain values with the parameter charset', () => {
    const header = Buffer.concat([
      Buffer.from('form-data; name="caf'),
      Buffer.from([0xe9]),
      Buffer.from('"'),
    ]);

    expect(parseDisposition(header, 'latin1')?.params.get('name')).equals('café');
    expect(parseDisposition(header, 'utf-8')?.params.get('name')).equals('caf�');
  });

  it('decodes extended values', () => {
    const parsed = parseDisposition(
      Buffer.from('form-data; name="file"; filename*=UTF-8\'\'caf%C3%A9.txt'),
      'utf-8',
    );

    expect(parsed?.extended.get('filename')).equals({
      value: 'café.txt',
      raw: 'caf%C3%A9.txt',
    });
  });

  it('decodes extended values using the declared charset', () => {
    const parsed = mustParse("form-data; filename*=iso-8859-1'en'caf%E9.txt");

    expect(getDispositionParam(parsed, 'filename')).equals('café.txt');
  });

  it('rejects malformed values', () => {
    expect(parseDisposition(Buffer.from(''), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from('; name=x'), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from('form-data; name'), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from('form-data; name='), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from('form-data; name="x'), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from('form-data name=x'), 'utf-8')).isNull();
    expect(parseDisposition(Buffer.from("form-data; filename*=utf-8'x"), 'utf-8')).isNull();
  });
});

describe('getDispositionParam', () => {
  it('prefers the decoded extended value', () => {
    const parsed = mustParse('form-data; filename="plain.txt"; filename*=utf-8\'\'n%C3%A4me.txt');

    expect(getDispositionParam(parsed, 'filename')).equals('näme.txt');
  });

  it('falls back to the plain value if the extended value cannot be decoded', () => {
    const parsed = mustParse('form-data; filename="plain.txt"; filename*=utf-8\'\'%FF.txt');

    expect(getDispositionParam(parsed, 'filename')).equals('plain.txt');
  });

  it('falls back to the raw extended value if there is no plain value', () => {
    const parsed = mustParse("form-data; filename*=unknown-charset''%41b.txt");

    expect(getDispositionParam(parsed, 'filename')).equals('%41b.txt');
  });

  it('keeps extended values with invalid escapes undecoded', () => {
    const parsed = mustParse("form-data; name=f; filename*=UTF-8''%ZZ.txt");

    expect(parsed.extended.get('filename')).equals({ value: undefined, raw: '%ZZ.txt' });
    expect(getDispositionParam(parsed, 'filename')).equals('%ZZ.txt');
    expect(getDispositionParam(mustParse("form-data; filename*=utf-8''a%2"), 'filename')).equals(
      'a%2',
    );
  });

  it('prefers the plain value over an extended value with invalid escapes', () => {
    const parsed = mustParse('form-data; filename*=utf-8\'\'%E2%ZZ; filename="plain.txt"');

    expect(getDispositionParam(parsed, 'filename')).equals('plain.txt');
  });

  it('ignores empty extended values', () => {
    const parsed = mustParse('form-data; filename*=utf-8\'\'; filename="plain.txt"');

    expect(parsed.extended.get('filename')).equals({ value: undefined, raw: '' });
    expect(getDispositionParam(parsed, 'filename')).equals('plain.txt');
  });

  it('returns undefined for missing parameters', () => {
    const parsed = mustParse('form-data');

    expect(getDispositionParam(parsed, 'filename')).isUndefined();
  });
});

function mustParse(value: string) {
  const parsed = parseDisposition(Buffer.from(value, 'latin1'), 'utf-8');
  if (!parsed) {
    throw new Error(`failed to parse ${value}`);
  }
  return parsed;
}

import { HTTPError } from './HTTPError.mts';
import 'lean-test';

describe('HTTPError', () => {
  it('uses the standard status message by default', () => {
    const error = new HTTPError(413, { body: 'too big' });
    expect(error.statusCode).equals(413);
    expect(error.statusMessage).equals('Payload Too Large');
    expect(error.name).equals('HTTPError(413 Payload Too Large)');
    expect(error.message).equals('too big');
    expect(error.body).equals('too big');
  });

  it('keeps an internal message separate from the public body', () => {
    const cause = new Error('disk full');
    const error = new HTTPError(500, {
      statusMessage: 'Oops',
      message: 'internal',
      body: 'public',
      cause,
    });
    expect(error.message).equals('internal');
    expect(error.body).equals('public');
    expect(error.statusMessage).equals('Oops');
    expect(error.cause).same(cause);
  });

  it('uses a placeholder status message for unknown codes', () => {
    const error = new HTTPError(599);
    expect(error.statusMessage).equals('-');
    expect(error.body).equals('');
  });
});

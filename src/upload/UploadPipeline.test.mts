import { ParseError } from '../core/ParseError.mts';
import { CLAIMED, SKIP_FILE, STOP_UPLOAD, type FileInfo, type UploadHandler } from './UploadHandler.mts';
import { InMemoryUploadedFile } from './UploadedFile.mts';
import { UploadPipeline } from './UploadPipeline.mts';
import 'lean-test';

const INFO: FileInfo = {
  fieldName: 'upload',
  filename: 'a.txt',
  contentType: 'text/plain',
  charset: undefined,
  contentTypeExtra: new Map(),
  contentLength: undefined,
};

function recorder(name: string, events: string[], result: (chunk: Buffer) => Buffer | typeof CLAIMED) {
  const handler: UploadHandler = {
    newFile: (info) => {
      events.push(`${name} new ${info.filename}`);
    },
    receiveDataChunk: (chunk, offset) => {
      events.push(`${name} ${offset} ${chunk}`);
      return result(chunk);
    },
    fileComplete: (size) => {
      events.push(`${name} complete ${size}`);
      return undefined;
    },
    abortFile: () => {
      events.push(`${name} abort`);
    },
    uploadComplete: () => {
      events.push(`${name} upload complete`);
    },
  };
  return handler;
}

describe('UploadPipeline', () => {
  it('passes data along the chain until it is claimed', async () => {
    const events: string[] = [];
    const pipeline = new UploadPipeline([
      recorder('upper', events, (chunk) => Buffer.from(chunk.toString().toUpperCase())),
      recorder('store', events, () => CLAIMED),
      recorder('never', events, () => CLAIMED),
    ]);

    await pipeline.begin(INFO);
    expect(await pipeline.write(Buffer.from('ab'))).isNull();
    expect(await pipeline.write(Buffer.from('cde'))).isNull();
    await pipeline.complete();
    await pipeline.uploadComplete();

    expect(events).equals([
      'upper new a.txt',
      'store new a.txt',
      'never new a.txt',
      'upper 0 ab',
      'store 0 AB',
      'upper 2 cde',
      'store 2 CDE',
      'upper complete 5',
      'store complete 5',
      'never complete 0',
      'upper upload complete',
      'store upload complete',
      'never upload complete',
    ]);
  });

  it('stops passing data if a handler returns an empty buffer', async () => {
    const events: string[] = [];
    const pipeline = new UploadPipeline([
      recorder('drop', events, () => Buffer.alloc(0)),
      recorder('store', events, () => CLAIMED),
    ]);

    await pipeline.begin(INFO);
    expect(await pipeline.write(Buffer.from('ab'))).isNull();
    expect(events).equals(['drop new a.txt', 'store new a.txt', 'drop 0 ab']);
  });

  it('returns instructions from handlers', async () => {
    const pipeline = new UploadPipeline([
      {
        receiveDataChunk: (chunk) => (chunk.toString() === 'skip' ? SKIP_FILE : STOP_UPLOAD),
        fileComplete: () => undefined,
      },
    ]);

    await pipeline.begin(INFO);
    expect(await pipeline.write(Buffer.from('skip'))).same(SKIP_FILE);
    expect(await pipeline.write(Buffer.from('other'))).same(STOP_UPLOAD);
  });

  it('fails if no handler claims the data', async () => {
    const pipeline = new UploadPipeline([recorder('pass', [], (chunk) => chunk)]);

    await pipeline.begin(INFO);
    await expect(() => pipeline.write(Buffer.from('ab'))).throws(
      'no upload handler accepted the data',
    );
  });

  it('returns the file from the first handler which stored it', async () => {
    const first = new InMemoryUploadedFile(INFO, Buffer.from('1'));
    const second = new InMemoryUploadedFile(INFO, Buffer.from('2'));
    let secondCompleted = false;
    const pipeline = new UploadPipeline([
      { receiveDataChunk: () => CLAIMED, fileComplete: () => undefined },
      { receiveDataChunk: () => CLAIMED, fileComplete: () => first },
      {
        receiveDataChunk: () => CLAIMED,
        fileComplete: () => {
          secondCompleted = true;
          return second;
        },
      },
    ]);

    await pipeline.begin(INFO);
    expect(await pipeline.complete()).same(first);
    expect(secondCompleted).isFalse();
  });

  it('uses the smallest requested chunk size', () => {
    const pipeline = new UploadPipeline([
      { chunkSize: 100, receiveDataChunk: () => CLAIMED, fileComplete: () => undefined },
      { receiveDataChunk: () => CLAIMED, fileComplete: () => undefined },
      { chunkSize: 20, receiveDataChunk: () => CLAIMED, fileComplete: () => undefined },
    ]);

    expect(pipeline.chunkSize(50)).equals(20);
    expect(pipeline.chunkSize(10)).equals(10);
  });

  it('aborts all handlers, even if some fail', async () => {
    const events: string[] = [];
    const pipeline = new UploadPipeline([
      {
        receiveDataChunk: () => CLAIMED,
        fileComplete: () => undefined,
        abortFile: () => {
          throw new Error('oops');
        },
      },
      recorder('other', events, () => CLAIMED),
    ]);

    await pipeline.begin(INFO);
    await expect(() => pipeline.abort(new Error('cancelled'))).throws('failed to store upload: oops');
    expect(events).equals(['other new a.txt', 'other abort']);
  });

  it('does nothing when aborting if no file is in progress', async () => {
    const events: string[] = [];
    const pipeline = new UploadPipeline([recorder('a', events, () => CLAIMED)]);

    await pipeline.abort(new Error('cancelled'));
    await pipeline.begin(INFO);
    await pipeline.complete();
    await pipeline.abort(new Error('cancelled'));

    expect(events).equals(['a new a.txt', 'a complete 0']);
  });

  it('offers the raw data to handlers', async () => {
    const file = new InMemoryUploadedFile(INFO, Buffer.from('raw'));
    const pipeline = new UploadPipeline([
      { receiveDataChunk: () => CLAIMED, fileComplete: () => undefined },
      {
        handleRawData: async (_, body) => {
          for await (const chunk of body) {
            expect(chunk.toString()).equals('raw');
          }
          return file;
        },
        receiveDataChunk: () => CLAIMED,
        fileComplete: () => undefined,
      },
    ]);

    await pipeline.begin(INFO);
    expect(await pipeline.handleRawData(INFO, toAsync([Buffer.from('raw')]))).same(file);
  });

  it('fails if a handler reads the raw data but does not store it', async () => {
    const pipeline = new UploadPipeline([
      {
        handleRawData: async (_, body) => {
          for await (const chunk of body) {
            expect(chunk.toString()).equals('raw');
          }
          return undefined;
        },
        receiveDataChunk: () => CLAIMED,
        fileComplete: () => undefined,
      },
    ]);

    await pipeline.begin(INFO);
    const error = await pipeline.handleRawData(INFO, toAsync([Buffer.from('raw')])).then(
      () => null,
      (e: unknown) => e,
    );
    expect(error instanceof ParseError ? error.code : error).equals('STORAGE_FAILURE');
  });
});

async function* toAsync(chunks: Buffer[]) {
  yield* chunks;
}

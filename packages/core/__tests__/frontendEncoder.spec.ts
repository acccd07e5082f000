import {
  ByteBuffer,
  EmbeddedNullError,
  FrontendEncoder,
  TargetVariant,
} from '../src/index.js';

describe('FrontendEncoder', () => {
  it('encodes a single message into a fresh buffer', () => {
    const enc = new FrontendEncoder();
    expect(enc.encode({ type: 'copyDone' }).hex).toBe('6300000004');
  });

  it('encodes a list of messages back to back', () => {
    const enc = new FrontendEncoder({ initialCapacity: 1 });
    const out = enc.encode([
      { type: 'close', variant: TargetVariant.Portal, name: '' },
      { type: 'sync' },
    ]);
    expect(out.hex).toBe('430000000650005300000004');
  });

  it('encodeInto appends to a caller-owned buffer', () => {
    const enc = new FrontendEncoder();
    const buf = new ByteBuffer();
    enc.encodeInto({ type: 'flush' }, buf);
    enc.encodeInto({ type: 'terminate' }, buf);
    expect(buf.length).toBe(10);
  });

  it('logs each frame at verbosity 3', () => {
    const sink: string[] = [];
    const enc  = new FrontendEncoder({ verbose: 3, logger: m => sink.push(m) });

    enc.encode([{ type: 'sync' }, { type: 'cancelRequest', processId: 1, secretKey: 2 }]);
    expect(sink).toEqual([
      "3| sync 'S' 5 bytes",
      '3| cancelRequest (untagged) 16 bytes',
    ]);
  });

  it('logs failures at verbosity 1 and rethrows', () => {
    const sink: string[] = [];
    const enc  = new FrontendEncoder({ verbose: 1, logger: m => sink.push(m) });

    expect(() => enc.encode({ type: 'query', sql: 'a\0' })).toThrow(EmbeddedNullError);
    expect(sink).toEqual(['1| query: EmbeddedNullError: query.sql contains an embedded null byte']);
  });

  it('stays quiet at the default verbosity', () => {
    const sink: string[] = [];
    const enc  = new FrontendEncoder({ logger: m => sink.push(m) });

    enc.encode({ type: 'sync' });
    expect(() => enc.encode({ type: 'copyFail', message: '\0' })).toThrow(EmbeddedNullError);
    expect(sink).toEqual([]);
  });

  it('rolls back a caller buffer when a message fails', () => {
    const enc = new FrontendEncoder();
    const buf = new ByteBuffer();
    enc.encodeInto({ type: 'sync' }, buf);
    expect(() => enc.encodeInto({ type: 'parse', name: '', query: 'x', paramTypes: [2 ** 32] }, buf)).toThrow();
    expect(buf.length).toBe(5);
  });
});

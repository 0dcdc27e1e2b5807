import { Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { SinkWriteError } from './errors';
import { MemorySink, StreamSink } from './sinks';

function collectingStream(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
}

describe('StreamSink', () => {
  it('writes lines to the stream', () => {
    const chunks: string[] = [];
    const sink = new StreamSink(collectingStream(chunks));

    sink.write('{"a":1}\n');

    expect(chunks).toEqual(['{"a":1}\n']);
  });

  it('throws once the stream has ended', () => {
    const stream = collectingStream([]);
    const sink = new StreamSink(stream);
    stream.end();

    expect(() => sink.write('line\n')).toThrow(new SinkWriteError('stream is closed'));
  });

  it('surfaces a stream error on the next write', () => {
    const stream = collectingStream([]);
    const emitted: Error[] = [];
    stream.on('error', (e) => emitted.push(e));
    const sink = new StreamSink(stream);

    stream.destroy(new Error('disk full'));

    expect(() => sink.write('line\n')).toThrow('stream failed: disk full');
  });

  it('keeps an asynchronous write failure for the next write', async () => {
    const stream = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        setImmediate(() => callback(new Error('EPIPE')));
      },
    });
    const sink = new StreamSink(stream);

    sink.write('first\n');
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(() => sink.write('second\n')).toThrow(new SinkWriteError('stream failed: EPIPE'));
  });
});

describe('MemorySink', () => {
  it('keeps lines and parses them back', () => {
    const sink = new MemorySink();
    sink.write('{"level":"info","time":"t","message":"a"}\n');
    sink.write('{"level":"error","time":"t","message":"b"}\n');

    expect(sink.lines).toHaveLength(2);
    expect(sink.records().map((r) => r.message)).toEqual(['a', 'b']);
    expect(sink.text()).toBe('{"level":"info","time":"t","message":"a"}\n{"level":"error","time":"t","message":"b"}\n');

    sink.clear();
    expect(sink.lines).toEqual([]);
  });
});

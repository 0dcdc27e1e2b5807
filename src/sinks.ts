import type { Writable } from 'node:stream';
import { SinkWriteError, errorMessage } from './errors';
import type { LogRecord, LogSink } from './types';

/**
 * Stream sink for Node.js writable streams
 */
export class StreamSink implements LogSink {
  private stream: Writable;
  private failure: Error | undefined;

  constructor(stream: Writable = process.stdout) {
    this.stream = stream;
    // Errors a stream hits asynchronously surface on the next write.
    this.stream.on('error', (e) => {
      this.failure ??= e;
    });
  }

  write(line: string): void {
    const failure = this.failure ?? this.stream.errored;
    if (failure) {
      throw new SinkWriteError(`stream failed: ${failure.message}`, { cause: failure });
    }
    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new SinkWriteError('stream is closed');
    }

    try {
      this.stream.write(line);
    } catch (e) {
      throw new SinkWriteError(`stream write failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements LogSink {
  public lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  clear(): void {
    this.lines = [];
  }

  /** Written lines, parsed back. */
  records(): LogRecord[] {
    return this.lines.map((line) => JSON.parse(line));
  }

  /** Everything written, as one string. */
  text(): string {
    return this.lines.join('');
  }
}

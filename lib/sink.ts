import type { Writable } from 'node:stream';
import { OutputChannel, SinkWriteError } from './errors';

export interface LineSink {
  readonly channel: OutputChannel;
  readonly failure: SinkWriteError | null;
  writeLine(line: string): void;
  flush(): Promise<void>;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Appends newline-terminated lines to `stream`. The first stream error is
 * kept; from then on `writeLine` and `flush` throw it as a SinkWriteError.
 */
export function createStreamSink(channel: OutputChannel, stream: Writable): LineSink {
  let failure: SinkWriteError | null = null;
  let lastWrite: Promise<void> = Promise.resolve();

  const fail = (err: unknown): void => {
    if (!failure) {
      failure = new SinkWriteError(channel, toError(err));
    }
  };

  stream.on('error', fail);

  return {
    channel,
    get failure() {
      return failure;
    },
    writeLine(line: string): void {
      if (failure) {
        throw failure;
      }
      lastWrite = new Promise<void>((resolve) => {
        stream.write(`${line}\n`, (err?: Error | null) => {
          if (err) {
            fail(err);
          }
          resolve();
        });
      });
    },
    async flush(): Promise<void> {
      await lastWrite;
      if (failure) {
        throw failure;
      }
    }
  };
}

/** Collects lines in memory; used where output is inspected rather than written out. */
export function createMemorySink(channel: OutputChannel): LineSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    channel,
    lines,
    failure: null,
    writeLine(line: string): void {
      lines.push(line);
    },
    async flush(): Promise<void> {}
  };
}

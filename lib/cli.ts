#!/usr/bin/env node
import type { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { loadConfig, USAGE } from './config';
import { ConfigError, SinkWriteError } from './errors';
import defaultLogger, { Logger } from './logger';
import { createStreamMonitor, runStream } from './monitor';
import { createStreamSink } from './sink';

export const EXIT_OK = 0;
export const EXIT_SINK_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliIo = {
  argv: string[];
  env: NodeJS.ProcessEnv;
  stdin: Readable & { isTTY?: boolean };
  stdout: Writable;
  stderr: Writable;
  signals: Pick<EventEmitter, 'on' | 'off'>;
  logger: Logger;
};

export async function main(overrides: Partial<CliIo> = {}): Promise<number> {
  const io: CliIo = {
    argv: overrides.argv ?? process.argv.slice(2),
    env: overrides.env ?? process.env,
    stdin: overrides.stdin ?? process.stdin,
    stdout: overrides.stdout ?? process.stdout,
    stderr: overrides.stderr ?? process.stderr,
    signals: overrides.signals ?? process,
    logger: overrides.logger ?? defaultLogger
  };
  const { logger } = io;

  let request: ReturnType<typeof loadConfig>;
  try {
    request = loadConfig(io.argv, io.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) {
        logger.error(issue);
      }
      io.stderr.write(USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (request.help) {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }

  if (io.stdin.isTTY) {
    logger.error('stdin is a terminal; pipe ping output in, e.g. "ping -D 8.8.8.8 | probe-sieve"');
    return EXIT_USAGE;
  }

  const monitor = createStreamMonitor({
    config: request.config,
    primary: createStreamSink('primary', io.stdout),
    secondary: createStreamSink('secondary', io.stderr),
    logger
  });

  const reader = createInterface({ input: io.stdin, crlfDelay: Infinity });
  const onStatusRequest = (): void => monitor.reportStatus();
  const onTerminate = (): void => reader.close();

  monitor.onFailure(() => reader.close());
  io.signals.on('SIGUSR1', onStatusRequest);
  io.signals.on('SIGINT', onTerminate);
  io.signals.on('SIGTERM', onTerminate);

  try {
    await runStream(reader, monitor);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof SinkWriteError) {
      logger.error(err.message);
      return EXIT_SINK_FAILURE;
    }
    throw err;
  } finally {
    io.signals.off('SIGUSR1', onStatusRequest);
    io.signals.off('SIGINT', onTerminate);
    io.signals.off('SIGTERM', onTerminate);
    reader.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      defaultLogger.error(err);
      process.exitCode = EXIT_SINK_FAILURE;
    }
  );
}

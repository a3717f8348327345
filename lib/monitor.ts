import { classify, renderForwardedLine } from './classifier';
import { createContinuityTracker } from './continuity';
import { SinkWriteError } from './errors';
import { createHeartbeatMonitor } from './heartbeat';
import defaultLogger, { Logger } from './logger';
import { parseProbeLine } from './parser';
import { LineSink } from './sink';
import { createRunningState, createStatusReporter, takeSnapshot } from './status';
import { formatTimestamp } from './time-format';
import { MonitorConfig, RunningState, StateSnapshot } from './types';

export type StreamMonitorOptions = {
  config: MonitorConfig;
  primary: LineSink;
  secondary: LineSink;
  logger?: Logger;
  now?: () => number;
};

export type StreamMonitor = {
  readonly state: RunningState;
  readonly failure: SinkWriteError | null;
  processLine(rawLine: string): Promise<boolean>;
  reportStatus(): void;
  start(): void;
  stop(): void;
  finish(): Promise<void>;
  onFailure(listener: (err: SinkWriteError) => void): void;
};

function asSinkError(sink: LineSink, err: unknown): SinkWriteError {
  if (err instanceof SinkWriteError) {
    return err;
  }
  return new SinkWriteError(sink.channel, err instanceof Error ? err : new Error(String(err)));
}

export function createStreamMonitor(options: StreamMonitorOptions): StreamMonitor {
  const { config, primary, secondary } = options;
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? Date.now;

  const state = createRunningState(now());
  const observeSequence = createContinuityTracker(state);
  const reporter = createStatusReporter(state, config.timestampFormat, now);
  const failureListeners: Array<(err: SinkWriteError) => void> = [];
  let failure: SinkWriteError | null = null;
  let warnedMissingTimestamp = false;

  function recordFailure(err: SinkWriteError): void {
    if (failure) return;
    failure = err;
    heartbeat.stop();
    for (const listener of failureListeners) {
      listener(err);
    }
  }

  function writeSecondary(line: string): void {
    try {
      secondary.writeLine(line);
    } catch (err) {
      recordFailure(asSinkError(secondary, err));
    }
  }

  function emitHeartbeat(at: number): void {
    const lastInput =
      state.lastLineAt === undefined
        ? 'none yet'
        : `at ${formatTimestamp(config.timestampFormat, state.lastLineAt)}`;
    writeSecondary(
      `${formatTimestamp(config.timestampFormat, at)} HEARTBEAT no anomalies in the last ` +
        `${config.heartbeatIntervalSeconds} s; last input ${lastInput}`
    );
  }

  const heartbeat = createHeartbeatMonitor({
    intervalMs: config.heartbeatIntervalSeconds * 1000,
    state,
    emit: emitHeartbeat,
    now
  });

  async function processLine(rawLine: string): Promise<boolean> {
    if (failure) {
      throw failure;
    }

    const processedAt = now();
    const outcome = parseProbeLine(rawLine, processedAt);
    state.totalLinesSeen += 1;
    state.lastLine = outcome.raw;
    state.lastLineAt = processedAt;

    if (outcome.kind === 'unrecognized') {
      state.totalUnrecognized += 1;
      if (outcome.reason === 'missing-timestamp' && !warnedMissingTimestamp) {
        warnedMissingTimestamp = true;
        logger.warn('probe line without a [timestamp] prefix; was ping started with -D?');
      }
      logger.debug(`skipped ${outcome.reason} line:`, outcome.raw);
      return false;
    }

    if (outcome.kind === 'error') {
      state.totalErrors += 1;
    }

    const continuity = outcome.sequence === undefined ? undefined : observeSequence(outcome.sequence);
    if (continuity && continuity.missingCount > 0) {
      state.totalGapsDetected += 1;
      state.totalGapProbesLost += continuity.missingCount;
    }

    const classification = classify(outcome, continuity, config);
    if (!classification.forward) {
      return false;
    }

    const line = renderForwardedLine(outcome, classification, continuity, {
      timestampFormat: config.timestampFormat,
      timestampSource: config.timestampSource,
      processedAt
    });

    try {
      primary.writeLine(line);
      state.totalForwarded += 1;
      state.lastForwardedAt = processedAt;
      await primary.flush();
    } catch (err) {
      const sinkError = asSinkError(primary, err);
      recordFailure(sinkError);
      throw sinkError;
    }
    return true;
  }

  return {
    state,

    get failure() {
      return failure;
    },

    processLine,

    reportStatus(): void {
      writeSecondary(reporter.snapshot());
    },

    start(): void {
      logger.debug('monitor started', config);
      heartbeat.start();
    },

    stop(): void {
      heartbeat.stop();
    },

    async finish(): Promise<void> {
      heartbeat.stop();
      if (config.finalStatus && !failure) {
        writeSecondary(reporter.snapshot());
      }
      if (failure) {
        throw failure;
      }
      await primary.flush();
      await secondary.flush();
    },

    onFailure(listener: (err: SinkWriteError) => void): void {
      failureListeners.push(listener);
    }
  };
}

/**
 * Main loop: lines are handled strictly one after another, and a forwarded
 * line is flushed before the next one is read.
 */
export async function runStream(lines: AsyncIterable<string>, monitor: StreamMonitor): Promise<StateSnapshot> {
  monitor.start();
  try {
    for await (const line of lines) {
      if (monitor.failure) {
        break;
      }
      await monitor.processLine(line);
    }
  } finally {
    monitor.stop();
  }

  await monitor.finish();
  return takeSnapshot(monitor.state);
}

import { formatTimestamp } from './time-format';
import { RunningState, StateSnapshot } from './types';

const NONE_YET = 'none yet';

export function createRunningState(startedAt: number = Date.now()): RunningState {
  return {
    lastSequence: undefined,
    totalLinesSeen: 0,
    totalForwarded: 0,
    totalErrors: 0,
    totalGapsDetected: 0,
    totalGapProbesLost: 0,
    totalUnrecognized: 0,
    startedAt,
    lastForwardedAt: undefined,
    lastLine: undefined,
    lastLineAt: undefined
  };
}

/**
 * Copies every field in one synchronous step. Signal handlers and timers only
 * run between main-loop turns, so the copy never sees half of a line's update.
 */
export function takeSnapshot(state: RunningState, takenAt: number = Date.now()): StateSnapshot {
  return Object.freeze({ ...state, takenAt });
}

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h${String(minutes).padStart(2, '0')}m${String(seconds).padStart(2, '0')}s`;
  }
  if (minutes > 0) {
    return `${minutes}m${String(seconds).padStart(2, '0')}s`;
  }
  return `${seconds}s`;
}

export function renderStatus(snapshot: StateSnapshot, timestampFormat: string): string {
  const lastSeq = snapshot.lastSequence === undefined ? NONE_YET : String(snapshot.lastSequence);
  const lastLine =
    snapshot.lastLine === undefined
      ? NONE_YET
      : `${JSON.stringify(snapshot.lastLine)} at ${formatTimestamp(timestampFormat, snapshot.lastLineAt ?? snapshot.takenAt)}`;

  return [
    formatTimestamp(timestampFormat, snapshot.takenAt),
    'STATUS',
    `elapsed=${formatElapsed(snapshot.takenAt - snapshot.startedAt)}`,
    `lines=${snapshot.totalLinesSeen}`,
    `forwarded=${snapshot.totalForwarded}`,
    `errors=${snapshot.totalErrors}`,
    `gaps=${snapshot.totalGapsDetected}`,
    `lost=${snapshot.totalGapProbesLost}`,
    `unrecognized=${snapshot.totalUnrecognized}`,
    `last_seq=${lastSeq}`,
    `last_line=${lastLine}`
  ].join(' ');
}

export type StatusReporter = {
  snapshot(): string;
};

export function createStatusReporter(
  state: RunningState,
  timestampFormat: string,
  now: () => number = Date.now
): StatusReporter {
  return {
    snapshot: () => renderStatus(takeSnapshot(state, now()), timestampFormat)
  };
}

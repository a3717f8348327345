import { describe, expect, it } from '@jest/globals';
import { createRunningState, createStatusReporter, formatElapsed, renderStatus, takeSnapshot } from './status';

describe('createRunningState', () => {
  it('starts with zero counters and no sequence', () => {
    expect(createRunningState(1_000)).toEqual({
      lastSequence: undefined,
      totalLinesSeen: 0,
      totalForwarded: 0,
      totalErrors: 0,
      totalGapsDetected: 0,
      totalGapProbesLost: 0,
      totalUnrecognized: 0,
      startedAt: 1_000,
      lastForwardedAt: undefined,
      lastLine: undefined,
      lastLineAt: undefined
    });
  });
});

describe('takeSnapshot', () => {
  it('returns a frozen copy that later updates do not touch', () => {
    const state = createRunningState(1_000);
    state.totalLinesSeen = 3;
    const snapshot = takeSnapshot(state, 2_000);
    state.totalLinesSeen = 4;

    expect(snapshot.totalLinesSeen).toBe(3);
    expect(snapshot.takenAt).toBe(2_000);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe('formatElapsed', () => {
  it('uses the largest unit that applies', () => {
    expect(formatElapsed(59_999)).toBe('59s');
    expect(formatElapsed(61_000)).toBe('1m01s');
    expect(formatElapsed(3_725_000)).toBe('1h02m05s');
  });
});

describe('renderStatus', () => {
  it('marks sequence and last line as none yet before any input', () => {
    const snapshot = takeSnapshot(createRunningState(1_000_000), 4_725_000);

    expect(renderStatus(snapshot, '%s')).toBe(
      '4725 STATUS elapsed=1h02m05s lines=0 forwarded=0 errors=0 gaps=0 lost=0 unrecognized=0 ' +
        'last_seq=none yet last_line=none yet'
    );
  });

  it('includes every counter and the quoted last line', () => {
    const state = createRunningState(1_000_000);
    Object.assign(state, {
      lastSequence: 7,
      totalLinesSeen: 10,
      totalForwarded: 3,
      totalErrors: 1,
      totalGapsDetected: 2,
      totalGapProbesLost: 5,
      totalUnrecognized: 1,
      lastLine: 'x "q"',
      lastLineAt: 4_000_000
    });

    const reporter = createStatusReporter(state, '%s', () => 4_725_000);

    expect(reporter.snapshot()).toBe(
      '4725 STATUS elapsed=1h02m05s lines=10 forwarded=3 errors=1 gaps=2 lost=5 unrecognized=1 ' +
        'last_seq=7 last_line="x \\"q\\"" at 4000'
    );
  });
});

import { describe, expect, it } from '@jest/globals';
import { classify, describeGap, renderForwardedLine } from './classifier';
import { ContinuityResult, ProbeError, ProbeReply, Thresholds } from './types';

const thresholds: Thresholds = { maxRoundtripMillis: 500, allowedSequenceGap: 1 };
const consecutive: ContinuityResult = { missingCount: 0, isFirstObservation: false, previousSequence: 4 };
const PROCESSED_AT = new Date(2024, 0, 5, 7, 8, 9).getTime();

function reply(roundtripMillis: number, overrides: Partial<ProbeReply> = {}): ProbeReply {
  return {
    kind: 'reply',
    sequence: 5,
    roundtripMillis,
    flags: [],
    capturedAt: PROCESSED_AT,
    raw: `[1704438489.0] 64 bytes from 10.0.0.1: icmp_seq=5 ttl=64 time=${roundtripMillis} ms`,
    ...overrides
  };
}

describe('classify', () => {
  it('forwards replies strictly slower than the threshold', () => {
    expect(classify(reply(500), consecutive, thresholds)).toEqual({ forward: false, reasons: [] });
    expect(classify(reply(500.1), consecutive, thresholds)).toEqual({ forward: true, reasons: ['latency'] });
  });

  it('forwards gaps that reach the allowed gap', () => {
    const gapOfTwo: ContinuityResult = { missingCount: 2, isFirstObservation: false, previousSequence: 2 };

    expect(classify(reply(10), gapOfTwo, { ...thresholds, allowedSequenceGap: 2 })).toEqual({
      forward: true,
      reasons: ['gap']
    });
    expect(classify(reply(10), gapOfTwo, { ...thresholds, allowedSequenceGap: 3 }).forward).toBe(false);
  });

  it('keeps fast flagged replies such as duplicates unless asked to forward them', () => {
    const duplicate = reply(10, { flags: ['DUP!'] });

    expect(classify(duplicate, consecutive, thresholds)).toEqual({ forward: false, reasons: [] });
    expect(classify(duplicate, consecutive, { ...thresholds, forwardFlaggedReplies: false }).forward).toBe(false);
    expect(classify(duplicate, consecutive, { ...thresholds, forwardFlaggedReplies: true })).toEqual({
      forward: true,
      reasons: ['flagged']
    });
  });

  it('forwards a slow duplicate for its latency alone', () => {
    expect(classify(reply(700, { flags: ['DUP!'] }), consecutive, thresholds).reasons).toEqual(['latency']);
  });

  it('always forwards probe errors', () => {
    const error: ProbeError = {
      kind: 'error',
      sequence: 9,
      message: 'Destination Host Unreachable',
      capturedAt: PROCESSED_AT,
      raw: '[1704438489.0] From 10.0.0.1 icmp_seq=9 Destination Host Unreachable'
    };

    expect(
      classify(error, undefined, { maxRoundtripMillis: Number.MAX_VALUE, allowedSequenceGap: 1000 })
    ).toEqual({ forward: true, reasons: ['error'] });
  });

  it('never forwards unrecognized lines', () => {
    expect(classify({ kind: 'unrecognized', reason: 'header', raw: 'PING x' }, undefined, thresholds)).toEqual({
      forward: false,
      reasons: []
    });
  });

  it('collects every applicable reason for a single line', () => {
    const gap: ContinuityResult = { missingCount: 1, isFirstObservation: false, previousSequence: 3 };

    expect(classify(reply(900), gap, thresholds).reasons).toEqual(['latency', 'gap']);
  });
});

describe('renderForwardedLine', () => {
  it('prefixes the processing time and appends the gap description', () => {
    const outcome = reply(900);
    const gap: ContinuityResult = { missingCount: 2, isFirstObservation: false, previousSequence: 2 };
    const classification = classify(outcome, gap, thresholds);

    expect(
      renderForwardedLine(outcome, classification, gap, {
        timestampFormat: '%Y-%m-%d %H:%M:%S',
        timestampSource: 'arrival',
        processedAt: PROCESSED_AT
      })
    ).toBe(`2024-01-05 07:08:09 ${outcome.raw} [missed 2 probes after icmp_seq=2]`);
  });

  it('leaves out the gap description when the gap did not trigger forwarding', () => {
    const outcome = reply(900);
    const gap: ContinuityResult = { missingCount: 1, isFirstObservation: false, previousSequence: 3 };
    const strict = { ...thresholds, allowedSequenceGap: 5 };

    expect(
      renderForwardedLine(outcome, classify(outcome, gap, strict), gap, {
        timestampFormat: '%H:%M:%S',
        timestampSource: 'arrival',
        processedAt: PROCESSED_AT
      })
    ).toBe(`07:08:09 ${outcome.raw}`);
  });

  it('can stamp lines with the time embedded by ping', () => {
    const outcome = reply(900, { probedAt: new Date(2023, 11, 31, 23, 59, 58).getTime() });

    expect(
      renderForwardedLine(outcome, classify(outcome, consecutive, thresholds), consecutive, {
        timestampFormat: '%Y-%m-%d %H:%M:%S',
        timestampSource: 'probe',
        processedAt: PROCESSED_AT
      })
    ).toBe(`2023-12-31 23:59:58 ${outcome.raw}`);
  });
});

describe('describeGap', () => {
  it('uses the singular for one missing probe', () => {
    expect(describeGap({ missingCount: 1, isFirstObservation: false, previousSequence: 2 })).toBe(
      '[missed 1 probe after icmp_seq=2]'
    );
  });
});

import { formatTimestamp } from './time-format';
import { ContinuityResult, ProbeOutcome, Thresholds, TimestampSource } from './types';

export type ForwardReason = 'latency' | 'gap' | 'flagged' | 'error';

export type Classification = {
  forward: boolean;
  reasons: ForwardReason[];
};

export type RenderOptions = {
  timestampFormat: string;
  timestampSource: TimestampSource;
  processedAt: number;
};

function forwardReasons(
  outcome: ProbeOutcome,
  continuity: ContinuityResult | undefined,
  thresholds: Thresholds
): ForwardReason[] {
  if (outcome.kind === 'unrecognized') {
    return [];
  }

  const reasons: ForwardReason[] = [];
  if (outcome.kind === 'error') {
    reasons.push('error');
  } else {
    if (outcome.roundtripMillis > thresholds.maxRoundtripMillis) {
      reasons.push('latency');
    }
    if (thresholds.forwardFlaggedReplies && outcome.flags.length > 0) {
      reasons.push('flagged');
    }
  }

  if (continuity && continuity.missingCount > 0 && continuity.missingCount >= thresholds.allowedSequenceGap) {
    reasons.push('gap');
  }
  return reasons;
}

export function classify(
  outcome: ProbeOutcome,
  continuity: ContinuityResult | undefined,
  thresholds: Thresholds
): Classification {
  const reasons = forwardReasons(outcome, continuity, thresholds);
  return { forward: reasons.length > 0, reasons };
}

export function describeGap(continuity: ContinuityResult): string {
  const noun = continuity.missingCount === 1 ? 'probe' : 'probes';
  const after =
    continuity.previousSequence === undefined ? '' : ` after icmp_seq=${continuity.previousSequence}`;
  return `[missed ${continuity.missingCount} ${noun}${after}]`;
}

/**
 * Builds the primary-channel line: timestamp prefix, the raw input line and,
 * when a gap triggered forwarding, the gap description.
 */
export function renderForwardedLine(
  outcome: Exclude<ProbeOutcome, { kind: 'unrecognized' }>,
  classification: Classification,
  continuity: ContinuityResult | undefined,
  options: RenderOptions
): string {
  const stampAt =
    options.timestampSource === 'probe' && outcome.probedAt !== undefined
      ? outcome.probedAt
      : options.processedAt;

  const parts = [formatTimestamp(options.timestampFormat, stampAt), outcome.raw];
  if (continuity && classification.reasons.includes('gap')) {
    parts.push(describeGap(continuity));
  }
  return parts.join(' ');
}

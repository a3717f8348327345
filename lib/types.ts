export type UnrecognizedReason = 'header' | 'missing-timestamp' | 'no-sequence' | 'unknown';

export interface ProbeReply {
  kind: 'reply';
  sequence: number;
  roundtripMillis: number;
  flags: string[];
  probedAt?: number;
  capturedAt: number;
  raw: string;
}

export interface ProbeError {
  kind: 'error';
  sequence?: number;
  message: string;
  probedAt?: number;
  capturedAt: number;
  raw: string;
}

export interface ProbeUnrecognized {
  kind: 'unrecognized';
  reason: UnrecognizedReason;
  raw: string;
}

export type ProbeOutcome = ProbeReply | ProbeError | ProbeUnrecognized;

export interface ContinuityResult {
  missingCount: number;
  isFirstObservation: boolean;
  previousSequence?: number;
}

export interface Thresholds {
  maxRoundtripMillis: number;
  allowedSequenceGap: number;
  forwardFlaggedReplies?: boolean;
}

export type TimestampSource = 'arrival' | 'probe';

export interface MonitorConfig extends Thresholds {
  timestampFormat: string;
  heartbeatIntervalSeconds: number;
  timestampSource: TimestampSource;
  forwardFlaggedReplies: boolean;
  finalStatus: boolean;
}

export interface RunningState {
  lastSequence?: number;
  totalLinesSeen: number;
  totalForwarded: number;
  totalErrors: number;
  totalGapsDetected: number;
  totalGapProbesLost: number;
  totalUnrecognized: number;
  readonly startedAt: number;
  lastForwardedAt?: number;
  lastLine?: string;
  lastLineAt?: number;
}

export type StateSnapshot = Readonly<RunningState> & { takenAt: number };

import { ContinuityResult, RunningState } from './types';

export type ContinuityTracker = (sequence: number) => ContinuityResult;

/**
 * Tracks the last sequence number seen in `state`. A sequence that does not
 * move forward becomes the new baseline and reports no missing probes.
 */
export function createContinuityTracker(state: Pick<RunningState, 'lastSequence'>): ContinuityTracker {
  return (sequence: number): ContinuityResult => {
    const previousSequence = state.lastSequence;
    state.lastSequence = sequence;

    if (previousSequence === undefined) {
      return { missingCount: 0, isFirstObservation: true };
    }

    return {
      missingCount: Math.max(0, sequence - previousSequence - 1),
      isFirstObservation: false,
      previousSequence
    };
  };
}

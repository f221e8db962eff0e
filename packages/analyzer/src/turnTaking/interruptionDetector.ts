/**
 * Interruption Detector
 *
 * X interrupts Y when one of X's intervals starts strictly inside one of
 * Y's (Y.start < X.start < Y.end). Each interrupter interval produces at
 * most one event, against the first interval it lands in. Both directions
 * are scanned independently.
 */

import type { Interruption, SpeechInterval } from "@turnlab/types";

export interface InterruptionInit {
  interrupter: string;
  interrupted: string;
  interrupterInterval: SpeechInterval;
  interruptedInterval: SpeechInterval;
}

export function createInterruption({
  interrupter,
  interrupted,
  interrupterInterval,
  interruptedInterval,
}: InterruptionInit): Interruption {
  return Object.freeze({
    interrupter,
    interrupted,
    startTime: interrupterInterval.start,
    yieldingLatency: interruptedInterval.end - interrupterInterval.start,
    speechBefore: interrupterInterval.start - interruptedInterval.start,
    interrupterDuration: interrupterInterval.end - interrupterInterval.start,
    yielded: interruptedInterval.end <= interrupterInterval.end,
  });
}

function startsInside(candidate: SpeechInterval, ongoing: SpeechInterval): boolean {
  return candidate.start > ongoing.start && candidate.start < ongoing.end;
}

function detectDirection(
  interrupterSegments: readonly SpeechInterval[],
  interruptedSegments: readonly SpeechInterval[],
  interrupter: string,
  interrupted: string,
): Interruption[] {
  const events: Interruption[] = [];

  for (const interrupterInterval of interrupterSegments) {
    const interruptedInterval = interruptedSegments.find((ongoing) =>
      startsInside(interrupterInterval, ongoing),
    );
    if (interruptedInterval) {
      events.push(
        createInterruption({ interrupter, interrupted, interrupterInterval, interruptedInterval }),
      );
    }
  }

  return events;
}

/**
 * All interruptions in both directions, sorted by start time.
 */
export function detectInterruptions(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
  labelA: string,
  labelB: string,
): Interruption[] {
  return [
    ...detectDirection(segmentsB, segmentsA, labelB, labelA),
    ...detectDirection(segmentsA, segmentsB, labelA, labelB),
  ].sort((x, y) => x.startTime - y.startTime);
}

export interface YieldingFilter {
  /** Only events started by this speaker */
  interrupter: string;
  /** Minimum time the interrupted party had been speaking (s) */
  minSpeechBefore?: number;
  /** Minimum length of the interrupting interval (s) */
  minInterrupterDuration?: number;
  /** Keep only events where the interrupted party stopped first */
  requireYielded?: boolean;
}

/**
 * Events that represent a sustained speaker being cut in on, for
 * yielding-latency views.
 */
export function filterYieldingEvents(
  interruptions: readonly Interruption[],
  {
    interrupter,
    minSpeechBefore = 4.0,
    minInterrupterDuration = 3.0,
    requireYielded = false,
  }: YieldingFilter,
): Interruption[] {
  return interruptions.filter(
    (event) =>
      event.interrupter === interrupter &&
      event.speechBefore >= minSpeechBefore &&
      event.interrupterDuration >= minInterrupterDuration &&
      (!requireYielded || event.yielded),
  );
}

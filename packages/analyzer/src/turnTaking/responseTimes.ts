/**
 * Response Times
 *
 * Latency of clean handoffs. A transition counts only when the next
 * speaker starts strictly after the previous turn ended; touching or
 * overlapping handoffs belong to interruption analysis instead.
 */

import type { ResponseTransition, Turn } from "@turnlab/types";

export interface ResponseTimeSamples {
  /** Gaps before turns taken by labelA */
  a: number[];
  /** Gaps before turns taken by labelB */
  b: number[];
}

export function listResponseTransitions(turns: readonly Turn[]): ResponseTransition[] {
  const transitions: ResponseTransition[] = [];

  for (let i = 1; i < turns.length; i++) {
    const prev = turns[i - 1];
    const curr = turns[i];
    if (prev.speaker === curr.speaker) continue;

    const gap = curr.start - prev.end;
    if (gap <= 0) continue;

    transitions.push(Object.freeze({ at: prev.end, from: prev.speaker, to: curr.speaker, gap }));
  }

  return transitions;
}

/**
 * Attribute each clean handoff gap to the speaker who took the turn.
 */
export function computeResponseTimes(
  turns: readonly Turn[],
  labelA: string,
  labelB: string,
): ResponseTimeSamples {
  const samples: ResponseTimeSamples = { a: [], b: [] };

  for (const transition of listResponseTransitions(turns)) {
    if (transition.to === labelA) {
      samples.a.push(transition.gap);
    } else if (transition.to === labelB) {
      samples.b.push(transition.gap);
    }
  }

  return samples;
}

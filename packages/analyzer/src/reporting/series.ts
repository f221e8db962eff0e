/**
 * Reporting Series
 *
 * Chart-ready derivations of a finished analysis. Nothing here adds new
 * semantics; it reshapes turns and totals for presentation.
 */

import type {
  ConversationStats,
  CumulativeSeries,
  ResponseTransition,
  TalkShare,
  Turn,
} from "@turnlab/types";
import { turnDuration } from "../turnTaking/turnBuilder";

export interface DirectionalGaps {
  /** Handoffs from speaker A to speaker B */
  aToB: number[];
  /** Handoffs from speaker B to speaker A */
  bToA: number[];
}

/**
 * Group handoff gaps by the speaker who finished the previous turn.
 */
export function splitTransitionsByDirection(
  transitions: readonly ResponseTransition[],
  labelA: string,
): DirectionalGaps {
  const gaps: DirectionalGaps = { aToB: [], bToA: [] };

  for (const transition of transitions) {
    if (transition.from === labelA) {
      gaps.aToB.push(transition.gap);
    } else {
      gaps.bToA.push(transition.gap);
    }
  }

  return gaps;
}

/**
 * Step series of one speaker's accumulated talk time.
 */
export function cumulativeTalkSeries(turns: readonly Turn[], speaker: string): CumulativeSeries {
  const own = turns
    .filter((turn) => turn.speaker === speaker)
    .map((turn) => ({ start: turn.start, duration: turnDuration(turn) }))
    .sort((x, y) => x.start - y.start || x.duration - y.duration);

  const times = [0];
  const cumulative = [0];
  let total = 0;

  for (const { start, duration } of own) {
    times.push(start);
    cumulative.push(total);
    total += duration;
    times.push(start + duration);
    cumulative.push(total);
  }

  return Object.freeze({ times, cumulative });
}

/**
 * Talk time per speaker plus silence, as shares of the recording.
 */
export function speakerShares(stats: ConversationStats): TalkShare[] {
  return [
    { label: stats.speakerA.label, seconds: stats.speakerA.totalTalkTime, pct: stats.speakerA.talkTimePct },
    { label: stats.speakerB.label, seconds: stats.speakerB.totalTalkTime, pct: stats.speakerB.talkTimePct },
    { label: "Silence", seconds: stats.totalSilenceSec, pct: stats.silencePct },
  ];
}

/**
 * Turn Builder
 *
 * Pools both speakers' intervals into one chronological turn sequence.
 * Consecutive intervals of the same speaker fold into one turn; a change of
 * speaker always opens a new turn, even when it overlaps the previous one.
 */

import type { SpeechInterval, Turn } from "@turnlab/types";

export function createTurn(speaker: string, start: number, end: number): Turn {
  return Object.freeze({ speaker, start, end });
}

export function turnDuration(turn: Turn): number {
  return turn.end - turn.start;
}

export function buildTurns(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
  labelA: string,
  labelB: string,
): Turn[] {
  // Array#sort is stable: on equal starts, A's intervals stay ahead of B's
  const events = [
    ...segmentsA.map((segment) => ({ speaker: labelA, segment })),
    ...segmentsB.map((segment) => ({ speaker: labelB, segment })),
  ].sort((x, y) => x.segment.start - y.segment.start);

  const turns: Turn[] = [];

  for (const { speaker, segment } of events) {
    const current = turns.length > 0 ? turns[turns.length - 1] : undefined;
    if (current && current.speaker === speaker) {
      turns[turns.length - 1] = createTurn(
        speaker,
        current.start,
        Math.max(current.end, segment.end),
      );
    } else {
      turns.push(createTurn(speaker, segment.start, segment.end));
    }
  }

  return turns;
}

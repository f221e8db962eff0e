/**
 * Silence Analysis
 *
 * A pause is any stretch where neither speaker is active: before the first
 * interval, between merged intervals, and after the last one up to the end
 * of the recording.
 */

import type { PauseSummary, SpeechInterval } from "@turnlab/types";
import { assertDuration } from "../errors";

/**
 * Union of both speakers' activity as sorted, disjoint intervals.
 * Touching intervals are joined.
 */
export function mergeActivity(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
): SpeechInterval[] {
  const all = [...segmentsA, ...segmentsB].sort(
    (x, y) => x.start - y.start || x.end - y.end,
  );
  const merged: { start: number; end: number }[] = [];

  for (const interval of all) {
    const prev = merged.length > 0 ? merged[merged.length - 1] : undefined;
    if (prev && interval.start <= prev.end) {
      prev.end = Math.max(prev.end, interval.end);
    } else {
      merged.push({ start: interval.start, end: interval.end });
    }
  }

  return merged.map((interval) => Object.freeze(interval));
}

export function computeSilence(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
  durationSec: number,
): PauseSummary {
  assertDuration(durationSec);

  const merged = mergeActivity(segmentsA, segmentsB);
  if (merged.length === 0) {
    return Object.freeze({
      totalSec: durationSec,
      count: durationSec > 0 ? 1 : 0,
      avgSec: durationSec,
      longestSec: durationSec,
      pauses: durationSec > 0 ? [durationSec] : [],
    });
  }

  const pauses: number[] = [];
  if (merged[0].start > 0) {
    pauses.push(merged[0].start);
  }
  for (let i = 1; i < merged.length; i++) {
    const gap = merged[i].start - merged[i - 1].end;
    if (gap > 0) pauses.push(gap);
  }
  const lastEnd = merged[merged.length - 1].end;
  if (lastEnd < durationSec) {
    pauses.push(durationSec - lastEnd);
  }

  const totalSec = pauses.reduce((sum, pause) => sum + pause, 0);

  return Object.freeze({
    totalSec,
    count: pauses.length,
    avgSec: pauses.length > 0 ? totalSec / pauses.length : 0,
    longestSec: pauses.length > 0 ? Math.max(...pauses) : 0,
    pauses,
  });
}

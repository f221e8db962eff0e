/**
 * Segment Post-Processing
 *
 * Run-length encoding of frame decisions, gap bridging and short-segment
 * removal. The frame-domain path (energy) and the seconds-domain path
 * (model) each merge first and filter second.
 */

import type { SpeechInterval } from "@turnlab/types";
import type { FrameRun } from "./types";

export function createSpeechInterval(start: number, end: number): SpeechInterval {
  return Object.freeze({ start, end });
}

// ============================================================================
// Frame Domain
// ============================================================================

/**
 * Collapse per-frame speech flags into [start, end) runs.
 */
export function framesToRuns(isSpeech: ArrayLike<boolean>): FrameRun[] {
  const runs: FrameRun[] = [];
  let start = -1;

  for (let i = 0; i < isSpeech.length; i++) {
    if (isSpeech[i] && start < 0) {
      start = i;
    } else if (!isSpeech[i] && start >= 0) {
      runs.push([start, i]);
      start = -1;
    }
  }

  if (start >= 0) {
    runs.push([start, isSpeech.length]);
  }

  return runs;
}

/**
 * Join runs whose silent gap is shorter than minSilenceFrames.
 */
export function mergeFrameRuns(runs: readonly FrameRun[], minSilenceFrames: number): FrameRun[] {
  const merged: FrameRun[] = [];

  for (const run of runs) {
    const prev = merged.length > 0 ? merged[merged.length - 1] : undefined;
    if (prev && run[0] - prev[1] < minSilenceFrames) {
      merged[merged.length - 1] = [prev[0], Math.max(prev[1], run[1])];
    } else {
      merged.push(run);
    }
  }

  return merged;
}

export function dropShortRuns(runs: readonly FrameRun[], minSpeechFrames: number): FrameRun[] {
  return runs.filter(([start, end]) => end - start >= minSpeechFrames);
}

/**
 * RLE, then merge, then drop.
 */
export function framesToSegments(
  isSpeech: ArrayLike<boolean>,
  minSilenceFrames: number,
  minSpeechFrames: number,
): FrameRun[] {
  return dropShortRuns(mergeFrameRuns(framesToRuns(isSpeech), minSilenceFrames), minSpeechFrames);
}

// ============================================================================
// Seconds Domain
// ============================================================================

export function mergeCloseSpans(
  spans: readonly SpeechInterval[],
  minSilenceSec: number,
): SpeechInterval[] {
  const merged: SpeechInterval[] = [];

  for (const span of spans) {
    const prev = merged.length > 0 ? merged[merged.length - 1] : undefined;
    if (prev && span.start - prev.end < minSilenceSec) {
      merged[merged.length - 1] = createSpeechInterval(prev.start, Math.max(prev.end, span.end));
    } else {
      merged.push(createSpeechInterval(span.start, span.end));
    }
  }

  return merged;
}

export function dropShortSpans(
  spans: readonly SpeechInterval[],
  minSpeechSec: number,
): SpeechInterval[] {
  return spans.filter((span) => span.end - span.start >= minSpeechSec);
}

/**
 * Signal Math
 *
 * Frame energy and percentile helpers used by the energy segmenter.
 */

import type { AudioSignal } from "@turnlab/types";

/**
 * RMS energy of each full, non-overlapping frame. A trailing partial frame
 * is ignored.
 */
export function frameRms(signal: AudioSignal, frameSamples: number): Float64Array {
  const frameCount = frameSamples > 0 ? Math.floor(signal.length / frameSamples) : 0;
  const rms = new Float64Array(frameCount);

  for (let frame = 0; frame < frameCount; frame++) {
    const offset = frame * frameSamples;
    let sum = 0;
    for (let i = 0; i < frameSamples; i++) {
      const sample = signal[offset + i];
      sum += sample * sample;
    }
    rms[frame] = Math.sqrt(sum / frameSamples);
  }

  return rms;
}

/**
 * Percentile with linear interpolation between closest ranks.
 * Returns 0 for an empty input.
 */
export function percentile(values: ArrayLike<number>, p: number): number {
  if (values.length === 0) return 0;

  const sorted = Array.from(values).sort((a, b) => a - b);
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/**
 * Noise-floor relative threshold: 40% of the way from the 30th to the
 * 95th percentile of frame energy.
 */
export function autoThreshold(rms: ArrayLike<number>): number {
  if (rms.length === 0) return 0;

  const noiseFloor = percentile(rms, 30);
  const peak = percentile(rms, 95);
  if (peak <= noiseFloor) return noiseFloor;

  return noiseFloor + 0.4 * (peak - noiseFloor);
}

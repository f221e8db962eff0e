/**
 * Rational Resampler
 *
 * Converts a signal between integer sample rates by reducing the rate pair
 * to an up/down ratio and interpolating linearly between source samples.
 * Identical rates return an unmodified copy.
 */

import type { AudioSignal } from "@turnlab/types";
import { assertSampleRate } from "../errors";

export interface ResampleRatio {
  up: number;
  down: number;
}

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function resampleRatio(originalRate: number, targetRate: number): ResampleRatio {
  const origin = Math.round(originalRate);
  const target = Math.round(targetRate);
  const divisor = gcd(origin, target);
  return { up: target / divisor, down: origin / divisor };
}

export function resampleSignal(
  signal: AudioSignal,
  originalRate: number,
  targetRate: number,
): Float32Array {
  assertSampleRate(originalRate, "originalRate");
  assertSampleRate(targetRate, "targetRate");

  const { up, down } = resampleRatio(originalRate, targetRate);
  if (up === down) {
    return Float32Array.from(signal);
  }
  if (signal.length === 0) {
    return new Float32Array(0);
  }

  const outputLength = Math.ceil((signal.length * up) / down);
  const output = new Float32Array(outputLength);
  const last = signal.length - 1;

  for (let i = 0; i < outputLength; i++) {
    const srcIndex = (i * down) / up;
    const srcIndexFloor = Math.min(Math.floor(srcIndex), last);
    const srcIndexCeil = Math.min(srcIndexFloor + 1, last);
    const frac = srcIndex - Math.floor(srcIndex);

    output[i] = signal[srcIndexFloor] * (1 - frac) + signal[srcIndexCeil] * frac;
  }

  return output;
}

/**
 * Energy Segmenter
 *
 * Frame-level RMS classifier:
 * 1. Split the signal into fixed, non-overlapping frames
 * 2. Compute RMS energy per frame
 * 3. Compare against a fixed or auto-derived threshold
 * 4. Bridge short gaps, then drop short segments (both in whole frames)
 */

import type { AudioSignal, SpeechInterval } from "@turnlab/types";
import { createLogger } from "@turnlab/telemetry";
import { assertSampleRate } from "../errors";
import { autoThreshold, frameRms } from "../audio/signalMath";
import { resolveSegmenterConfig } from "./config";
import { createSpeechInterval, framesToSegments } from "./postprocess";
import type { SegmenterConfig, SpeechSegmenter } from "./types";

const energyLog = createLogger("EnergyVAD");

export function detectSpeechEnergy(
  signal: AudioSignal,
  sampleRate: number,
  overrides: Partial<SegmenterConfig> = {},
): SpeechInterval[] {
  assertSampleRate(sampleRate);
  const config = resolveSegmenterConfig(overrides);

  const frameSamples = Math.trunc((sampleRate * config.frameMs) / 1000);
  if (frameSamples === 0) return [];

  const rms = frameRms(signal, frameSamples);
  if (rms.length === 0) return [];

  const threshold = config.threshold === "auto" ? autoThreshold(rms) : config.threshold;
  const isSpeech = Array.from(rms, (energy) => energy > threshold);

  const minSilenceFrames = Math.trunc(config.minSilenceMs / config.frameMs);
  const minSpeechFrames = Math.trunc(config.minSpeechMs / config.frameMs);

  energyLog.debug("frames:", rms.length, "threshold:", threshold);

  return framesToSegments(isSpeech, minSilenceFrames, minSpeechFrames).map(([start, end]) =>
    createSpeechInterval((start * config.frameMs) / 1000, (end * config.frameMs) / 1000),
  );
}

export class EnergySpeechSegmenter implements SpeechSegmenter {
  readonly name = "energy";
  private readonly defaults: Partial<SegmenterConfig>;

  constructor(defaults: Partial<SegmenterConfig> = {}) {
    this.defaults = defaults;
  }

  async detectSpeech(
    signal: AudioSignal,
    sampleRate: number,
    config: Partial<SegmenterConfig> = {},
  ): Promise<SpeechInterval[]> {
    return detectSpeechEnergy(signal, sampleRate, { ...this.defaults, ...config });
  }
}

/**
 * Model Segmenter
 *
 * Learned-model strategy: resample to the model rate, let the model
 * propose spans, then bridge gaps shorter than minSilenceMs and drop spans
 * shorter than minSpeechMs, both in seconds. frameMs and threshold do not
 * apply here; the model carries its own probability thresholds.
 */

import type { AudioSignal, SpeechInterval } from "@turnlab/types";
import { createLogger } from "@turnlab/telemetry";
import { assertSampleRate } from "../errors";
import { resampleSignal } from "../audio/resampler";
import { resolveSegmenterConfig } from "./config";
import { dropShortSpans, mergeCloseSpans } from "./postprocess";
import type { SpeechModelHandle } from "./speechModel";
import type { SegmenterConfig, SpeechSegmenter } from "./types";

const modelLog = createLogger("ModelVAD");

export class ModelSpeechSegmenter implements SpeechSegmenter {
  readonly name = "model";
  private readonly handle: SpeechModelHandle;
  private readonly defaults: Partial<SegmenterConfig>;

  constructor(handle: SpeechModelHandle, defaults: Partial<SegmenterConfig> = {}) {
    this.handle = handle;
    this.defaults = defaults;
  }

  async detectSpeech(
    signal: AudioSignal,
    sampleRate: number,
    config: Partial<SegmenterConfig> = {},
  ): Promise<SpeechInterval[]> {
    assertSampleRate(sampleRate);
    const resolved = resolveSegmenterConfig({ ...this.defaults, ...config });
    if (signal.length === 0) return [];

    const model = await this.handle.get();
    const resampled = resampleSignal(signal, sampleRate, model.sampleRate);
    if (resampled.length < model.minWindowSamples) {
      modelLog.debug("Signal shorter than one model window:", resampled.length);
      return [];
    }

    const spans = await model.detectSpans(resampled);
    modelLog.debug("Raw model spans:", spans.length);

    const merged = mergeCloseSpans(spans, resolved.minSilenceMs / 1000);
    return dropShortSpans(merged, resolved.minSpeechMs / 1000);
  }
}

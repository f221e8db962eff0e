/**
 * Speech Model Handle
 *
 * A learned detector is expensive to construct, so it is loaded once and
 * shared. The handle memoises the load; a failed load is forgotten so the
 * next caller retries.
 */

import type { SpeechInterval } from "@turnlab/types";

/**
 * A loaded speech-detection model. Spans are in seconds, relative to the
 * start of the signal passed in, and already at the model's sample rate.
 */
export interface SpeechModel {
  readonly sampleRate: number;
  /** Signals shorter than this cannot be scored */
  readonly minWindowSamples: number;
  detectSpans(signal: Float32Array): Promise<SpeechInterval[]>;
}

export type SpeechModelLoader<TModel extends SpeechModel> = () => Promise<TModel>;

export class SpeechModelHandle<TModel extends SpeechModel = SpeechModel> {
  private readonly loader: SpeechModelLoader<TModel>;
  private pending: Promise<TModel> | null = null;
  private loaded = false;

  constructor(loader: SpeechModelLoader<TModel>) {
    this.loader = loader;
  }

  get(): Promise<TModel> {
    if (!this.pending) {
      this.pending = this.loader().then(
        (model) => {
          this.loaded = true;
          return model;
        },
        (error: unknown) => {
          this.pending = null;
          throw error;
        },
      );
    }
    return this.pending;
  }

  isLoaded(): boolean {
    return this.loaded;
  }
}

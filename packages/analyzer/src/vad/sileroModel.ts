/**
 * Silero Speech Model
 *
 * Runs the Silero VAD ONNX model through onnxruntime-web's WASM backend.
 * The signal is scored in consecutive windows with the recurrent state
 * carried across windows, and window probabilities are turned into spans
 * with a two-threshold hysteresis.
 *
 * Model input: windowSamples float32 samples at 16kHz, state [2, 1, 128],
 * sr (int64 scalar). Output: speech probability and the next state.
 */

import * as ort from "onnxruntime-web";
import type { SpeechInterval } from "@turnlab/types";
import { createLogger } from "@turnlab/telemetry";
import { ModelLoadError } from "../errors";
import { createSpeechInterval } from "./postprocess";
import { SpeechModelHandle, type SpeechModel } from "./speechModel";

const sileroLog = createLogger("SileroVAD");

// Silero VAD recurrent state: 2 tensors (h, c), 1 batch, 128 hidden
const STATE_DIMS = [2, 1, 128];
const STATE_SIZE = 2 * 1 * 128;

// ============================================================================
// Configuration
// ============================================================================

export interface SileroModelConfig {
  /** Path to the ONNX model file */
  modelPath: string;
  /** Rate the model was trained at (Hz) */
  sampleRate: number;
  /** Samples per inference window (512 = 32ms at 16kHz) */
  windowSamples: number;
  /** Probability at which speech starts */
  speechThreshold: number;
  /** Speech ends once probability drops below speechThreshold minus this */
  negThresholdOffset: number;
}

export const DEFAULT_SILERO_MODEL_CONFIG: SileroModelConfig = {
  modelPath: "silero_vad.onnx",
  sampleRate: 16000,
  windowSamples: 512,
  speechThreshold: 0.5,
  negThresholdOffset: 0.15,
};

// ============================================================================
// Probability → Spans
// ============================================================================

export interface HysteresisOptions {
  windowSamples: number;
  sampleRate: number;
  speechThreshold: number;
  negThreshold: number;
}

export function probabilitiesToSpans(
  probabilities: ArrayLike<number>,
  options: HysteresisOptions,
): SpeechInterval[] {
  const windowSec = options.windowSamples / options.sampleRate;
  const spans: SpeechInterval[] = [];
  let start = -1;

  for (let i = 0; i < probabilities.length; i++) {
    const probability = probabilities[i];
    if (start < 0 && probability >= options.speechThreshold) {
      start = i;
    } else if (start >= 0 && probability < options.negThreshold) {
      spans.push(createSpeechInterval(start * windowSec, i * windowSec));
      start = -1;
    }
  }

  if (start >= 0) {
    spans.push(createSpeechInterval(start * windowSec, probabilities.length * windowSec));
  }

  return spans;
}

// ============================================================================
// SileroSpeechModel
// ============================================================================

export class SileroSpeechModel implements SpeechModel {
  readonly sampleRate: number;
  readonly minWindowSamples: number;
  private readonly session: ort.InferenceSession;
  private readonly config: SileroModelConfig;

  private constructor(session: ort.InferenceSession, config: SileroModelConfig) {
    this.session = session;
    this.config = config;
    this.sampleRate = config.sampleRate;
    this.minWindowSamples = config.windowSamples;
  }

  static async load(config: Partial<SileroModelConfig> = {}): Promise<SileroSpeechModel> {
    const resolved = { ...DEFAULT_SILERO_MODEL_CONFIG, ...config };

    try {
      ort.env.wasm.numThreads = 1;

      const session = await ort.InferenceSession.create(resolved.modelPath, {
        executionProviders: ["wasm"],
        graphOptimizationLevel: "all",
      });

      sileroLog.debug("Loaded model:", resolved.modelPath);
      return new SileroSpeechModel(session, resolved);
    } catch (error) {
      throw new ModelLoadError(resolved.modelPath, error);
    }
  }

  async detectSpans(signal: Float32Array): Promise<SpeechInterval[]> {
    const probabilities = await this.scoreWindows(signal);

    return probabilitiesToSpans(probabilities, {
      windowSamples: this.config.windowSamples,
      sampleRate: this.config.sampleRate,
      speechThreshold: this.config.speechThreshold,
      negThreshold: this.config.speechThreshold - this.config.negThresholdOffset,
    });
  }

  private async scoreWindows(signal: Float32Array): Promise<number[]> {
    const { windowSamples } = this.config;
    const state = new Float32Array(STATE_SIZE);
    const sr = new BigInt64Array([BigInt(this.config.sampleRate)]);
    const probabilities: number[] = [];

    for (let offset = 0; offset + windowSamples <= signal.length; offset += windowSamples) {
      const feeds = {
        input: new ort.Tensor("float32", signal.slice(offset, offset + windowSamples), [1, windowSamples]),
        state: new ort.Tensor("float32", state, STATE_DIMS),
        sr: new ort.Tensor("int64", sr, []),
      };

      // Windows run in order: each one consumes the previous state
      const results = await this.session.run(feeds);
      const output = results.output.data;
      const nextState = results.stateN.data;
      if (!(output instanceof Float32Array) || !(nextState instanceof Float32Array)) {
        throw new Error("Unexpected Silero VAD output tensor type");
      }

      probabilities.push(output[0]);
      state.set(nextState);
    }

    return probabilities;
  }
}

/**
 * Lazily loaded, shared Silero model.
 */
export function createSileroModelHandle(
  config: Partial<SileroModelConfig> = {},
): SpeechModelHandle<SileroSpeechModel> {
  return new SpeechModelHandle(() => SileroSpeechModel.load(config));
}

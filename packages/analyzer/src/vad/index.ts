/**
 * Speech Segmentation Module
 *
 * Two interchangeable strategies behind SpeechSegmenter: a frame-energy
 * classifier and a learned model (Silero VAD) consulted after resampling.
 */

export {
  type SegmenterConfig,
  type ThresholdSetting,
  type SpeechSegmenter,
  type FrameRun,
  DEFAULT_SEGMENTER_CONFIG,
} from "./types";

export { resolveSegmenterConfig } from "./config";

export {
  createSpeechInterval,
  framesToRuns,
  mergeFrameRuns,
  dropShortRuns,
  framesToSegments,
  mergeCloseSpans,
  dropShortSpans,
} from "./postprocess";

export { detectSpeechEnergy, EnergySpeechSegmenter } from "./energySegmenter";

export {
  type SpeechModel,
  type SpeechModelLoader,
  SpeechModelHandle,
} from "./speechModel";

export { ModelSpeechSegmenter } from "./modelSegmenter";

export {
  type SileroModelConfig,
  type HysteresisOptions,
  DEFAULT_SILERO_MODEL_CONFIG,
  SileroSpeechModel,
  createSileroModelHandle,
  probabilitiesToSpans,
} from "./sileroModel";

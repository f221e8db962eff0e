/**
 * Audio Utilities
 *
 * Frame energy, percentiles and rate conversion.
 */

export { frameRms, percentile, autoThreshold } from "./signalMath";
export { resampleSignal, resampleRatio, type ResampleRatio } from "./resampler";

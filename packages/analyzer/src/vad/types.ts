/**
 * Speech Segmentation Types
 *
 * Shared contract for the interchangeable segmentation strategies.
 */

import type { AudioSignal, SpeechInterval } from "@turnlab/types";

// ============================================================================
// Configuration
// ============================================================================

/**
 * Fixed RMS threshold, or "auto" to derive one from the frame energy
 * distribution.
 */
export type ThresholdSetting = number | "auto";

export interface SegmenterConfig {
  /** Analysis frame length (ms) */
  frameMs: number;
  /** RMS threshold for a speech frame */
  threshold: ThresholdSetting;
  /** Segments shorter than this are dropped (ms) */
  minSpeechMs: number;
  /** Gaps shorter than this are bridged (ms) */
  minSilenceMs: number;
}

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  frameMs: 30,
  threshold: "auto",
  minSpeechMs: 200,
  minSilenceMs: 300,
};

// ============================================================================
// Segmenter Contract
// ============================================================================

/**
 * Turns one channel into ordered, non-overlapping speech intervals.
 * Empty, too-short and silent signals resolve to an empty list.
 */
export interface SpeechSegmenter {
  readonly name: string;
  detectSpeech(
    signal: AudioSignal,
    sampleRate: number,
    config?: Partial<SegmenterConfig>,
  ): Promise<SpeechInterval[]>;
}

/**
 * Frame index range, end exclusive.
 */
export type FrameRun = readonly [start: number, end: number];

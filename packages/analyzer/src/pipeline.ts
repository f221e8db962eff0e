/**
 * Conversation Pipeline
 *
 * Segments both channels with the supplied strategy and aggregates the
 * result. Channels are processed one after the other.
 */

import type {
  AudioSignal,
  ConversationStats,
  SpeakerLabels,
  SpeechInterval,
} from "@turnlab/types";
import { assertSampleRate } from "./errors";
import { computeConversationStats, DEFAULT_SPEAKER_LABELS } from "./stats/conversationStats";
import type { SegmenterConfig, SpeechSegmenter } from "./vad/types";

export interface ConversationInput {
  left: AudioSignal;
  right: AudioSignal;
  sampleRate: number;
  segmenter: SpeechSegmenter;
  labels?: SpeakerLabels;
  config?: Partial<SegmenterConfig>;
}

export interface ConversationAnalysis {
  segmentsA: SpeechInterval[];
  segmentsB: SpeechInterval[];
  stats: ConversationStats;
}

export async function analyzeConversation({
  left,
  right,
  sampleRate,
  segmenter,
  labels = DEFAULT_SPEAKER_LABELS,
  config = {},
}: ConversationInput): Promise<ConversationAnalysis> {
  assertSampleRate(sampleRate);
  const durationSec = left.length / sampleRate;

  const segmentsA = await segmenter.detectSpeech(left, sampleRate, config);
  const segmentsB = await segmenter.detectSpeech(right, sampleRate, config);

  return {
    segmentsA,
    segmentsB,
    stats: computeConversationStats(segmentsA, segmentsB, durationSec, labels),
  };
}

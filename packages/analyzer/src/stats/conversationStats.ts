/**
 * Conversation Statistics
 *
 * Assembles per-speaker and whole-recording figures from the turn-taking
 * building blocks. Percentages are of the recording duration and are 0
 * for an empty recording.
 */

import type {
  ConversationStats,
  Interruption,
  SpeakerLabels,
  SpeakerStats,
  SpeechInterval,
  Turn,
} from "@turnlab/types";
import { assertDuration } from "../errors";
import { buildTurns, turnDuration } from "../turnTaking/turnBuilder";
import { detectInterruptions } from "../turnTaking/interruptionDetector";
import { computeResponseTimes } from "../turnTaking/responseTimes";
import { computeOverlap } from "../turnTaking/overlap";
import { computeSilence } from "../turnTaking/silence";
import { summarize } from "./distribution";

export const DEFAULT_SPEAKER_LABELS: SpeakerLabels = {
  a: "Speaker A",
  b: "Speaker B",
};

function percentOf(part: number, durationSec: number): number {
  return durationSec > 0 ? (part / durationSec) * 100 : 0;
}

function totalDuration(segments: readonly SpeechInterval[]): number {
  return segments.reduce((sum, segment) => sum + (segment.end - segment.start), 0);
}

interface SpeakerInputs {
  label: string;
  segments: readonly SpeechInterval[];
  turns: readonly Turn[];
  responseTimes: readonly number[];
  interruptions: readonly Interruption[];
  durationSec: number;
}

export function buildSpeakerStats({
  label,
  segments,
  turns,
  responseTimes,
  interruptions,
  durationSec,
}: SpeakerInputs): SpeakerStats {
  const totalTalkTime = totalDuration(segments);
  const turnDurations = turns.filter((turn) => turn.speaker === label).map(turnDuration);
  const yieldingLatencies = interruptions
    .filter((event) => event.interrupted === label)
    .map((event) => event.yieldingLatency);

  return Object.freeze({
    label,
    totalTalkTime,
    talkTimePct: percentOf(totalTalkTime, durationSec),
    numTurns: turnDurations.length,
    turnDurations: Object.freeze(turnDurations),
    responseTimes: Object.freeze([...responseTimes]),
    interruptionsMade: interruptions.filter((event) => event.interrupter === label).length,
    timesInterrupted: yieldingLatencies.length,
    yieldingLatencies: Object.freeze(yieldingLatencies),
    turnDuration: summarize(turnDurations),
    responseTime: summarize(responseTimes),
    yieldingLatency: summarize(yieldingLatencies),
  });
}

export function computeConversationStats(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
  durationSec: number,
  labels: SpeakerLabels = DEFAULT_SPEAKER_LABELS,
): ConversationStats {
  assertDuration(durationSec);

  const turns = buildTurns(segmentsA, segmentsB, labels.a, labels.b);
  const responseTimes = computeResponseTimes(turns, labels.a, labels.b);
  const interruptions = detectInterruptions(segmentsA, segmentsB, labels.a, labels.b);
  const totalOverlapSec = computeOverlap(segmentsA, segmentsB);
  const silence = computeSilence(segmentsA, segmentsB, durationSec);

  const speakerA = buildSpeakerStats({
    label: labels.a,
    segments: segmentsA,
    turns,
    responseTimes: responseTimes.a,
    interruptions,
    durationSec,
  });
  const speakerB = buildSpeakerStats({
    label: labels.b,
    segments: segmentsB,
    turns,
    responseTimes: responseTimes.b,
    interruptions,
    durationSec,
  });

  return Object.freeze({
    durationSec,
    speakerA,
    speakerB,
    turns: Object.freeze(turns),
    interruptions: Object.freeze(interruptions),
    totalOverlapSec,
    overlapPct: percentOf(totalOverlapSec, durationSec),
    totalSilenceSec: silence.totalSec,
    silencePct: percentOf(silence.totalSec, durationSec),
    numPauses: silence.count,
    avgPauseDuration: silence.avgSec,
    longestPause: silence.longestSec,
    pauses: silence.pauses,
  });
}

/**
 * Turnlab Shared Types
 * Value types exchanged between the analyzer, the CLI and report consumers
 */

// ============================================================================
// Segmentation Types
// ============================================================================

/**
 * A span of detected speech on one channel, in seconds.
 * Lists of intervals for one speaker are sorted by start and never overlap.
 */
export interface SpeechInterval {
  readonly start: number;
  readonly end: number;
}

/**
 * Any sample container the analyzer can read from.
 * Samples are expected to be normalized to [-1, 1].
 */
export type AudioSignal = ArrayLike<number>;

export interface SpeakerLabels {
  /** Label of the left channel */
  a: string;
  /** Label of the right channel */
  b: string;
}

// ============================================================================
// Turn-Taking Types
// ============================================================================

export interface Turn {
  readonly speaker: string;
  readonly start: number;
  readonly end: number;
}

export interface Interruption {
  readonly interrupter: string;
  readonly interrupted: string;
  /** Start of the interrupter's interval (seconds) */
  readonly startTime: number;
  /** Time from the interruption until the interrupted interval ends */
  readonly yieldingLatency: number;
  /** How long the interrupted party had been speaking when cut in on */
  readonly speechBefore: number;
  /** Length of the interrupter's interval */
  readonly interrupterDuration: number;
  /** Interrupted party stopped no later than the interrupter */
  readonly yielded: boolean;
}

/**
 * A clean handoff between speakers (positive gap only).
 */
export interface ResponseTransition {
  /** End of the previous turn (seconds) */
  readonly at: number;
  readonly from: string;
  readonly to: string;
  readonly gap: number;
}

// ============================================================================
// Statistics Types
// ============================================================================

/**
 * Summary of a sample set. Every field is 0 for an empty set.
 */
export interface DistributionSummary {
  readonly mean: number;
  readonly median: number;
  readonly std: number;
  readonly min: number;
  readonly max: number;
}

export interface SpeakerStats {
  readonly label: string;
  readonly totalTalkTime: number;
  readonly talkTimePct: number;
  readonly numTurns: number;
  readonly turnDurations: readonly number[];
  readonly responseTimes: readonly number[];
  readonly interruptionsMade: number;
  readonly timesInterrupted: number;
  /** Latencies experienced while this speaker was being interrupted */
  readonly yieldingLatencies: readonly number[];
  readonly turnDuration: DistributionSummary;
  readonly responseTime: DistributionSummary;
  readonly yieldingLatency: DistributionSummary;
}

export interface PauseSummary {
  readonly totalSec: number;
  readonly count: number;
  readonly avgSec: number;
  readonly longestSec: number;
  /** Individual pause lengths in chronological order */
  readonly pauses: readonly number[];
}

export interface ConversationStats {
  readonly durationSec: number;
  readonly speakerA: SpeakerStats;
  readonly speakerB: SpeakerStats;
  readonly turns: readonly Turn[];
  readonly interruptions: readonly Interruption[];
  readonly totalOverlapSec: number;
  readonly overlapPct: number;
  readonly totalSilenceSec: number;
  readonly silencePct: number;
  readonly numPauses: number;
  readonly avgPauseDuration: number;
  readonly longestPause: number;
  /** Pause lengths in chronological order */
  readonly pauses: readonly number[];
}

// ============================================================================
// Reporting Types
// ============================================================================

/**
 * Step series of accumulated talk time, for cumulative charts.
 */
export interface CumulativeSeries {
  readonly times: readonly number[];
  readonly cumulative: readonly number[];
}

export interface TalkShare {
  readonly label: string;
  readonly seconds: number;
  readonly pct: number;
}

/**
 * Report Rendering
 *
 * Plain-text and JSON views of a finished analysis.
 */

import {
  cumulativeTalkSeries,
  filterYieldingEvents,
  listResponseTransitions,
  speakerShares,
  splitTransitionsByDirection,
  turnDuration,
  type DirectionalGaps,
} from "@turnlab/analyzer";
import type {
  ConversationStats,
  CumulativeSeries,
  SpeakerStats,
  TalkShare,
} from "@turnlab/types";

/**
 * Shape written by `--format json`: the statistics plus chart-ready series.
 */
export interface JsonReport {
  stats: ConversationStats;
  series: {
    shares: TalkShare[];
    cumulative: { a: CumulativeSeries; b: CumulativeSeries };
    gaps: DirectionalGaps;
  };
}

const METRIC_WIDTH = 24;
const VALUE_WIDTH = 22;
const CLOCK_WIDTH = 9;

/**
 * m:ss.ss with unpadded minutes.
 */
export function formatClock(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds - minutes * 60;
  return `${minutes}:${rest.toFixed(2).padStart(5, "0")}`;
}

const secs = (value: number, decimals = 2) => `${value.toFixed(decimals)}s`;
const pct = (value: number) => `${value.toFixed(1)}%`;

function formatRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, i) => (i < cells.length - 1 ? cell.padEnd(widths[i] ?? 0) : cell))
    .join("  ")
    .trimEnd();
}

// ============================================================================
// Sections
// ============================================================================

function summarySection(stats: ConversationStats): string[] {
  const a = stats.speakerA;
  const b = stats.speakerB;
  const widths = [METRIC_WIDTH, VALUE_WIDTH];
  const row = (label: string, value: (speaker: SpeakerStats) => string) =>
    formatRow([label, value(a), value(b)], widths);

  return [
    "Summary Statistics",
    formatRow(["Metric", a.label, b.label], widths),
    row("Total talk time", (s) => `${secs(s.totalTalkTime)} (${pct(s.talkTimePct)})`),
    row("Number of turns", (s) => String(s.numTurns)),
    row("Avg turn duration", (s) => secs(s.turnDuration.mean)),
    row("Median turn duration", (s) => secs(s.turnDuration.median)),
    row("Min / Max turn", (s) => `${secs(s.turnDuration.min)} / ${secs(s.turnDuration.max)}`),
    row("Avg response time", (s) => secs(s.responseTime.mean)),
    row("Median response time", (s) => secs(s.responseTime.median)),
    row("Std response time", (s) => secs(s.responseTime.std)),
    row("Min / Max response time", (s) => `${secs(s.responseTime.min)} / ${secs(s.responseTime.max)}`),
    row("Interruptions made", (s) => String(s.interruptionsMade)),
    row("Times interrupted", (s) => String(s.timesInterrupted)),
    row("Avg yielding latency", (s) => secs(s.yieldingLatency.mean)),
    row("Median yielding latency", (s) => secs(s.yieldingLatency.median)),
  ];
}

function shareSection(stats: ConversationStats): string[] {
  const widths = [METRIC_WIDTH];
  return [
    "Talk share",
    ...speakerShares(stats).map((share) =>
      formatRow([share.label, `${secs(share.seconds)} (${pct(share.pct)})`], widths),
    ),
  ];
}

function conversationSection(stats: ConversationStats): string[] {
  const widths = [METRIC_WIDTH];
  return [
    formatRow(["Total overlap", `${secs(stats.totalOverlapSec)} (${pct(stats.overlapPct)})`], widths),
    formatRow(["Total silence", `${secs(stats.totalSilenceSec)} (${pct(stats.silencePct)})`], widths),
    formatRow(
      [
        "Pauses",
        `${stats.numPauses} pauses, avg ${secs(stats.avgPauseDuration)}, longest ${secs(stats.longestPause)}`,
      ],
      widths,
    ),
  ];
}

function turnSection(stats: ConversationStats): string[] {
  if (stats.turns.length === 0) return [];

  const speakerWidth = Math.max("Speaker".length, stats.speakerA.label.length, stats.speakerB.label.length);
  const widths = [speakerWidth, CLOCK_WIDTH, CLOCK_WIDTH];

  return [
    `Turns (${stats.turns.length})`,
    formatRow(["Speaker", "Start", "End", "Duration"], widths),
    ...stats.turns.map((turn) =>
      formatRow(
        [turn.speaker, formatClock(turn.start), formatClock(turn.end), secs(turnDuration(turn))],
        widths,
      ),
    ),
  ];
}

function responseSection(stats: ConversationStats): string[] {
  const transitions = listResponseTransitions(stats.turns);
  if (transitions.length === 0) return [];

  const a = stats.speakerA.label;
  const b = stats.speakerB.label;
  const aToB = `${a} → ${b}`;
  const widths = [CLOCK_WIDTH, aToB.length];

  return [
    `Response times (${transitions.length})`,
    formatRow(["At", aToB, `${b} → ${a}`], widths),
    ...transitions.map((transition) => {
      const gap = secs(transition.gap, 3);
      return formatRow(
        [formatClock(transition.at), transition.from === a ? gap : "", transition.from === b ? gap : ""],
        widths,
      );
    }),
  ];
}

/**
 * Times speaker B gave way after a sustained stretch of speech was cut in
 * on by speaker A.
 */
function yieldSection(stats: ConversationStats): string[] {
  const yields = filterYieldingEvents(stats.interruptions, {
    interrupter: stats.speakerA.label,
    minInterrupterDuration: 2.0,
    requireYielded: true,
  });
  if (yields.length === 0) return [];

  const widths = [CLOCK_WIDTH, "Speaking before".length];

  return [
    `${stats.speakerB.label} yields (${yields.length})`,
    formatRow(["At", "Speaking before", "Yielding latency"], widths),
    ...yields.map((event) =>
      formatRow(
        [formatClock(event.startTime), secs(event.speechBefore, 1), secs(event.yieldingLatency, 3)],
        widths,
      ),
    ),
  ];
}

// ============================================================================
// Renderers
// ============================================================================

export function renderTextReport(stats: ConversationStats): string {
  const sections = [
    ["Conversation Analysis Report", `Recording duration: ${stats.durationSec.toFixed(1)} seconds`],
    summarySection(stats),
    shareSection(stats),
    conversationSection(stats),
    turnSection(stats),
    responseSection(stats),
    yieldSection(stats),
  ].filter((lines) => lines.length > 0);

  return `${sections.map((lines) => lines.join("\n")).join("\n\n")}\n`;
}

export function buildJsonReport(stats: ConversationStats): JsonReport {
  const a = stats.speakerA.label;
  const b = stats.speakerB.label;

  return {
    stats,
    series: {
      shares: speakerShares(stats),
      cumulative: {
        a: cumulativeTalkSeries(stats.turns, a),
        b: cumulativeTalkSeries(stats.turns, b),
      },
      gaps: splitTransitionsByDirection(listResponseTransitions(stats.turns), a),
    },
  };
}

export function renderJsonReport(stats: ConversationStats): string {
  return `${JSON.stringify(buildJsonReport(stats), null, 2)}\n`;
}

/**
 * Conversation Statistics Tests
 *
 * End-to-end aggregation over hand-built speech intervals.
 */

import { describe, it, expect } from "vitest";
import { AnalysisContractError } from "../errors";
import { EMPTY_DISTRIBUTION } from "./distribution";
import { computeConversationStats, DEFAULT_SPEAKER_LABELS } from "./conversationStats";

const LABELS = { a: "A", b: "B" };

describe("computeConversationStats", () => {
  describe("clean alternation", () => {
    const stats = computeConversationStats(
      [
        { start: 0, end: 2 },
        { start: 6, end: 8 },
      ],
      [{ start: 3, end: 5 }],
      10,
      LABELS,
    );

    it("should measure handoff gaps for both speakers", () => {
      expect(stats.speakerA.responseTimes).toEqual([1]);
      expect(stats.speakerB.responseTimes).toEqual([1]);
      expect(stats.speakerB.responseTime.mean).toBe(1);
    });

    it("should report no interruptions or overlap", () => {
      expect(stats.interruptions).toEqual([]);
      expect(stats.totalOverlapSec).toBe(0);
      expect(stats.overlapPct).toBe(0);
      expect(stats.speakerA.yieldingLatency).toEqual(EMPTY_DISTRIBUTION);
    });

    it("should count turns and talk time per speaker", () => {
      expect(stats.turns).toHaveLength(3);
      expect(stats.speakerA.numTurns).toBe(2);
      expect(stats.speakerA.turnDurations).toEqual([2, 2]);
      expect(stats.speakerA.totalTalkTime).toBe(4);
      expect(stats.speakerA.talkTimePct).toBeCloseTo(40, 9);
      expect(stats.speakerB.numTurns).toBe(1);
      expect(stats.speakerB.totalTalkTime).toBe(2);
    });

    it("should collect the pauses between speech", () => {
      expect(stats.totalSilenceSec).toBe(4);
      expect(stats.silencePct).toBeCloseTo(40, 9);
      expect(stats.numPauses).toBe(3);
      expect(stats.avgPauseDuration).toBeCloseTo(4 / 3, 9);
      expect(stats.longestPause).toBe(2);
    });

    it("should list each pause in order", () => {
      expect(stats.pauses).toEqual([1, 1, 2]);
    });
  });

  describe("overlapping interruption", () => {
    const stats = computeConversationStats([{ start: 0, end: 4 }], [{ start: 3, end: 6 }], 6, LABELS);

    it("should record the interruption and its yielding latency", () => {
      expect(stats.interruptions).toEqual([
        {
          interrupter: "B",
          interrupted: "A",
          startTime: 3,
          yieldingLatency: 1,
          speechBefore: 3,
          interrupterDuration: 3,
          yielded: true,
        },
      ]);
      expect(stats.speakerB.interruptionsMade).toBe(1);
      expect(stats.speakerA.timesInterrupted).toBe(1);
      expect(stats.speakerA.yieldingLatencies).toEqual([1]);
      expect(stats.speakerA.yieldingLatency.mean).toBe(1);
    });

    it("should measure the overlap and take no response samples", () => {
      expect(stats.totalOverlapSec).toBe(1);
      expect(stats.overlapPct).toBeCloseTo(100 / 6, 9);
      expect(stats.speakerA.responseTimes).toEqual([]);
      expect(stats.speakerB.responseTimes).toEqual([]);
      expect(stats.totalSilenceSec).toBe(0);
      expect(stats.numPauses).toBe(0);
      expect(stats.pauses).toEqual([]);
    });
  });

  describe("no speech", () => {
    const stats = computeConversationStats([], [], 10);

    it("should report the whole recording as one pause", () => {
      expect(stats.totalSilenceSec).toBe(10);
      expect(stats.silencePct).toBe(100);
      expect(stats.numPauses).toBe(1);
      expect(stats.longestPause).toBe(10);
      expect(stats.pauses).toEqual([10]);
    });

    it("should report zeroed distributions under the default labels", () => {
      expect(stats.speakerA.label).toBe(DEFAULT_SPEAKER_LABELS.a);
      expect(stats.speakerB.label).toBe(DEFAULT_SPEAKER_LABELS.b);
      for (const speaker of [stats.speakerA, stats.speakerB]) {
        expect(speaker.numTurns).toBe(0);
        expect(speaker.totalTalkTime).toBe(0);
        expect(speaker.turnDuration).toEqual(EMPTY_DISTRIBUTION);
        expect(speaker.responseTime).toEqual(EMPTY_DISTRIBUTION);
        expect(speaker.yieldingLatency).toEqual(EMPTY_DISTRIBUTION);
      }
    });
  });

  it("should report zero percentages for an empty recording", () => {
    const stats = computeConversationStats([], [], 0);

    expect(stats.silencePct).toBe(0);
    expect(stats.overlapPct).toBe(0);
    expect(stats.speakerA.talkTimePct).toBe(0);
  });

  it("should reject a negative duration", () => {
    expect(() => computeConversationStats([], [], -5)).toThrow(AnalysisContractError);
  });
});

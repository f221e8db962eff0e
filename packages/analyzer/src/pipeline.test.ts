import { describe, it, expect, vi } from "vitest";
import type { AudioSignal, SpeechInterval } from "@turnlab/types";
import { AnalysisContractError } from "./errors";
import { analyzeConversation } from "./pipeline";
import { EnergySpeechSegmenter } from "./vad/energySegmenter";
import type { SegmenterConfig, SpeechSegmenter } from "./vad/types";

const loudBetween = (length: number, from: number, to: number): Float64Array => {
  const signal = new Float64Array(length);
  signal.fill(0.5, from, to);
  return signal;
};

describe("analyzeConversation", () => {
  it("should segment both channels and aggregate the result", async () => {
    const result = await analyzeConversation({
      left: loudBetween(1000, 0, 300),
      right: loudBetween(1000, 500, 800),
      sampleRate: 1000,
      segmenter: new EnergySpeechSegmenter(),
      labels: { a: "Human", b: "Agent" },
      config: { frameMs: 10, threshold: 0.1, minSpeechMs: 50, minSilenceMs: 100 },
    });

    expect(result.segmentsA).toEqual([{ start: 0, end: 0.3 }]);
    expect(result.segmentsB).toEqual([{ start: 0.5, end: 0.8 }]);
    expect(result.stats.durationSec).toBe(1);
    expect(result.stats.speakerB.label).toBe("Agent");
    expect(result.stats.speakerB.responseTimes).toHaveLength(1);
    expect(result.stats.speakerB.responseTimes[0]).toBeCloseTo(0.2, 9);
    expect(result.stats.interruptions).toEqual([]);
  });

  it("should pass the configuration to the segmenter for each channel", async () => {
    const detectSpeech = vi.fn(
      async (_signal: AudioSignal, _rate: number, _config?: Partial<SegmenterConfig>): Promise<SpeechInterval[]> => [],
    );
    const segmenter: SpeechSegmenter = { name: "fake", detectSpeech };
    const left = new Float32Array(16000);
    const right = new Float32Array(16000);

    const result = await analyzeConversation({
      left,
      right,
      sampleRate: 16000,
      segmenter,
      config: { minSpeechMs: 100 },
    });

    expect(detectSpeech).toHaveBeenNthCalledWith(1, left, 16000, { minSpeechMs: 100 });
    expect(detectSpeech).toHaveBeenNthCalledWith(2, right, 16000, { minSpeechMs: 100 });
    expect(result.stats.totalSilenceSec).toBe(1);
    expect(result.stats.speakerA.label).toBe("Speaker A");
  });

  it("should reject a non-positive sample rate", async () => {
    await expect(
      analyzeConversation({
        left: [],
        right: [],
        sampleRate: 0,
        segmenter: new EnergySpeechSegmenter(),
      }),
    ).rejects.toThrow(AnalysisContractError);
  });
});

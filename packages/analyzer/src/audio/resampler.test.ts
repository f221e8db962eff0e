import { describe, it, expect } from "vitest";
import { AnalysisContractError } from "../errors";
import { resampleRatio, resampleSignal } from "./resampler";

describe("resampleRatio", () => {
  it("should reduce the rate pair", () => {
    expect(resampleRatio(44100, 16000)).toEqual({ up: 160, down: 441 });
    expect(resampleRatio(8000, 16000)).toEqual({ up: 2, down: 1 });
    expect(resampleRatio(16000, 16000)).toEqual({ up: 1, down: 1 });
  });
});

describe("resampleSignal", () => {
  it("should return an equal copy when rates match", () => {
    const signal = new Float32Array([0.25, -0.5, 0.75]);
    const result = resampleSignal(signal, 16000, 16000);

    expect(result).not.toBe(signal);
    expect(Array.from(result)).toEqual([0.25, -0.5, 0.75]);
  });

  it("should interpolate when upsampling", () => {
    const result = resampleSignal([0, 1, 2, 3], 8000, 16000);
    expect(Array.from(result)).toEqual([0, 0.5, 1, 1.5, 2, 2.5, 3, 3]);
  });

  it("should pick every other sample when halving the rate", () => {
    const result = resampleSignal([0, 1, 2, 3, 4, 5], 16000, 8000);
    expect(Array.from(result)).toEqual([0, 2, 4]);
  });

  it("should size the output by the rate ratio", () => {
    expect(resampleSignal(new Float32Array(441), 44100, 16000).length).toBe(160);
  });

  it("should return an empty signal for empty input", () => {
    expect(resampleSignal([], 8000, 16000).length).toBe(0);
  });

  it("should reject non-positive rates", () => {
    expect(() => resampleSignal([0], -8000, 16000)).toThrow(AnalysisContractError);
    expect(() => resampleSignal([0], 8000, 0)).toThrow(AnalysisContractError);
  });
});

import { describe, it, expect } from "vitest";
import { ConfigError, defaultOutputPath, parseCliArgs, readEnvironment, type CliOptions } from "./config";

function analyzeOptions(argv: string[]): CliOptions {
  const command = parseCliArgs(argv);
  if (command.kind !== "analyze") {
    return expect.unreachable("expected an analyze command");
  }
  return command.options;
}

function configError(argv: string[]): ConfigError {
  try {
    parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  return expect.unreachable("expected a ConfigError");
}

describe("parseCliArgs", () => {
  it("should apply the defaults", () => {
    expect(analyzeOptions(["calls/intro.wav"])).toEqual({
      input: "calls/intro.wav",
      output: "calls/intro_report.txt",
      format: "text",
      strategy: "energy",
      modelPath: undefined,
      labels: { a: "Human", b: "Agent" },
      segmenter: { frameMs: 30, threshold: "auto", minSpeechMs: 200, minSilenceMs: 300 },
    });
  });

  it("should read every option", () => {
    const options = analyzeOptions([
      "rec.wav",
      "-o",
      "out/summary.json",
      "-t",
      "0.02",
      "-a",
      "Caller",
      "-b",
      "Operator",
      "--frame-size",
      "20",
      "--min-speech",
      "150",
      "--min-silence",
      "400",
      "--format",
      "json",
    ]);

    expect(options.output).toBe("out/summary.json");
    expect(options.format).toBe("json");
    expect(options.labels).toEqual({ a: "Caller", b: "Operator" });
    expect(options.segmenter).toEqual({ frameMs: 20, threshold: 0.02, minSpeechMs: 150, minSilenceMs: 400 });
  });

  it("should accept an explicit auto threshold", () => {
    expect(analyzeOptions(["rec.wav", "--threshold", "auto"]).segmenter.threshold).toBe("auto");
  });

  it("should select the model strategy with a model path", () => {
    const options = analyzeOptions(["rec.wav", "--strategy", "model", "--model", "models/vad.onnx"]);

    expect(options.strategy).toBe("model");
    expect(options.modelPath).toBe("models/vad.onnx");
  });

  it("should default the JSON report path", () => {
    expect(analyzeOptions(["rec.wav", "--format", "json"]).output).toBe("rec_report.json");
  });

  it("should recognise the help flag", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["-h", "rec.wav"])).toEqual({ kind: "help" });
  });

  it.each([
    { argv: [], field: "input" },
    { argv: ["rec.wav", "--frame-size", "0"], field: "frameSize" },
    { argv: ["rec.wav", "--frame-size", "12.5"], field: "frameSize" },
    { argv: ["rec.wav", "--min-speech=-5"], field: "minSpeech" },
    { argv: ["rec.wav", "--threshold", "loud"], field: "threshold" },
    { argv: ["rec.wav", "-t", ""], field: "threshold" },
    { argv: ["rec.wav", "--threshold", "   "], field: "threshold" },
    { argv: ["rec.wav", "--format", "html"], field: "format" },
    { argv: ["rec.wav", "--strategy", "neural"], field: "strategy" },
    { argv: ["rec.wav", "--model", "vad.onnx"], field: "model" },
  ])("should reject $argv with a $field error", ({ argv, field }) => {
    const error = configError(argv);

    expect(error.fieldErrors[field]).toBeDefined();
    expect(error.message).toMatch(new RegExp(`^Invalid ${field}: `));
  });

  it("should reject unknown options", () => {
    expect(() => parseCliArgs(["rec.wav", "--verbose"])).toThrow(ConfigError);
  });

  it("should reject more than one input file", () => {
    expect(configError(["a.wav", "b.wav"]).message).toBe("Expected one WAV file, got 2");
  });
});

describe("defaultOutputPath", () => {
  it("should replace only the last extension", () => {
    expect(defaultOutputPath("/data/session.v2.wav", "text")).toBe("/data/session.v2_report.txt");
  });
});

describe("readEnvironment", () => {
  it("should read telemetry settings", () => {
    expect(readEnvironment({ TURNLAB_SENTRY_DSN: "https://test-key@sentry.invalid/1", TURNLAB_ENV: "staging" })).toEqual({
      sentryDsn: "https://test-key@sentry.invalid/1",
      environment: "staging",
    });
  });

  it("should leave telemetry off without a DSN", () => {
    expect(readEnvironment({})).toEqual({ sentryDsn: undefined, environment: "production" });
  });
});

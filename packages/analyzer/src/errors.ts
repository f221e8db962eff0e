/**
 * Analyzer Errors
 *
 * Empty or silent input is never an error. These are raised only when a
 * caller breaks the contract (impossible rates, durations or settings) or
 * when the speech model cannot be loaded.
 */

export class AnalysisContractError extends Error {
  public readonly parameter: string;
  public readonly value: unknown;

  constructor(parameter: string, value: unknown, expectation: string) {
    super(`Invalid ${parameter}: ${String(value)} (${expectation})`);
    this.name = "AnalysisContractError";
    this.parameter = parameter;
    this.value = value;
  }
}

export class ModelLoadError extends Error {
  public readonly modelPath: string;

  constructor(modelPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load speech model from "${modelPath}": ${detail}`, { cause });
    this.name = "ModelLoadError";
    this.modelPath = modelPath;
  }
}

export function assertSampleRate(sampleRate: number, parameter = "sampleRate"): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new AnalysisContractError(parameter, sampleRate, "must be a positive number of Hz");
  }
}

export function assertDuration(durationSec: number): void {
  if (!Number.isFinite(durationSec) || durationSec < 0) {
    throw new AnalysisContractError("durationSec", durationSec, "must be a non-negative number of seconds");
  }
}

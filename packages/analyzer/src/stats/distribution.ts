import type { DistributionSummary } from "@turnlab/types";

export const EMPTY_DISTRIBUTION: DistributionSummary = Object.freeze({
  mean: 0,
  median: 0,
  std: 0,
  min: 0,
  max: 0,
});

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Population standard deviation.
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function summarize(values: readonly number[]): DistributionSummary {
  if (values.length === 0) return EMPTY_DISTRIBUTION;

  return Object.freeze({
    mean: mean(values),
    median: median(values),
    std: standardDeviation(values),
    min: values.reduce((lo, value) => Math.min(lo, value), Infinity),
    max: values.reduce((hi, value) => Math.max(hi, value), -Infinity),
  });
}

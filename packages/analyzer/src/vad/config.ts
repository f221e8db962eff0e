import { z } from "zod";
import { AnalysisContractError } from "../errors";
import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from "./types";

const segmenterConfigSchema = z.object({
  frameMs: z.number().finite().positive(),
  threshold: z.union([z.literal("auto"), z.number().finite().nonnegative()]),
  minSpeechMs: z.number().finite().nonnegative(),
  minSilenceMs: z.number().finite().nonnegative(),
});

/**
 * Merge overrides onto the defaults and validate the result.
 * Undefined overrides keep the default.
 *
 * @throws AnalysisContractError naming the first invalid field
 */
export function resolveSegmenterConfig(
  overrides: Partial<SegmenterConfig> = {},
): SegmenterConfig {
  const merged: SegmenterConfig = {
    frameMs: overrides.frameMs ?? DEFAULT_SEGMENTER_CONFIG.frameMs,
    threshold: overrides.threshold ?? DEFAULT_SEGMENTER_CONFIG.threshold,
    minSpeechMs: overrides.minSpeechMs ?? DEFAULT_SEGMENTER_CONFIG.minSpeechMs,
    minSilenceMs: overrides.minSilenceMs ?? DEFAULT_SEGMENTER_CONFIG.minSilenceMs,
  };

  const result = segmenterConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? "config");
    const value = Object.entries(merged).find(([key]) => key === field)?.[1];
    throw new AnalysisContractError(field, value, issue.message);
  }

  return result.data;
}

/**
 * CLI Configuration
 *
 * Command-line options are read with node:util parseArgs and validated with
 * zod; the environment supplies telemetry settings.
 */

import { parseArgs } from "node:util";
import { join, parse } from "node:path";
import { z } from "zod";
import type { SegmenterConfig } from "@turnlab/analyzer";
import type { SpeakerLabels } from "@turnlab/types";

export const USAGE = `Usage: turnlab <wav-file> [options]

Analyze a stereo WAV recording of a two-person conversation.

Options:
  -o, --output <path>       Report path (default: <input>_report.txt or .json)
  -t, --threshold <value>   RMS energy threshold, or "auto" (default: auto)
  -a, --speaker-a <label>   Label for the left channel (default: Human)
  -b, --speaker-b <label>   Label for the right channel (default: Agent)
      --frame-size <ms>     Energy frame size (default: 30)
      --min-speech <ms>     Shortest speech segment kept (default: 200)
      --min-silence <ms>    Shortest gap that splits segments (default: 300)
      --format <format>     text | json (default: text)
      --strategy <name>     energy | model (default: energy)
      --model <path>        Silero VAD ONNX file for --strategy model
  -h, --help                Show this help`;

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  public readonly formErrors: string[];
  public readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(
    message: string,
    issues: { formErrors?: string[]; fieldErrors?: Record<string, string[] | undefined> } = {},
  ) {
    super(message);
    this.name = "ConfigError";
    this.formErrors = issues.formErrors ?? [];
    this.fieldErrors = issues.fieldErrors ?? {};
  }
}

// ============================================================================
// Schema
// ============================================================================

const cliSchema = z
  .object({
    input: z.string({ required_error: "a WAV file path is required" }).min(1),
    output: z.string().min(1).optional(),
    threshold: z
      .union([z.literal("auto"), z.string().trim().min(1).pipe(z.coerce.number().nonnegative())])
      .default("auto"),
    speakerA: z.string().min(1),
    speakerB: z.string().min(1),
    frameSize: z.coerce.number().int().positive(),
    minSpeech: z.coerce.number().int().nonnegative(),
    minSilence: z.coerce.number().int().nonnegative(),
    format: z.enum(["text", "json"]),
    strategy: z.enum(["energy", "model"]),
    model: z.string().min(1).optional(),
  })
  .refine((value) => value.model === undefined || value.strategy === "model", {
    message: "--model only applies to --strategy model",
    path: ["model"],
  });

export type ReportFormat = "text" | "json";
export type SegmentationStrategy = "energy" | "model";

export interface CliOptions {
  input: string;
  output: string;
  format: ReportFormat;
  strategy: SegmentationStrategy;
  modelPath?: string;
  labels: SpeakerLabels;
  segmenter: SegmenterConfig;
}

export type CliCommand = { kind: "help" } | { kind: "analyze"; options: CliOptions };

/**
 * <input-without-extension>_report.<ext>
 */
export function defaultOutputPath(input: string, format: ReportFormat): string {
  const { dir, name } = parse(input);
  return join(dir, `${name}_report.${format === "json" ? "json" : "txt"}`);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: "string", short: "o" },
        threshold: { type: "string", short: "t" },
        "speaker-a": { type: "string", short: "a", default: "Human" },
        "speaker-b": { type: "string", short: "b", default: "Agent" },
        "frame-size": { type: "string", default: "30" },
        "min-speech": { type: "string", default: "200" },
        "min-silence": { type: "string", default: "300" },
        format: { type: "string", default: "text" },
        strategy: { type: "string", default: "energy" },
        model: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: "help" };

  if (positionals.length > 1) {
    throw new ConfigError(`Expected one WAV file, got ${positionals.length}`);
  }

  const parsed = cliSchema.safeParse({
    input: positionals[0],
    output: values.output,
    threshold: values.threshold,
    speakerA: values["speaker-a"],
    speakerB: values["speaker-b"],
    frameSize: values["frame-size"],
    minSpeech: values["min-speech"],
    minSilence: values["min-silence"],
    format: values.format,
    strategy: values.strategy,
    model: values.model,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "arguments";
    throw new ConfigError(`Invalid ${field}: ${issue?.message ?? "invalid value"}`, parsed.error.flatten());
  }

  const options = parsed.data;

  return {
    kind: "analyze",
    options: {
      input: options.input,
      output: options.output ?? defaultOutputPath(options.input, options.format),
      format: options.format,
      strategy: options.strategy,
      modelPath: options.model,
      labels: { a: options.speakerA, b: options.speakerB },
      segmenter: {
        frameMs: options.frameSize,
        threshold: options.threshold,
        minSpeechMs: options.minSpeech,
        minSilenceMs: options.minSilence,
      },
    },
  };
}

// ============================================================================
// Environment
// ============================================================================

export interface EnvironmentConfig {
  sentryDsn?: string;
  environment: string;
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    sentryDsn: env.TURNLAB_SENTRY_DSN || undefined,
    environment: env.TURNLAB_ENV || env.NODE_ENV || "production",
  };
}

/**
 * Turnlab CLI
 *
 * Load a stereo recording, segment each channel, aggregate turn-taking
 * statistics and write a report.
 */

import { writeFile } from "node:fs/promises";
import { basename } from "node:path";
import {
  analyzeConversation,
  createSileroModelHandle,
  EnergySpeechSegmenter,
  ModelSpeechSegmenter,
  type SpeechSegmenter,
} from "@turnlab/analyzer";
import { createLogger, initTelemetry } from "@turnlab/telemetry";
import { ConfigError, parseCliArgs, readEnvironment, USAGE, type CliOptions } from "./config";
import { renderJsonReport, renderTextReport } from "./report";
import { loadWav } from "./wav";

export const VERSION = "0.1.0";

const cliLog = createLogger("CLI");

export function createSegmenter(options: CliOptions): SpeechSegmenter {
  if (options.strategy === "model") {
    const handle = createSileroModelHandle(options.modelPath ? { modelPath: options.modelPath } : {});
    return new ModelSpeechSegmenter(handle, options.segmenter);
  }
  return new EnergySpeechSegmenter(options.segmenter);
}

export async function analyzeFile(options: CliOptions): Promise<void> {
  const { labels } = options;

  cliLog.info(`Loading ${basename(options.input)}...`);
  const { sampleRate, left, right } = await loadWav(options.input);

  cliLog.info(`  Sample rate: ${sampleRate} Hz`);
  cliLog.info(`  Duration: ${(left.length / sampleRate).toFixed(1)}s`);

  cliLog.info("Running voice activity detection...");
  const { segmentsA, segmentsB, stats } = await analyzeConversation({
    left,
    right,
    sampleRate,
    segmenter: createSegmenter(options),
    labels,
  });

  cliLog.info(`  ${labels.a}: ${segmentsA.length} speech segments`);
  cliLog.info(`  ${labels.b}: ${segmentsB.length} speech segments`);
  cliLog.info(`  ${stats.turns.length} turns, ${stats.interruptions.length} interruptions`);

  cliLog.info("Generating report...");
  const report = options.format === "json" ? renderJsonReport(stats) : renderTextReport(stats);
  await writeFile(options.output, report, "utf8");

  cliLog.info(`Report written to ${options.output}`);
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { sentryDsn, environment } = readEnvironment(env);
  const telemetry = initTelemetry({
    sentryDsn,
    environment,
    release: `turnlab@${VERSION}`,
    context: { argv },
  });

  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      console.log(USAGE);
      return 0;
    }

    await analyzeFile(command.options);
    return 0;
  } catch (error) {
    // Breadcrumb only; no Sentry event for bad options
    if (error instanceof ConfigError) {
      cliLog.warn(error.message);
      console.error(USAGE);
      return 2;
    }

    cliLog.error("Analysis failed:", error);
    await telemetry.flush();
    return 1;
  }
}

import type { SummarizeOptions } from "../config/options";
import { readManifestLines } from "../manifest/readManifest";
import { existingReportPaths, resolveManifest } from "../manifest/resolveManifest";
import { aggregateReports } from "../report/aggregate";
import { writeSummary } from "../report/summaryWriter";
import type { AggregateSummary } from "../types/summary";
import { type Logger, createConsoleLogger } from "../utils/logger";

export interface SummarizeDeps {
  logger?: Logger;
  stdin?: NodeJS.ReadableStream;
}

export async function runSummarize(
  options: SummarizeOptions,
  deps: SummarizeDeps = {}
): Promise<AggregateSummary> {
  const logger = deps.logger ?? createConsoleLogger(options.verbose);

  const lines = await readManifestLines(options.manifest, deps.stdin);
  const resolved = await resolveManifest(lines, options.inDir);
  for (const item of resolved) {
    if (!item.exists) {
      logger.debug(`Skipping ${item.entry.project}/${item.entry.component}: ${item.reportPath} not found`);
    }
  }

  const summary = await aggregateReports(existingReportPaths(resolved));
  await writeSummary(options.output, summary, logger);
  logger.debug(`Wrote summary of ${summary.numberProcessed} report(s) to ${options.output}`);
  return summary;
}

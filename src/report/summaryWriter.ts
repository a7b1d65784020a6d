import { formatCsvRow } from "../csv/format";
import { STATUS_CODES } from "../types/statusCode";
import type { AggregateSummary } from "../types/summary";
import { pathExists, writeText } from "../utils/fs";
import { type Logger, silentLogger } from "../utils/logger";

export const DEFAULT_SUMMARY_FILENAME = "summary-report.csv";

// Downstream consumers read these columns by position.
export function summaryHeader(): string[] {
  return ["number_processed", ...STATUS_CODES.map((status) => `number_${status.key}`)];
}

export function summaryRow(summary: AggregateSummary): number[] {
  return [summary.numberProcessed, ...STATUS_CODES.map((status) => summary.histogram[status.code] ?? 0)];
}

export function formatSummaryCsv(summary: AggregateSummary): string {
  return formatCsvRow(summaryHeader()) + formatCsvRow(summaryRow(summary));
}

/**
 * Writes the two-row summary, replacing any existing file.
 * Returns true when a previous file was overwritten.
 */
export async function writeSummary(
  outputPath: string,
  summary: AggregateSummary,
  logger: Logger = silentLogger
): Promise<boolean> {
  const existed = await pathExists(outputPath);
  if (existed) {
    logger.warn(`Report file ${outputPath} exists, overwriting`);
  }
  await writeText(outputPath, formatSummaryCsv(summary));
  return existed;
}

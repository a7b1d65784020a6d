import { type AggregateSummary, type StatusHistogram, emptyHistogram } from "../types/summary";
import { LEVELCODE_COLUMN, parseStatusCode } from "../types/statusCode";
import { type ReportRecord, loadReport } from "./loadReport";

export function tallyStatus(histogram: StatusHistogram, levelcode: string | undefined): void {
  const code = parseStatusCode(levelcode);
  if (code === null) return;
  histogram[code] += 1;
}

export function buildHistogram(
  records: readonly ReportRecord[],
  histogram: StatusHistogram = emptyHistogram()
): StatusHistogram {
  for (const record of records) {
    tallyStatus(histogram, record[LEVELCODE_COLUMN]);
  }
  return histogram;
}

/**
 * Loads each report in order and folds its rows straight into the histogram.
 * A report counts as processed once it is reached; the first load failure
 * aborts the whole aggregation.
 */
export async function aggregateReports(reportPaths: readonly string[]): Promise<AggregateSummary> {
  const histogram = emptyHistogram();
  let numberProcessed = 0;

  for (const filePath of reportPaths) {
    numberProcessed += 1;
    const report = await loadReport(filePath);
    buildHistogram(report.records, histogram);
  }

  return Object.freeze({ numberProcessed, histogram: Object.freeze(histogram) });
}

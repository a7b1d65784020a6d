import { z } from "zod";
import { CsvParseError, parseCsv } from "../csv/parse";
import { ReportLoadError, describeError } from "../errors";
import { LEVELCODE_COLUMN } from "../types/statusCode";
import { readText } from "../utils/fs";

export type ReportRecord = Record<string, string>;

export interface ReportTable {
  header: string[];
  records: ReportRecord[];
}

/** Renames repeated columns to `name.1`, `name.2`, ... so no field is lost. */
export function dedupeColumns(columns: readonly string[]): string[] {
  const used = new Set<string>();
  const counts = new Map<string, number>();
  return columns.map((column) => {
    let name = column;
    let count = counts.get(column) ?? 0;
    while (used.has(name)) {
      count += 1;
      name = `${column}.${count}`;
    }
    counts.set(column, count);
    used.add(name);
    return name;
  });
}

const ReportHeaderSchema = z
  .array(z.string())
  .refine((columns) => columns.includes(LEVELCODE_COLUMN), {
    message: `missing "${LEVELCODE_COLUMN}" column`
  })
  .refine((columns) => columns.filter((column) => column === LEVELCODE_COLUMN).length <= 1, {
    message: `duplicate "${LEVELCODE_COLUMN}" column`
  })
  .transform(dedupeColumns);

function toRecord(header: string[], fields: string[]): ReportRecord {
  const record: ReportRecord = {};
  header.forEach((column, index) => {
    record[column] = fields[index] ?? "";
  });
  return record;
}

export function parseReport(text: string, filePath: string): ReportTable {
  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (error) {
    if (error instanceof CsvParseError) {
      throw new ReportLoadError(filePath, error.message, error, { line: error.line });
    }
    throw error;
  }

  const [headerRow, ...dataRows] = rows;
  if (!headerRow) {
    throw new ReportLoadError(filePath, "no columns to parse");
  }

  const header = ReportHeaderSchema.safeParse(headerRow);
  if (!header.success) {
    const reasons = header.error.issues.map((issue) => issue.message).join("; ");
    throw new ReportLoadError(filePath, reasons, header.error);
  }

  const columns = header.data;
  const records = dataRows.map((fields, index) => {
    if (fields.length > columns.length) {
      throw new ReportLoadError(
        filePath,
        `expected ${columns.length} fields in data row ${index + 1}, saw ${fields.length}`
      );
    }
    return toRecord(columns, fields);
  });

  return { header: columns, records };
}

export async function loadReport(filePath: string): Promise<ReportTable> {
  let text: string;
  try {
    text = await readText(filePath);
  } catch (error) {
    throw new ReportLoadError(filePath, describeError(error), error);
  }
  return parseReport(text, filePath);
}

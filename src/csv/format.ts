export type CsvValue = string | number;

export function escapeCsvField(value: CsvValue): string {
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
  return values.map(escapeCsvField).join(",") + "\n";
}

/**
 * Scan outcome codes written by the extraction step into each report's
 * `levelcode` column. Position in {@link STATUS_CODES} fixes the summary
 * column order, so entries must never be reordered.
 */
export const STATUS_CODES = [
  { code: 0, key: "successfully_created" },
  { code: 1, key: "zero_results" },
  { code: 2, key: "input_sarif_missing" },
  { code: 3, key: "file_load_error" },
  { code: 4, key: "input_sarif_extra" },
  { code: 5, key: "unknown_sarif_parsing_shape" },
  { code: 6, key: "unknown" }
] as const;

export type StatusCode = (typeof STATUS_CODES)[number]["code"];

export const STATUS_MAX: StatusCode = 6;

export const LEVELCODE_COLUMN = "levelcode";

export function isStatusCode(value: number): value is StatusCode {
  return Number.isInteger(value) && value >= 0 && value <= STATUS_MAX;
}

/**
 * Reads a raw `levelcode` cell. Accepts integers, including the `3.0` form
 * produced when a column was stored as floats; anything else yields null.
 */
export function parseStatusCode(raw: string | undefined): StatusCode | null {
  if (raw === undefined) return null;
  const text = raw.trim();
  if (!/^[+-]?\d+(\.0*)?$/.test(text)) return null;
  const value = Number(text);
  return isStatusCode(value) ? value : null;
}

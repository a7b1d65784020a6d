export class CsvParseError extends Error {
  public readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = "CsvParseError";
    this.line = line;
  }
}

/**
 * Splits comma-delimited text into rows of fields.
 *
 * Quoted fields may contain commas, newlines and doubled quotes. Blank lines are
 * skipped. Malformed quoting throws {@link CsvParseError} instead of guessing.
 */
export function parseCsv(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let inQuotes = false;
  let afterQuote = false;
  let line = 1;
  let quoteLine = 1;

  const endField = () => {
    row.push(field);
    field = "";
    quoted = false;
    afterQuote = false;
  };

  const endRow = () => {
    const blank = row.length === 0 && field === "" && !quoted;
    endField();
    if (!blank) rows.push(row);
    row = [];
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          afterQuote = true;
        }
      } else {
        if (char === "\n") line++;
        field += char;
      }
      continue;
    }

    if (char === ",") {
      endField();
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && input[i + 1] === "\n") i++;
      endRow();
      line++;
    } else if (afterQuote) {
      throw new CsvParseError("Unexpected character after closing quote", line);
    } else if (char === '"') {
      if (field !== "") {
        throw new CsvParseError("Unexpected quote inside unquoted field", line);
      }
      inQuotes = true;
      quoted = true;
      quoteLine = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvParseError("Unterminated quoted field", quoteLine);
  }
  if (row.length > 0 || field !== "" || quoted) {
    endRow();
  }
  return rows;
}

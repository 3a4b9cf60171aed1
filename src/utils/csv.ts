/**
 * CSV Reader
 * Minimal RFC 4180 reader for tabular dictionary sources
 */

/**
 * A parsed CSV document keyed by header names
 */
export interface CsvTable {
  /** Column names from the first row */
  columns: string[];
  /** Data rows; missing trailing cells are empty strings */
  rows: Array<Record<string, string>>;
}

/**
 * Splits CSV text into rows of cells
 *
 * Handles quoted fields (with `""` escapes and embedded newlines), CRLF and
 * LF line endings, and a leading byte-order mark. Rows that are entirely
 * empty are dropped.
 *
 * @throws Error if a quoted field is never closed
 */
export function parseCsvRows(content: string): string[][] {
  const text = content.startsWith("\uFEFF") ? content.slice(1) : content;
  const rows: string[][] = [];

  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  const endRow = (): void => {
    row.push(field);
    field = "";
    if (!(row.length === 1 && row[0] === "")) {
      rows.push(row);
    }
    row = [];
  };

  while (i < text.length) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"' && field === "") {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\r") {
      endRow();
      if (text.charAt(i + 1) === "\n") {
        i++;
      }
    } else if (char === "\n") {
      endRow();
    } else {
      field += char;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field at end of input");
  }

  if (field !== "" || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Parses CSV text with a header row into records
 *
 * @throws Error if a row has more cells than the header, or on unterminated quotes
 */
export function parseCsv(content: string): CsvTable {
  const [header, ...body] = parseCsvRows(content);
  if (header === undefined) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((name) => name.trim());
  const rows = body.map((cells, index) => {
    if (cells.length > columns.length) {
      // Header is row 1
      throw new Error(
        `Expected ${columns.length} fields in row ${index + 2}, saw ${cells.length}`
      );
    }

    const record: Record<string, string> = {};
    columns.forEach((column, c) => {
      record[column] = cells[c] ?? "";
    });
    return record;
  });

  return { columns, rows };
}

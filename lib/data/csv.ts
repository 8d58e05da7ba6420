/**
 * Minimal CSV reading/writing for ledger and report files.
 * Quoted fields may contain commas, doubled quotes and line breaks.
 */

export interface CsvLine {
  /** 1-based line number where the record starts. */
  lineNumber: number;
  cells: string[];
}

/**
 * Parse CSV text into rows (handles quoted fields, skips blank lines).
 * Unquoted cells are trimmed; quoted cells are kept as written.
 */
export function parseCsvRows(text: string): CsvLine[] {
  const src = text.replace(/^\uFEFF/, "");
  const rows: CsvLine[] = [];

  let cells: string[] = [];
  let current = "";
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endCell = () => {
    cells.push(quoted ? current : current.trim());
    current = "";
    quoted = false;
  };
  const endRow = () => {
    endCell();
    if (cells.length > 1 || cells[0] !== "") {
      rows.push({ lineNumber: rowStart, cells });
    }
    cells = [];
  };

  for (let i = 0; i < src.length; i++) {
    const char = src.charAt(i);

    if (inQuotes) {
      if (char === '"' && src.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        if (char === "\n") line++;
        current += char;
      }
    } else if (char === '"') {
      // An opening quote discards the padding before it
      if (!quoted && current.trim() === "") {
        current = "";
        quoted = true;
      }
      inQuotes = true;
    } else if (char === ",") {
      endCell();
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && src.charAt(i + 1) === "\n") i++;
      endRow();
      line++;
      rowStart = line;
    } else if (!quoted || char.trim() !== "") {
      current += char;
    }
  }
  if (cells.length > 0 || current !== "" || quoted) endRow();

  return rows;
}

/** Escape a CSV field (wrap in quotes if it has a comma, quote, line break or edge spaces). */
export function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Join rows into CSV text with a trailing newline. */
export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((cells) => cells.map(escapeCsv).join(",")).join("\n") + "\n";
}

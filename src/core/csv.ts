/** UTF-8 BOM for Excel compatibility */
export const BOM = "\uFEFF";

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
export function escapeCsv(value: string | number | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** Join cells into one CSV line (no trailing newline). */
export function toCsvLine(cells: ReadonlyArray<string | number | null | undefined>): string {
  return cells.map(escapeCsv).join(",");
}

export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Parse CSV text into rows of fields.
 * Handles quoted fields, "" escaped quotes and line breaks inside quotes.
 * Blank lines are dropped; a leading BOM is ignored.
 */
export function parseCsv(content: string): string[][] {
  const text = stripBom(content);
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(current);
    current = "";
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(current);
      current = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r") {
      if (text[i + 1] === "\n") i++;
      endRow();
    } else {
      current += ch;
    }
  }
  if (current !== "" || row.length > 0) endRow();

  return rows;
}

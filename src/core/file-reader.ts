import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { parseCsv } from "./csv";

const URL_COLUMN_NAMES = ["url", "link", "href", "page", "uri"];

/**
 * Read item page URLs from a CSV or XLSX file.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the URL column.
 */
export function readUrlsFromFile(filePath: string, columnName?: string): string[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") {
    return readCsv(filePath, columnName);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return readXlsx(filePath, columnName);
  } else {
    throw new Error(
      `Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`
    );
  }
}

// ── Internals ────────────────────────────────────────────────────────────────

function findUrlColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = headers.findIndex(
      (h) => h.trim().toLowerCase() === preferred.trim().toLowerCase()
    );
    if (idx === -1) {
      throw new Error(
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of URL_COLUMN_NAMES) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }

  throw new Error(
    `No URL column found automatically.\n` +
      `   Headers present: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

function isValidUrl(str: string): boolean {
  try {
    const u = new URL(str);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

function pickUrls(rows: string[][], filePath: string, columnName?: string): string[] {
  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }
  const colIdx = findUrlColumn(rows[0], columnName);

  const urls: string[] = [];
  for (const row of rows.slice(1)) {
    const cell = (row[colIdx] ?? "").trim();
    if (isValidUrl(cell)) urls.push(cell);
  }
  return urls;
}

function readCsv(filePath: string, columnName?: string): string[] {
  const rows = parseCsv(fs.readFileSync(filePath, "utf-8"));
  return pickUrls(rows, filePath, columnName);
}

function readXlsx(filePath: string, columnName?: string): string[] {
  const wb = XLSX.readFile(filePath);
  const ws = wb.Sheets[wb.SheetNames[0]];
  if (!ws) {
    throw new Error(`File "${filePath}" has no sheets.`);
  }

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils
    .sheet_to_json<unknown[]>(ws, { header: 1, defval: "" })
    .map((row) => row.map((cell) => String(cell ?? "")));
  return pickUrls(rows, filePath, columnName);
}

import * as fs from "fs";
import * as path from "path";
import { BOM, parseCsv, toCsvLine } from "../core/csv";
import { createItemRecord, resolveBucket, toRow } from "./classifier";
import { ARCHETYPE_FIELDS, Archetype, ItemRecord } from "./types";

/** Output subdirectory per archetype */
export const ARCHETYPE_DIRS: Readonly<Record<Archetype, string>> = {
  weapon: "weapons",
  equipment: "equipment",
};

export interface Destination {
  archetype: Archetype;
  bucket: string;
  filePath: string;
}

export type DestinationResolver = (item: ItemRecord) => Destination;

export interface ExportedFile extends Destination {
  count: number;
}

export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExportError";
  }
}

/**
 * Route items to <outputDir>/weapons/<bucket>.csv or <outputDir>/equipment/<bucket>.csv.
 */
export function createBucketResolver(outputDir: string): DestinationResolver {
  return (item) => {
    const bucket = resolveBucket(item);
    return {
      archetype: item.archetype,
      bucket,
      filePath: path.join(outputDir, ARCHETYPE_DIRS[item.archetype], `${bucket}.csv`),
    };
  };
}

function headerLine(archetype: Archetype): string {
  return toCsvLine(ARCHETYPE_FIELDS[archetype]);
}

/**
 * Group items by destination file and rewrite each file from scratch:
 * header row, then one row per item in input order.
 * Files for buckets without items are left untouched.
 * @returns one entry per written file, in first-seen order
 */
export function exportItems(
  items: readonly ItemRecord[],
  resolveDestination: DestinationResolver
): ExportedFile[] {
  const groups = new Map<string, { destination: Destination; items: ItemRecord[] }>();

  for (const item of items) {
    const destination = resolveDestination(item);
    const group = groups.get(destination.filePath);
    if (!group) {
      groups.set(destination.filePath, { destination, items: [item] });
      continue;
    }
    if (group.destination.archetype !== item.archetype) {
      throw new ExportError(
        `${destination.filePath} would mix ${group.destination.archetype} and ${item.archetype} rows`
      );
    }
    group.items.push(item);
  }

  const written: ExportedFile[] = [];
  for (const { destination, items: groupItems } of groups.values()) {
    const lines = [
      BOM + headerLine(destination.archetype),
      ...groupItems.map((item) => toCsvLine(toRow(item))),
    ];
    fs.mkdirSync(path.dirname(destination.filePath), { recursive: true });
    fs.writeFileSync(destination.filePath, lines.join("\n") + "\n", "utf-8");
    written.push({ ...destination, count: groupItems.length });
  }

  return written;
}

/**
 * Append a single item to a bucket file, writing the header first if the file is new or empty.
 * Must not run against a file that exportItems is rewriting at the same time.
 */
export function appendItem(item: ItemRecord, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const fd = fs.openSync(filePath, "a");
  try {
    const prefix = fs.fstatSync(fd).size === 0 ? BOM + headerLine(item.archetype) + "\n" : "";
    fs.writeSync(fd, prefix + toCsvLine(toRow(item)) + "\n", null, "utf-8");
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Read a bucket file back into records.
 * Columns are matched by header name; cells present in the file but empty come back as "".
 */
export function readBucketFile(filePath: string, archetype: Archetype): ItemRecord[] {
  const rows = parseCsv(fs.readFileSync(filePath, "utf-8"));
  if (rows.length === 0) return [];

  const [header, ...body] = rows;
  const nameIdx = header.indexOf("Name");
  if (nameIdx === -1) {
    throw new ExportError(`${filePath} has no "Name" column`);
  }

  return body.map((cells) => {
    const attributes: Record<string, string> = {};
    header.forEach((column, i) => {
      if (i !== nameIdx) attributes[column] = cells[i] ?? "";
    });
    return createItemRecord(archetype, cells[nameIdx] ?? "", attributes);
  });
}

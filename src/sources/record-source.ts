import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { FatalConfigError, PermanentInputError, errorMessage } from "../types/errors.js";
import type { RecordFormat } from "../types/enums.js";
import type { DownloadItem, RecordLoadResult, RecordSourceOptions } from "./types.js";

const KEY_FIELDS = ["forum", "note_id", "id"] as const;
const SAFE_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function detectFormat(filePath: string): RecordFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".csv":
      return "csv";
    case ".json":
      return "json";
    case ".jsonl":
    case ".ndjson":
      return "ndjson";
    default:
      throw new FatalConfigError(
        `Unsupported input format "${ext || "(none)"}" for ${filePath}: expected .csv, .json, .jsonl or .ndjson`,
      );
  }
}

/**
 * Resolve a `pdf` field to an absolute URL.
 *
 * Accepts a bare string, a `{ value }` object, or (from CSV cells) the JSON
 * text of such an object. Returns null when there is no usable link.
 */
export function normalizePdfUrl(pdfValue: unknown, baseUrl: string): string | null {
  let value = pdfValue;

  if (typeof value === "string" && value.trim().startsWith("{")) {
    try {
      value = JSON.parse(value);
    } catch {
      // not JSON after all: treat the cell as a plain link
    }
  }

  if (isRecord(value)) {
    value = value.value;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "null") {
    return null;
  }

  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed;
  }

  const base = baseUrl.replace(/\/+$/, "");
  return trimmed.startsWith("/") ? `${base}${trimmed}` : `${base}/${trimmed}`;
}

function extractKey(record: RawRecord): string | null {
  for (const field of KEY_FIELDS) {
    const value = record[field];
    if (typeof value === "string" && value.trim() !== "") {
      return value.trim();
    }
    if (typeof value === "number") {
      return String(value);
    }
  }
  return null;
}

function extractPdfField(record: RawRecord): unknown {
  if (record.pdf !== undefined && record.pdf !== "") {
    return record.pdf;
  }
  const content = record.content;
  if (isRecord(content)) {
    return content.pdf;
  }
  return undefined;
}

/**
 * Turn one raw record into a DownloadItem, or throw PermanentInputError.
 */
export function recordToItem(
  record: RawRecord,
  baseUrl: string,
  location: string,
): DownloadItem {
  const key = extractKey(record);
  if (!key) {
    throw new PermanentInputError("Missing key (forum / note_id / id)", location);
  }
  if (!SAFE_KEY_PATTERN.test(key)) {
    throw new PermanentInputError(`Key "${key}" cannot be used as a file name`, location);
  }

  const url = normalizePdfUrl(extractPdfField(record), baseUrl);
  if (!url) {
    throw new PermanentInputError(`No PDF link for ${key}`, location);
  }

  try {
    new URL(url);
  } catch {
    throw new PermanentInputError(`Invalid PDF link for ${key}: ${url}`, location);
  }

  const title = typeof record.title === "string" ? record.title : undefined;
  return title === undefined ? { key, url } : { key, url, title };
}

/**
 * Keep the first occurrence of every key.
 */
export function dedupeByKey(items: DownloadItem[]): {
  items: DownloadItem[];
  duplicates: number;
} {
  const seen = new Set<string>();
  const unique: DownloadItem[] = [];

  for (const item of items) {
    if (seen.has(item.key)) {
      continue;
    }
    seen.add(item.key);
    unique.push(item);
  }

  return { items: unique, duplicates: items.length - unique.length };
}

function readRawRecords(
  content: string,
  format: RecordFormat,
  sourceName: string,
  skipped: PermanentInputError[],
): Array<{ record: RawRecord; location: string }> {
  const records: Array<{ record: RawRecord; location: string }> = [];

  if (format === "ndjson") {
    const lines = content.split(/\r?\n/);
    lines.forEach((line, index) => {
      if (line.trim() === "") {
        return;
      }
      const location = `${sourceName}:${index + 1}`;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isRecord(parsed)) {
          records.push({ record: parsed, location });
        } else {
          skipped.push(new PermanentInputError("Line is not a JSON object", location));
        }
      } catch (error) {
        skipped.push(new PermanentInputError(`Malformed JSON: ${errorMessage(error)}`, location));
      }
    });
    return records;
  }

  let parsed: unknown;
  try {
    parsed =
      format === "csv"
        ? parse(content, { columns: true, skip_empty_lines: true, bom: true, relax_column_count: true })
        : JSON.parse(content);
  } catch (error) {
    throw new FatalConfigError(`Cannot parse ${sourceName}: ${errorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new FatalConfigError(`${sourceName} must contain an array of records`);
  }

  parsed.forEach((entry: unknown, index) => {
    // CSV data rows start on line 2, after the header
    const location = format === "csv" ? `${sourceName}:${index + 2}` : `${sourceName}[${index}]`;
    if (isRecord(entry)) {
      records.push({ record: entry, location });
    } else {
      skipped.push(new PermanentInputError("Entry is not an object", location));
    }
  });

  return records;
}

/**
 * Parse record text in the given format into deduplicated items.
 */
export function parseRecords(
  content: string,
  format: RecordFormat,
  options: RecordSourceOptions,
  sourceName = "input",
): RecordLoadResult {
  const skipped: PermanentInputError[] = [];
  const raw = readRawRecords(content, format, sourceName, skipped);
  const unreadable = skipped.length;
  const items: DownloadItem[] = [];

  for (const { record, location } of raw) {
    try {
      items.push(recordToItem(record, options.baseUrl, location));
    } catch (error) {
      if (error instanceof PermanentInputError) {
        skipped.push(error);
        continue;
      }
      throw error;
    }
  }

  const deduped = dedupeByKey(items);
  return {
    items: deduped.items,
    skipped,
    duplicates: deduped.duplicates,
    totalRecords: raw.length + unreadable,
  };
}

/**
 * Read a record file, picking the parser from its extension.
 */
export function loadRecords(filePath: string, options: RecordSourceOptions): RecordLoadResult {
  const format = detectFormat(filePath);

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FatalConfigError(`Cannot read input file ${filePath}: ${errorMessage(error)}`);
  }

  return parseRecords(content, format, options, path.basename(filePath));
}

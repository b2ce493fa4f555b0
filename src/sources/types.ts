import type { PermanentInputError } from "../types/errors.js";

/**
 * A single file to fetch. `key` names both the output file and the
 * checkpoint entry.
 */
export interface DownloadItem {
  readonly key: string;
  readonly url: string;
  readonly title?: string;
}

export interface RecordLoadResult {
  items: DownloadItem[];
  /** Records that could not be turned into an item */
  skipped: PermanentInputError[];
  /** Records dropped because an earlier record had the same key */
  duplicates: number;
  /** Raw record count before skipping and dedup */
  totalRecords: number;
}

export interface RecordSourceOptions {
  baseUrl: string;
}

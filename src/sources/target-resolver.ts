import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import type { Readable } from "stream";
import { pipeline } from "stream/promises";
import {
  DEFAULT_MIN_BYTES,
  PARTIAL_SUFFIX,
  PDF_DIR_NAME,
  PDF_EXTENSION,
} from "../types/constants.js";
import { EmptyResponseError } from "../types/errors.js";
import type { DownloadItem } from "./types.js";

/**
 * Target Resolver
 *
 * Maps keys to `{outputDir}/pdfs/{key}.pdf` and decides whether a file on
 * disk counts as a finished download. Files are written to `{key}.pdf.part`
 * and renamed into place only once the body is complete, so a file at the
 * final path is always whole.
 */
export class TargetResolver {
  readonly pdfDir: string;
  private minBytes: number;

  constructor(outputDir: string, minBytes: number = DEFAULT_MIN_BYTES) {
    this.pdfDir = path.join(outputDir, PDF_DIR_NAME);
    this.minBytes = Math.max(1, minBytes);
  }

  pathFor(key: string): string {
    return path.join(this.pdfDir, `${key}${PDF_EXTENSION}`);
  }

  partialPathFor(key: string): string {
    return `${this.pathFor(key)}${PARTIAL_SUFFIX}`;
  }

  ensureDirectory(): void {
    if (!fs.existsSync(this.pdfDir)) {
      fs.mkdirSync(this.pdfDir, { recursive: true });
    }
  }

  /**
   * Completeness predicate: a regular file of at least `minBytes`.
   */
  isComplete(key: string): boolean {
    try {
      const stats = fs.statSync(this.pathFor(key));
      return stats.isFile() && stats.size >= this.minBytes;
    } catch {
      return false;
    }
  }

  /**
   * Keys whose target already satisfies the completeness predicate.
   */
  findCompleted(keys: Iterable<string>): string[] {
    const found: string[] = [];
    for (const key of keys) {
      if (this.isComplete(key)) {
        found.push(key);
      }
    }
    return found;
  }

  /**
   * Stream a response body into place. Returns the number of bytes written.
   * On any failure the partial file is removed and the error rethrown.
   */
  async commit(item: DownloadItem, source: Readable): Promise<number> {
    const partialPath = this.partialPathFor(item.key);
    await fsp.mkdir(this.pdfDir, { recursive: true });

    try {
      await pipeline(source, fs.createWriteStream(partialPath));

      const { size } = await fsp.stat(partialPath);
      if (size < this.minBytes) {
        throw new EmptyResponseError(item.url, size);
      }

      await fsp.rename(partialPath, this.pathFor(item.key));
      return size;
    } catch (error) {
      await fsp.rm(partialPath, { force: true });
      throw error;
    }
  }
}

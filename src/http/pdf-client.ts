import type { Readable } from "stream";
import { EnvHttpProxyAgent, request, type Dispatcher } from "undici";
import { DEFAULT_TIMEOUT_SECONDS, REQUEST_HEADERS } from "../types/constants.js";
import {
  DownloadError,
  HttpStatusError,
  TransientNetworkError,
  errorMessage,
} from "../types/errors.js";
import { formatDuration } from "../utils/helpers.js";
import { logger } from "../utils/logger.js";

const MAX_REDIRECTS = 5;

const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Anything that can open a URL as a byte stream. Workers depend on this
 * rather than on the HTTP client so tests can substitute a fake.
 */
export interface PdfSource {
  open(url: string): Promise<Readable>;
}

export interface PdfClientOptions {
  timeoutMs?: number;
  /** Defaults to an agent that honors HTTP_PROXY / HTTPS_PROXY / NO_PROXY */
  dispatcher?: Dispatcher;
  headers?: Record<string, string>;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  if (error instanceof Error && error.name === "TimeoutError") {
    return true;
  }
  const code = errorCode(error);
  return code !== undefined && TIMEOUT_CODES.has(code);
}

/**
 * Map whatever a fetch threw into the download error taxonomy.
 */
export function classifyDownloadError(error: unknown, url: string, timeoutMs: number): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  if (isTimeout(error)) {
    return new TransientNetworkError(`Timed out after ${formatDuration(timeoutMs)}`, url, error);
  }
  const code = errorCode(error);
  const detail = errorMessage(error);
  return new TransientNetworkError(code && !detail.includes(code) ? `${code}: ${detail}` : detail, url, error);
}

/**
 * PDF Client
 *
 * Plain HTTP GET with a hard per-request deadline covering headers and body.
 * Redirects are followed up to five hops. Non-2xx responses are drained and
 * turned into errors; 5xx and 429 count as transient.
 */
export class PdfClient implements PdfSource {
  private timeoutMs: number;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private headers: Record<string, string>;

  constructor(options: PdfClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new EnvHttpProxyAgent();
    this.headers = { ...REQUEST_HEADERS, ...options.headers };
  }

  async open(url: string): Promise<Readable> {
    // One deadline for the whole exchange, body streaming included
    const signal = AbortSignal.timeout(this.timeoutMs);
    let currentUrl = url;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      let response: Dispatcher.ResponseData;
      try {
        response = await request(currentUrl, {
          method: "GET",
          headers: this.headers,
          dispatcher: this.dispatcher,
          signal,
          headersTimeout: this.timeoutMs,
          bodyTimeout: this.timeoutMs,
        });
      } catch (error) {
        throw classifyDownloadError(error, url, this.timeoutMs);
      }

      const { statusCode, headers, body } = response;

      if (statusCode >= 200 && statusCode < 300) {
        return body;
      }

      await body.dump();

      const location = headers.location;
      if (statusCode >= 300 && statusCode < 400 && typeof location === "string") {
        currentUrl = new URL(location, currentUrl).toString();
        logger.debug(`[PDF Client] ${statusCode} redirect → ${currentUrl}`);
        continue;
      }

      if (statusCode >= 500 || statusCode === 429) {
        throw new TransientNetworkError(`HTTP ${statusCode}`, url);
      }
      throw new HttpStatusError(statusCode, url);
    }

    throw new TransientNetworkError(`Too many redirects (>${MAX_REDIRECTS})`, url);
  }

  /**
   * Reachability check of the base host, used before a large run.
   */
  async checkConnectivity(url: string): Promise<void> {
    const body = await this.open(url);
    body.destroy();
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/** Host used to resolve relative PDF links such as `/pdf?id=...` */
export const DEFAULT_BASE_URL = "https://openreview.net";

export const DEFAULT_WORKERS = 3;
export const MAX_WORKERS = 32;
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_FLUSH_EVERY = 10;
export const DEFAULT_MIN_BYTES = 1;

/** Hidden directory inside the output tree holding checkpoint files */
export const CHECKPOINT_DIR_NAME = ".paper-dl";
export const CHECKPOINT_FILE_NAME = "checkpoint.db";
export const SUMMARY_FILE_NAME = "state.json";
export const CHECKPOINT_SCHEMA_VERSION = "1";

export const PDF_DIR_NAME = "pdfs";
export const PDF_EXTENSION = ".pdf";
export const PARTIAL_SUFFIX = ".part";

export const DEFAULT_INPUT_FILE_NAME = "submissions.csv";

export const REQUEST_HEADERS: Record<string, string> = {
  "user-agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  accept: "application/pdf,*/*",
  "accept-language": "en-US,en;q=0.9",
};

export const EXIT_OK = 0;
export const EXIT_FAILED_ITEMS = 1;
export const EXIT_FATAL_CONFIG = 2;
export const EXIT_INTERRUPTED = 130;

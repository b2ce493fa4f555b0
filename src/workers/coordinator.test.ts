import fs from "fs";
import http from "http";
import type { AddressInfo } from "net";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import { Agent } from "undici";
import { PdfClient, type PdfSource } from "../http/pdf-client.js";
import { CoordinatorPhase, RunMode, TaskStatus } from "../types/enums.js";
import { FatalConfigError, TransientNetworkError } from "../types/errors.js";
import { setSilentMode } from "../utils/logger.js";
import { Coordinator } from "./coordinator.js";
import type { CoordinatorOptions } from "./types.js";

const BASE = "https://example.org";
const KEYS = ["p1", "p2", "p3", "p4", "p5"];

const urlFor = (key: string) => `${BASE}/pdf/${key}.pdf`;

class FakeSource implements PdfSource {
  calls: string[] = [];
  onOpen?: () => void;

  constructor(
    private failing: Set<string> = new Set(),
    private delayMs = 0,
  ) {}

  async open(url: string): Promise<Readable> {
    this.calls.push(url);
    this.onOpen?.();
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failing.has(url)) {
      throw new TransientNetworkError("Timed out after 30s", url);
    }
    return Readable.from([Buffer.from(`%PDF-1.4 ${url}`)]);
  }

  keysCalled(): string[] {
    return this.calls.map((url) => path.basename(url, ".pdf")).sort();
  }
}

function writeCsv(filePath: string, keys: string[]): void {
  const rows = keys.map((key) => `${key},Title ${key},/pdf/${key}.pdf`);
  fs.writeFileSync(filePath, ["forum,title,pdf", ...rows].join("\n"));
}

describe("Coordinator", () => {
  let tempDir: string;
  let inputPath: string;
  let outputDir: string;

  beforeAll(() => {
    setSilentMode(true);
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "paper-dl-run-"));
    inputPath = path.join(tempDir, "submissions.csv");
    outputDir = path.join(tempDir, "out");
    writeCsv(inputPath, KEYS);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function coordinatorFor(
    source: PdfSource,
    options: Partial<CoordinatorOptions> = {},
  ): Coordinator {
    return new Coordinator({
      inputPath,
      outputDir,
      workers: 2,
      baseUrl: BASE,
      showProgress: false,
      source,
      ...options,
    });
  }

  const checkpointPath = () => path.join(outputDir, ".paper-dl", "checkpoint.db");
  const summaryPath = () => path.join(outputDir, ".paper-dl", "state.json");
  const pdfPath = (key: string) => path.join(outputDir, "pdfs", `${key}.pdf`);

  it("keeps the checkpoint after a failure and clears it once everything succeeds", async () => {
    const first = await coordinatorFor(new FakeSource(new Set([urlFor("p3")]))).run();

    expect(first.summary).toMatchObject({ downloaded: 4, failed: 1, total: 5 });
    expect(first.failedKeys).toEqual(["p3"]);
    expect(first.exitCode).toBe(1);
    expect(first.checkpointCleared).toBe(false);
    expect(fs.existsSync(checkpointPath())).toBe(true);
    expect(fs.existsSync(pdfPath("p3"))).toBe(false);

    const retrySource = new FakeSource();
    const second = await coordinatorFor(retrySource).run();

    expect(retrySource.calls).toEqual([urlFor("p3")]);
    expect(second.checkpointSource).toBe("checkpoint");
    expect(second.summary).toMatchObject({ downloaded: 5, failed: 0, total: 5, percentage: 100 });
    expect(second.exitCode).toBe(0);
    expect(second.checkpointCleared).toBe(true);
    expect(fs.existsSync(checkpointPath())).toBe(false);
    expect(fs.existsSync(summaryPath())).toBe(true);
  });

  it("performs no fetches on a second resume run", async () => {
    const first = await coordinatorFor(new FakeSource()).run();
    expect(first.exitCode).toBe(0);

    const source = new FakeSource();
    const second = await coordinatorFor(source).run();

    expect(source.calls).toEqual([]);
    expect(second.seeded).toBe(5);
    expect(second.selection.pending).toEqual([]);
    expect(second.exitCode).toBe(0);
  });

  it("performs no fetches on resume while a checkpoint is kept", async () => {
    await coordinatorFor(new FakeSource(), { limit: 3 }).run();
    expect(fs.existsSync(checkpointPath())).toBe(true);

    const source = new FakeSource();
    await coordinatorFor(source).run();
    expect(source.keysCalled()).toEqual(["p4", "p5"]);

    const idle = new FakeSource();
    await coordinatorFor(idle).run();
    expect(idle.calls).toEqual([]);
  });

  it("fetches a repeated key once", async () => {
    writeCsv(inputPath, ["p1", "p2", "p1", "p2", "p1"]);
    const source = new FakeSource();

    const result = await coordinatorFor(source, { workers: 4 }).run();

    expect(source.keysCalled()).toEqual(["p1", "p2"]);
    expect(result.duplicateRecords).toBe(3);
    expect(result.items).toBe(2);
  });

  it("seeds from files already on disk when there is no checkpoint", async () => {
    fs.mkdirSync(path.join(outputDir, "pdfs"), { recursive: true });
    for (const key of ["p1", "p2", "p4"]) {
      fs.writeFileSync(pdfPath(key), "%PDF-1.4 existing");
    }
    const source = new FakeSource();

    const result = await coordinatorFor(source).run();

    expect(result.seeded).toBe(3);
    expect(source.keysCalled()).toEqual(["p3", "p5"]);
    expect(fs.readFileSync(pdfPath("p1"), "utf-8")).toBe("%PDF-1.4 existing");
  });

  it("does not seed from empty files", async () => {
    fs.mkdirSync(path.join(outputDir, "pdfs"), { recursive: true });
    fs.writeFileSync(pdfPath("p1"), "");
    const source = new FakeSource();

    const result = await coordinatorFor(source).run();

    expect(result.seeded).toBe(0);
    expect(source.calls).toHaveLength(5);
  });

  it("clean-start ignores checkpoint and files on disk", async () => {
    await coordinatorFor(new FakeSource(new Set([urlFor("p2")]))).run();
    const source = new FakeSource();

    const result = await coordinatorFor(source, { mode: RunMode.CleanStart }).run();

    expect(result.checkpointSource).toBe("reset");
    expect(result.seeded).toBe(0);
    expect(source.keysCalled()).toEqual(KEYS);
    expect(result.exitCode).toBe(0);
  });

  it("retry-failed refetches only failed keys with a fresh attempt count", async () => {
    const failing = new Set([urlFor("p2"), urlFor("p4")]);
    await coordinatorFor(new FakeSource(failing)).run();
    const second = await coordinatorFor(new FakeSource(failing)).run();
    expect(second.failedKeys).toEqual(["p2", "p4"]);

    const source = new FakeSource(new Set([urlFor("p4")]));
    const result = await coordinatorFor(source, { mode: RunMode.RetryFailed }).run();

    expect(source.keysCalled()).toEqual(["p2", "p4"]);
    expect(result.failedKeys).toEqual(["p4"]);
    expect(result.exitCode).toBe(1);

    const store = new CheckpointStore(outputDir);
    await store.load();
    expect(store.getEntry("p4")).toMatchObject({ status: TaskStatus.Failed, attempts: 1 });
    expect(store.getEntry("p2")).toMatchObject({ status: TaskStatus.Completed });
  });

  it("holds back keys at the attempt cap in resume mode", async () => {
    const failing = new Set([urlFor("p5")]);
    await coordinatorFor(new FakeSource(failing)).run();

    const source = new FakeSource();
    const result = await coordinatorFor(source, { maxAttempts: 1 }).run();

    expect(source.calls).toEqual([]);
    expect(result.selection.capped).toBe(1);
    expect(result.exitCode).toBe(1);
  });

  it("processes at most limit items and defers the rest", async () => {
    const source = new FakeSource();

    const result = await coordinatorFor(source, { limit: 2 }).run();

    expect(source.calls).toHaveLength(2);
    expect(result.bytesDownloaded).toBe(78);
    expect(result.selection.deferred).toBe(3);
    expect(result.summary).toMatchObject({ downloaded: 2, pending: 3, total: 5 });
    expect(result.exitCode).toBe(0);
    expect(result.checkpointCleared).toBe(false);
  });

  it("drains on cancel and saves what finished", async () => {
    const source = new FakeSource(new Set(), 10);
    const coordinator = coordinatorFor(source, { workers: 1 });
    source.onOpen = () => coordinator.cancel();

    const result = await coordinator.run();

    expect(source.calls).toEqual([urlFor("p1")]);
    expect(result.cancelled).toBe(true);
    expect(result.exitCode).toBe(130);
    expect(coordinator.getPhase()).toBe(CoordinatorPhase.Done);

    const store = new CheckpointStore(outputDir);
    expect(await store.load()).toEqual({ source: "checkpoint", entries: 5, recovered: 0 });
    expect(store.counts()).toMatchObject({ completed: 1, pending: 4 });
  });

  it("recovers from a corrupt checkpoint", async () => {
    fs.mkdirSync(path.join(outputDir, ".paper-dl"), { recursive: true });
    fs.writeFileSync(checkpointPath(), "garbage");
    fs.mkdirSync(path.join(outputDir, "pdfs"), { recursive: true });
    fs.writeFileSync(pdfPath("p1"), "%PDF-1.4 existing");
    const source = new FakeSource();

    const result = await coordinatorFor(source).run();

    expect(result.checkpointSource).toBe("corrupt");
    expect(result.seeded).toBe(1);
    expect(source.calls).toHaveLength(4);
    expect(result.exitCode).toBe(0);
  });

  it("reads NDJSON input and counts unusable records", async () => {
    inputPath = path.join(tempDir, "submissions.jsonl");
    fs.writeFileSync(
      inputPath,
      [
        JSON.stringify({ note_id: "n1", pdf: { value: "/pdf/n1.pdf" } }),
        "{broken",
        JSON.stringify({ note_id: "n2", pdf: "null" }),
      ].join("\n"),
    );
    const source = new FakeSource();

    const result = await coordinatorFor(source).run();

    expect(source.calls).toEqual([urlFor("n1")]);
    expect(result.totalRecords).toBe(3);
    expect(result.skippedRecords).toBe(2);
  });

  it("fails an item whose body stalls and leaves no file for it", async () => {
    const server = http.createServer((req, res) => {
      res.writeHead(200, { "content-type": "application/pdf" });
      res.write(`%PDF-1.4 ${req.url ?? ""}`);
      if (req.url !== "/pdf/p3.pdf") {
        res.end();
      }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Test server has no TCP address");
    }
    const agent = new Agent();
    const client = new PdfClient({ dispatcher: agent, timeoutMs: 200 });

    try {
      const result = await coordinatorFor(client, {
        baseUrl: `http://127.0.0.1:${address.port}`,
        timeoutMs: 200,
      }).run();

      expect(result.summary).toMatchObject({ downloaded: 4, failed: 1, total: 5, percentage: 80 });
      expect(result.failedKeys).toEqual(["p3"]);
      expect(result.exitCode).toBe(1);
      expect(result.checkpointCleared).toBe(false);
      expect(fs.readdirSync(path.join(outputDir, "pdfs")).sort()).toEqual([
        "p1.pdf",
        "p2.pdf",
        "p4.pdf",
        "p5.pdf",
      ]);

      const store = new CheckpointStore(outputDir);
      await store.load();
      expect(store.getEntry("p3")).toMatchObject({ status: TaskStatus.Failed, attempts: 1 });
    } finally {
      await client.close();
      await agent.destroy();
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it("aborts before writing state when the input is missing", async () => {
    fs.rmSync(inputPath);

    await expect(coordinatorFor(new FakeSource()).run()).rejects.toBeInstanceOf(FatalConfigError);
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it("aborts when the input has no usable records", async () => {
    writeCsv(inputPath, []);

    await expect(coordinatorFor(new FakeSource()).run()).rejects.toThrow(
      `No downloadable records in ${inputPath}`,
    );
    expect(fs.existsSync(outputDir)).toBe(false);
  });
});

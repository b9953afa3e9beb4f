import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import type { FastaFetchRequest } from "../src/entrez/types.js";
import { RunLog } from "../src/logging/runLog.js";
import { BatchSequenceFetcher } from "../src/retrieval/batchFetcher.js";
import { RetryExecutor } from "../src/retrieval/retry.js";
import type { FakeEntrezData } from "./helpers/fakes.js";
import { FakeEntrez, fastaFor } from "./helpers/fakes.js";

function contigs(n: number): Set<string> {
  return new Set(Array.from({ length: n }, (_, i) => `c${i}`));
}

function window(req: FastaFetchRequest): string[] {
  return req.ids.slice(req.retStart, req.retStart + req.retMax);
}

function setup(fasta: FakeEntrezData["fasta"], opts: { batchSize?: number; maxPasses?: number } = {}) {
  const entrez = new FakeEntrez({ fasta });
  const log = new RunLog();
  const fetcher = new BatchSequenceFetcher({
    entrez,
    retry: new RetryExecutor({ maxAttempts: 2, delayMs: 0 }, log),
    log,
    batchSize: opts.batchSize ?? 10000,
    maxPasses: opts.maxPasses ?? 3
  });
  return { entrez, log, fetcher };
}

describe("BatchSequenceFetcher", () => {
  it("splits 12500 contigs into two requests over the full identifier list", async () => {
    const { entrez, fetcher } = setup(undefined);

    const result = await fetcher.fetchRecords("1", contigs(12500));

    expect(result).toMatchObject({ expected: 12500, returned: 12500, passes: 1, complete: true });
    expect(entrez.calls.fetchFasta.map((r) => [r.retStart, r.retMax, r.ids.length])).toEqual([
      [0, 10000, 12500],
      [10000, 10000, 12500]
    ]);
  });

  it("repeats a short pass and accepts the next complete one", async () => {
    const { entrez, log, fetcher } = setup((req, call) => fastaFor(call === 1 ? window(req).slice(1) : window(req)));

    const result = await fetcher.fetchRecords("2", contigs(3));

    expect(result).toMatchObject({ expected: 3, returned: 3, passes: 2, complete: true });
    expect(entrez.calls.fetchFasta).toHaveLength(2);
    expect(log.events.filter((e) => e.kind === "batch.short")).toHaveLength(1);
  });

  it("keeps what it has once every pass came back short", async () => {
    const { entrez, log, fetcher } = setup((req) => fastaFor(window(req).slice(1)), { batchSize: 2, maxPasses: 3 });

    const result = await fetcher.fetchRecords("3", contigs(4));

    // Two batches per pass, each missing one record.
    expect(result).toMatchObject({ expected: 4, returned: 2, passes: 3, complete: false });
    expect(entrez.calls.fetchFasta).toHaveLength(6);
    const shortfall = log.events.find((e) => e.kind === "batch.shortfall");
    expect(shortfall?.level).toBe("error");
    expect(shortfall?.data?.["shortfall"]).toBe(2);
  });

  it("accepts more records than expected with a warning", async () => {
    const { log, fetcher } = setup((req) => fastaFor([...window(req), "extra"]));

    const result = await fetcher.fetchRecords("4", contigs(2));

    expect(result).toMatchObject({ expected: 2, returned: 3, passes: 1, complete: true });
    expect(log.events.filter((e) => e.level === "warn").map((e) => e.kind)).toEqual(["batch.excess"]);
  });

  it("writes the fetched records to a FASTA file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "genome-fetch-batch-"));
    try {
      const { fetcher } = setup(undefined);
      const out = path.join(dir, "GCA_1.fasta");

      const result = await fetcher.fetchToFile("5", new Set(["a", "b"]), out);

      expect(result.written).toBe(2);
      expect(result.outputPath).toBe(out);
      expect(await readFile(out, "utf8")).toBe(">a contig\nACGT\n>b contig\nACGT\n");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

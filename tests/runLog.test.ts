import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import type { RunLogEvent } from "../src/logging/runLog.js";
import { consoleSink, fileSink, RunLog } from "../src/logging/runLog.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RunLog", () => {
  it("keeps each event once and hands it to every sink in order", async () => {
    const seen: string[] = [];
    const log = new RunLog([
      { write: async (e: RunLogEvent) => void seen.push(`a:${e.kind}`) },
      { write: async (e: RunLogEvent) => void seen.push(`b:${e.kind}`) }
    ]);

    await log.info("run.started", "started");
    await log.warn("batch.short", "short", { uid: "1" });

    expect(log.events.map((e) => [e.level, e.kind, e.data])).toEqual([
      ["info", "run.started", null],
      ["warn", "batch.short", { uid: "1" }]
    ]);
    expect(seen).toEqual(["a:run.started", "b:run.started", "a:batch.short", "b:batch.short"]);
  });

  it("prints info on the console only when verbose", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    await new RunLog([consoleSink({ verbose: false })]).info("x", "hidden");
    await new RunLog([consoleSink({ verbose: false })]).warn("x", "shown");
    await new RunLog([consoleSink({ verbose: true })]).info("x", "also shown");

    expect(spy.mock.calls).toEqual([["WARN: shown"], ["INFO: also shown"]]);
  });

  it("appends JSON lines to a log file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "genome-fetch-log-"));
    try {
      const file = path.join(dir, "logs", "run.jsonl");
      const log = new RunLog([await fileSink(file)]);
      await log.error("run.failed", "boom", { code: "retries_exhausted" });

      const lines = (await readFile(file, "utf8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: "error",
        kind: "run.failed",
        message: "boom",
        data: { code: "retries_exhausted" }
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

import type { Kysely } from "kysely";
import type { JsonObject } from "../core/json.js";
import type { RunId, TaxonId } from "../core/ids.js";
import type { DB } from "../db/types.js";
import type { RunLogEvent, RunLogSink } from "../logging/runLog.js";
import type { AssemblyOutcome } from "../pipeline/orchestrator.js";

export type RunStatus = "running" | "completed" | "failed";

export interface DownloadRunRecord {
  runId: RunId;
  taxa: TaxonId[];
  source: string;
  outDir: string;
  configHash: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  errorCode: string | null;
  errorMessage: string | null;
  summary: JsonObject | null;
}

export interface StoredOutcome {
  taxonId: TaxonId;
  assemblyUid: string;
  accession: string;
  organism: string;
  strain: string;
  strategy: string;
  state: string;
  outputPath: string | null;
  sourceUrl: string | null;
  expectedRecords: number | null;
  returnedRecords: number | null;
  hashPassed: boolean | null;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function asRunStatus(value: string): RunStatus {
  if (value === "running" || value === "completed" || value === "failed") return value;
  throw new Error(`unknown run status in ledger: ${value}`);
}

/** Durable record of download runs: one row per run, its event stream and one row per assembly outcome. */
export class RunLedger {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    taxa: readonly TaxonId[];
    source: string;
    outDir: string;
    configHash: string;
  }): Promise<void> {
    await this.db
      .insertInto("download_runs")
      .values({
        run_id: input.runId,
        taxa: JSON.stringify(input.taxa),
        source: input.source,
        out_dir: input.outDir,
        config_hash: input.configHash,
        status: "running",
        started_at: new Date().toISOString()
      })
      .execute();
  }

  async finishRun(
    runId: RunId,
    input: { status: Exclude<RunStatus, "running">; summary: JsonObject | null; errorCode?: string; errorMessage?: string }
  ): Promise<void> {
    await this.db
      .updateTable("download_runs")
      .set({
        status: input.status,
        finished_at: new Date().toISOString(),
        summary: input.summary === null ? null : JSON.stringify(input.summary),
        error_code: input.errorCode ?? null,
        error_message: input.errorMessage ?? null
      })
      .where("run_id", "=", runId)
      .execute();
  }

  async addRunEvent(runId: RunId, event: RunLogEvent): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        run_id: runId,
        ts: event.ts,
        level: event.level,
        kind: event.kind,
        message: event.message,
        data: event.data === null ? null : JSON.stringify(event.data)
      })
      .execute();
  }

  async recordOutcome(runId: RunId, outcome: AssemblyOutcome): Promise<void> {
    await this.db
      .insertInto("assembly_outcomes")
      .values({
        run_id: runId,
        taxon_id: outcome.taxonId,
        assembly_uid: outcome.assemblyUid,
        accession: outcome.accession,
        organism: outcome.organism,
        strain: outcome.strain,
        strategy: outcome.strategy,
        state: outcome.state,
        output_path: outcome.outputPath,
        source_url: outcome.sourceUrl,
        expected_records: outcome.expectedRecords,
        returned_records: outcome.returnedRecords,
        hash_passed: outcome.hashCheck ? outcome.hashCheck.passed : null,
        local_hash: outcome.hashCheck?.localHash ?? null,
        remote_hash: outcome.hashCheck?.remoteHash ?? null
      })
      .execute();
  }

  async getRun(runId: RunId): Promise<DownloadRunRecord | null> {
    const row = await this.db.selectFrom("download_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    if (!row) return null;
    return {
      runId,
      taxa: row.taxa.map((t) => String(t)),
      source: row.source,
      outDir: row.out_dir,
      configHash: row.config_hash,
      status: asRunStatus(row.status),
      startedAt: toIso(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at),
      errorCode: row.error_code,
      errorMessage: row.error_message,
      summary: row.summary
    };
  }

  async listOutcomes(runId: RunId): Promise<StoredOutcome[]> {
    const rows = await this.db
      .selectFrom("assembly_outcomes")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("outcome_id", "asc")
      .execute();

    return rows.map((row) => ({
      taxonId: row.taxon_id,
      assemblyUid: row.assembly_uid,
      accession: row.accession,
      organism: row.organism,
      strain: row.strain,
      strategy: row.strategy,
      state: row.state,
      outputPath: row.output_path,
      sourceUrl: row.source_url,
      expectedRecords: row.expected_records,
      returnedRecords: row.returned_records,
      hashPassed: row.hash_passed
    }));
  }

  async countEvents(runId: RunId, kind?: string): Promise<number> {
    let q = this.db
      .selectFrom("run_events")
      .select(({ fn }) => fn.countAll<string>().as("n"))
      .where("run_id", "=", runId);
    if (kind !== undefined) q = q.where("kind", "=", kind);
    const row = await q.executeTakeFirstOrThrow();
    return Number(row.n);
  }

  /** Forwards every log event of a run into `run_events`. */
  sinkFor(runId: RunId): RunLogSink {
    return {
      write: (event: RunLogEvent) => this.addRunEvent(runId, event)
    };
  }
}

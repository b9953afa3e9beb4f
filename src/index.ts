#!/usr/bin/env node
import path from "path";
import { parseCliArgs, usage } from "./cli/args.js";
import { applyOverrides, configHash, DEFAULT_CONFIG_PATH, loadDownloadConfig } from "./config/downloadConfig.js";
import { FatalRunError } from "./core/errors.js";
import { newRunId } from "./core/ids.js";
import type { JsonObject } from "./core/json.js";
import { errorMessage } from "./core/json.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createDb, createLedgerPool } from "./db/connection.js";
import { consoleSink, fileSink, RunLog } from "./logging/runLog.js";
import { createPipeline } from "./pipeline/createPipeline.js";
import type { RunSummary } from "./pipeline/orchestrator.js";
import { prepareOutputDirectory, splitTaxa } from "./pipeline/outputs.js";
import { RunLedger } from "./store/runLedger.js";

function summaryJson(summary: RunSummary): JsonObject {
  return {
    count_only: summary.countOnly,
    assemblies: [...summary.assemblies].map(([taxonId, uids]) => ({ taxon_id: taxonId, count: uids.size })),
    written: summary.results.outcomes.filter((o) => o.state === "written").length,
    skipped: summary.results.skipped.length,
    hash_failures: summary.results.outcomes.filter((o) => o.hashCheck !== null && !o.hashCheck.passed).length,
    shortfalls: summary.results.outcomes.filter(
      (o) => o.expectedRecords !== null && o.returnedRecords !== null && o.returnedRecords < o.expectedRecords
    ).length
  };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const sinks = [consoleSink({ verbose: args.verbose })];
  if (args.logfile) sinks.push(await fileSink(args.logfile));
  const log = new RunLog(sinks);

  const configPath = args.configPath ?? process.env.DOWNLOAD_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const config = applyOverrides(await loadDownloadConfig(configPath), {
    email: args.email ?? undefined,
    retries: args.retries ?? undefined,
    timeoutSeconds: args.timeoutSeconds ?? undefined
  });

  if (!config.contact.email.trim()) {
    throw new FatalRunError("missing_precondition", `no contact email address provided (use --email)\n\n${usage()}`);
  }
  if (!args.outDir) throw new FatalRunError("missing_precondition", `no output directory name (use -o)\n\n${usage()}`);
  if (!args.taxon) throw new FatalRunError("missing_precondition", `no taxon IDs (use -t)\n\n${usage()}`);
  const taxa = splitTaxa(args.taxon);
  const outDir = path.resolve(args.outDir);

  const pool = createLedgerPool(process.env.DATABASE_URL);
  try {
    await applySqlFile(pool);
    const ledger = new RunLedger(createDb(pool));
    const runId = newRunId();
    await ledger.createRun({ runId, taxa, source: args.source, outDir, configHash: configHash(config) });
    log.addSink(ledger.sinkFor(runId));

    await log.info("run.started", `taxon-genome-fetch run ${runId} at ${new Date().toISOString()}`, {
      run_id: runId,
      argv: process.argv.slice(2),
      config_path: configPath,
      config_hash: configHash(config)
    });
    await log.info("run.contact", `Contact email for remote requests: ${config.contact.email}`, {
      tool: config.contact.tool
    });

    try {
      const action = await prepareOutputDirectory(outDir, { force: args.force, noclobber: args.noclobber });
      await log.info("run.outdir", `Output directory ${outDir} (${action})`, { out_dir: outDir, action });

      const pipeline = createPipeline({
        config,
        log,
        outDir,
        source: args.source,
        noclobber: args.noclobber,
        onOutcome: (outcome) => ledger.recordOutcome(runId, outcome)
      });
      const summary = await pipeline.run(taxa, { countOnly: args.count });
      await ledger.finishRun(runId, { status: "completed", summary: summaryJson(summary) });
      await log.info("run.finished", `Run ${runId} completed`, summaryJson(summary));
    } catch (err) {
      const code = err instanceof FatalRunError ? err.code : "unexpected_error";
      await log.error("run.failed", `${errorMessage(err)} (exiting)`, {
        code,
        context: err instanceof FatalRunError ? err.context : null
      });
      await ledger.finishRun(runId, { status: "failed", summary: null, errorCode: code, errorMessage: errorMessage(err) });
      process.exitCode = 1;
    }
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(`ERROR: ${errorMessage(err)}`);
  process.exitCode = 1;
});

import { isRunId } from "../src/core/ids.js";
import { createDb, createPgPool } from "../src/db/connection.js";
import { RunLedger } from "../src/store/runLedger.js";

function usage(): string {
  return [
    "usage:",
    "  DATABASE_URL=postgres://... tsx scripts/ledger_report.ts --run <run_id>",
    "",
    "notes:",
    "  - Only runs recorded against a persistent DATABASE_URL can be reported",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const runId = args.run;
  if (typeof runId !== "string" || !isRunId(runId)) throw new Error(`--run <run_id> is required\n\n${usage()}`);
  const url = process.env.DATABASE_URL;
  if (!url) throw new Error(`DATABASE_URL is required\n\n${usage()}`);

  const pool = createPgPool(url);
  try {
    const ledger = new RunLedger(createDb(pool));
    const run = await ledger.getRun(runId);
    if (!run) throw new Error(`unknown run: ${runId}`);

    const lines = [
      `run ${run.runId} [${run.status}] source=${run.source} taxa=${run.taxa.join(",")}`,
      `  out_dir: ${run.outDir}`,
      `  started: ${run.startedAt}  finished: ${run.finishedAt ?? "-"}`
    ];
    if (run.errorCode) lines.push(`  error: ${run.errorCode}: ${run.errorMessage ?? ""}`);
    for (const o of await ledger.listOutcomes(runId)) {
      const records = o.expectedRecords !== null ? ` records=${o.returnedRecords ?? 0}/${o.expectedRecords}` : "";
      const hash = o.hashPassed === null ? "" : ` md5=${o.hashPassed ? "ok" : "MISMATCH"}`;
      lines.push(`  ${o.state.padEnd(7)} ${o.accession} ${o.organism} ${o.strain} (${o.strategy})${records}${hash}`);
    }
    process.stdout.write(lines.join("\n") + "\n");
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});

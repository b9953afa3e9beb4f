import type { AcquisitionSource } from "../pipeline/orchestrator.js";

export interface CliArgs {
  outDir: string | null;
  taxon: string | null;
  email: string | null;
  verbose: boolean;
  force: boolean;
  noclobber: boolean;
  logfile: string | null;
  retries: number | null;
  timeoutSeconds: number | null;
  count: boolean;
  source: AcquisitionSource;
  configPath: string | null;
  help: boolean;
}

const ALIASES: Record<string, string> = {
  "-o": "outdir",
  "-t": "taxon",
  "-v": "verbose",
  "-f": "force",
  "-l": "logfile",
  "-h": "help"
};

const FLAGS = new Set(["verbose", "force", "noclobber", "count", "help"]);
const VALUES = new Set(["outdir", "taxon", "email", "logfile", "retries", "timeout", "source", "config"]);

export function usage(): string {
  return [
    "usage:",
    "  taxon-genome-fetch -o <outdir> -t <taxon[,taxon...]> --email <address> [options]",
    "",
    "options:",
    "  -v, --verbose          report progress on stderr",
    "  -f, --force            reuse an existing output directory (removing it unless --noclobber)",
    "  --noclobber            keep existing files in a forced output directory",
    "  -l, --logfile <path>   also write every event as a JSON line to <path>",
    "  --retries <n>          attempts per remote request (default from config)",
    "  --timeout <seconds>    wait for response headers, 0 for none",
    "  --count                only count assemblies and contigs, download nothing",
    "  --source <entrez|genomes>  contig links and archives (default), or assembly genome files with MD5 checks",
    "  --config <path>        YAML config (default config/default.download.yaml)",
    ""
  ].join("\n");
}

function isAcquisitionSource(value: string): value is AcquisitionSource {
  return value === "entrez" || value === "genomes";
}

function positiveInt(name: string, value: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) throw new Error(`--${name} must be an integer >= ${min} (got ${value})`);
  return n;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const raw: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    const key = ALIASES[a] ?? (a.startsWith("--") ? a.slice(2) : null);
    if (key === null) throw new Error(`unexpected arg: ${a}`);
    if (FLAGS.has(key)) {
      raw[key] = true;
      continue;
    }
    if (!VALUES.has(key)) throw new Error(`unknown option: ${a}`);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("-")) throw new Error(`missing value for ${a}`);
    raw[key] = next;
    i++;
  }

  const str = (k: string): string | null => {
    const v = raw[k];
    return typeof v === "string" ? v : null;
  };

  const source = str("source") ?? "entrez";
  if (!isAcquisitionSource(source)) throw new Error(`--source must be entrez or genomes (got ${source})`);
  const retries = str("retries");
  const timeout = str("timeout");

  return {
    outDir: str("outdir"),
    taxon: str("taxon"),
    email: str("email"),
    verbose: raw.verbose === true,
    force: raw.force === true,
    noclobber: raw.noclobber === true,
    logfile: str("logfile"),
    retries: retries === null ? null : positiveInt("retries", retries, 1),
    timeoutSeconds: timeout === null ? null : positiveInt("timeout", timeout, 0),
    count: raw.count === true,
    source,
    configPath: str("config"),
    help: raw.help === true
  };
}

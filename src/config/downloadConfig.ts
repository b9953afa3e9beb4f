import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigError } from "../core/errors.js";

export const DEFAULT_CONFIG_PATH = "config/default.download.yaml";

const zContact = z.object({
  email: z.string().default(""),
  tool: z.string().min(1).default("taxon-genome-fetch")
});

const zEntrez = z.object({
  base_url: z.string().url().default("https://eutils.ncbi.nlm.nih.gov/entrez/eutils/"),
  request_timeout_seconds: z.number().int().min(0).default(0)
});

const zRetry = z.object({
  max_attempts: z.number().int().min(1).default(20),
  delay_ms: z.number().int().min(0).default(0)
});

const zLimits = z.object({
  search_page_size: z.number().int().min(1).default(250),
  fetch_batch_size: z.number().int().min(1).default(10000),
  link_result_cap: z.number().int().min(1).default(100000)
});

const zArchive = z.object({
  url_prefix: z.string().min(1).default("https://www.ncbi.nlm.nih.gov/Traces/wgs/?download=")
});

const zGenomes = z.object({
  base_url: z.string().url().default("https://ftp.ncbi.nlm.nih.gov/genomes/all"),
  suffix: z.string().min(1).default("genomic.fna.gz"),
  hash_file: z.string().min(1).default("md5checksums.txt")
});

const zOutput = z.object({
  classes_file: z.string().min(1).default("classes.txt"),
  labels_file: z.string().min(1).default("labels.txt")
});

export const zDownloadConfig = z.object({
  version: z.literal(1),
  contact: zContact.default({ email: "", tool: "taxon-genome-fetch" }),
  entrez: zEntrez.default({
    base_url: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/",
    request_timeout_seconds: 0
  }),
  retry: zRetry.default({ max_attempts: 20, delay_ms: 0 }),
  limits: zLimits.default({ search_page_size: 250, fetch_batch_size: 10000, link_result_cap: 100000 }),
  archive: zArchive.default({ url_prefix: "https://www.ncbi.nlm.nih.gov/Traces/wgs/?download=" }),
  genomes: zGenomes.default({
    base_url: "https://ftp.ncbi.nlm.nih.gov/genomes/all",
    suffix: "genomic.fna.gz",
    hash_file: "md5checksums.txt"
  }),
  output: zOutput.default({ classes_file: "classes.txt", labels_file: "labels.txt" })
});

export type DownloadConfig = z.output<typeof zDownloadConfig>;

function expandEnvToken(value: string): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return value;
  return process.env[varName]?.trim() ?? "";
}

export function expandEnvTokens(value: unknown): unknown {
  if (typeof value === "string") return expandEnvToken(value);
  if (Array.isArray(value)) return value.map((v) => expandEnvTokens(v));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnvTokens(v);
    return out;
  }
  return value;
}

export function parseDownloadConfig(raw: unknown, source: string): DownloadConfig {
  const parsed = zDownloadConfig.safeParse(expandEnvTokens(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.map(String).join(".") : "(root)";
    throw new ConfigError(source, `${where}: ${issue?.message ?? "does not match schema"}`);
  }
  return parsed.data;
}

export async function loadDownloadConfig(filePath: string): Promise<DownloadConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") throw new ConfigError(filePath, "file not found");
    throw err;
  }
  const doc: unknown = YAML.parse(raw);
  return parseDownloadConfig(doc, filePath);
}

export function configHash(config: DownloadConfig): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(config));
}

/** Command-line values win over the file. */
export function applyOverrides(
  config: DownloadConfig,
  overrides: { email?: string; retries?: number; timeoutSeconds?: number }
): DownloadConfig {
  return {
    ...config,
    contact: { ...config.contact, email: overrides.email ?? config.contact.email },
    retry: { ...config.retry, max_attempts: overrides.retries ?? config.retry.max_attempts },
    entrez: {
      ...config.entrez,
      request_timeout_seconds: overrides.timeoutSeconds ?? config.entrez.request_timeout_seconds
    }
  };
}

import path from "path";
import { errorMessage } from "../core/json.js";
import type { HttpDownloader } from "../io/httpDownload.js";
import type { RunLog } from "../logging/runLog.js";
import type { AssemblyMetadata } from "./assemblyMetadata.js";

export interface DownloadOutcome {
  localPath: string;
  /** Null when the checksum listing could not be fetched. */
  hashFilePath: string | null;
  sourceUrl: string;
  /** No bytes were retrieved; nothing may be hashed or extracted. */
  skipped: boolean;
}

/** `<accession>_<assembly name>` with spaces as underscores, as the genome directories are named. */
export function assemblyFileStem(meta: Pick<AssemblyMetadata, "accession" | "assemblyName" | "ftpPath">): string {
  if (meta.ftpPath) {
    const base = path.posix.basename(meta.ftpPath.replace(/\/+$/, ""));
    if (base) return base;
  }
  const name = meta.assemblyName.trim().replace(/\s+/g, "_");
  return name ? `${meta.accession}_${name}` : meta.accession;
}

/**
 * Directory URL for an assembly. A published FTP path is reused over HTTPS;
 * otherwise the path is compiled from the accession digits in groups of three.
 */
export function assemblyDirectoryUrl(
  meta: Pick<AssemblyMetadata, "accession" | "assemblyName" | "ftpPath">,
  baseUrl: string
): string {
  if (meta.ftpPath) return meta.ftpPath.replace(/^ftp:\/\//, "https://").replace(/\/+$/, "");

  const m = /^(GC[AF])_(\d{9})/.exec(meta.accession);
  if (!m) throw new Error(`cannot compile a genome directory for accession ${meta.accession}`);
  const [, prefix, digits] = m;
  const groups = (digits ?? "").match(/\d{3}/g) ?? [];
  return [baseUrl.replace(/\/+$/, ""), prefix, ...groups, assemblyFileStem(meta)].join("/");
}

export class GenomeDownloader {
  constructor(
    private readonly deps: {
      downloader: HttpDownloader;
      log: RunLog;
      outDir: string;
      baseUrl: string;
      suffix: string;
      hashFile: string;
    }
  ) {}

  async download(meta: AssemblyMetadata): Promise<DownloadOutcome> {
    const { downloader, log, outDir, baseUrl, suffix, hashFile } = this.deps;
    const stem = assemblyFileStem(meta);
    const fileName = `${stem}_${suffix}`;
    const localPath = path.join(outDir, fileName);

    let dirUrl: string;
    try {
      dirUrl = assemblyDirectoryUrl(meta, baseUrl);
    } catch (err) {
      await log.warn("genome.no_url", `No download location for ${meta.accession}: ${errorMessage(err)}`, {
        accession: meta.accession
      });
      return { localPath, hashFilePath: null, sourceUrl: "", skipped: true };
    }

    const sourceUrl = `${dirUrl}/${fileName}`;
    await log.info("genome.probe", `Trying URL: ${sourceUrl}`, { url: sourceUrl });
    const probe = await downloader.probe(sourceUrl);
    if (!probe.ok) {
      await log.warn("genome.probe_failed", `Could not establish download size for ${sourceUrl} (${probe.reason})`, {
        url: sourceUrl,
        reason: probe.reason
      });
      return { localPath, hashFilePath: null, sourceUrl, skipped: true };
    }
    await downloader.save(probe, localPath);
    await log.info("genome.downloaded", `Wrote assembly to ${localPath}`, { url: sourceUrl, path: localPath });

    const hashUrl = `${dirUrl}/${hashFile}`;
    const hashFilePath = path.join(outDir, `${stem}_hashes.txt`);
    const hashProbe = await downloader.probe(hashUrl);
    if (!hashProbe.ok) {
      await log.warn("genome.no_hashes", `Could not download ${hashUrl} (${hashProbe.reason})`, { url: hashUrl });
      return { localPath, hashFilePath: null, sourceUrl, skipped: false };
    }
    await downloader.save(hashProbe, hashFilePath);
    await log.info("genome.hashes", `Wrote MD5 hashes to ${hashFilePath}`, { url: hashUrl, path: hashFilePath });
    return { localPath, hashFilePath, sourceUrl, skipped: false };
  }
}

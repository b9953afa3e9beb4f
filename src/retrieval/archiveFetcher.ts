import path from "path";
import { AnnotationFormatError, ArchiveVersionExhaustedError } from "../core/errors.js";
import type { EntrezApi } from "../entrez/types.js";
import type { Decompressor } from "../io/decompress.js";
import { readFastaHeaders } from "../io/fasta.js";
import type { HttpDownloader, ProbeResult } from "../io/httpDownload.js";
import type { RunLog } from "../logging/runLog.js";
import type { RetryExecutor } from "./retry.js";

export interface ArchiveReference {
  downloadStem: string;
  version: number;
}

export interface ArchiveFetchResult {
  /** Reference that actually downloaded; its version may be lower than the annotated one. */
  reference: ArchiveReference;
  annotatedVersion: number;
  url: string;
  archivePath: string;
  fastaPath: string;
  bytes: number;
  contigIdentifiers: string[];
}

const STEM_LENGTH = 6;

/**
 * Reads the archive stem and version from a nucleotide summary's `extra`
 * annotation, e.g. `gi|0|gb|ABCD00000000.3|ABCD03000000`: the stem is the first
 * six characters of the last field, the version follows the last dot of the
 * fourth field. The layout is fixed by the repository, not by us.
 */
export function parseArchiveAnnotation(extra: string): ArchiveReference {
  const fields = extra.split("|");
  if (fields.length < 5) throw new AnnotationFormatError(extra, `expected at least 5 fields, got ${fields.length}`);

  const last = (fields[fields.length - 1] ?? "").trim();
  const downloadStem = last.slice(0, STEM_LENGTH);
  if (!/^[A-Za-z0-9]+$/.test(downloadStem) || downloadStem.length !== STEM_LENGTH) {
    throw new AnnotationFormatError(extra, `no ${STEM_LENGTH}-character download stem in "${last}"`);
  }

  const accession = (fields[3] ?? "").trim();
  const dot = accession.lastIndexOf(".");
  const versionText = dot === -1 ? "" : accession.slice(dot + 1);
  if (!/^\d+$/.test(versionText)) {
    throw new AnnotationFormatError(extra, `no version number in "${accession}"`);
  }
  return { downloadStem, version: Number(versionText) };
}

export function archiveFileName(ref: ArchiveReference): string {
  return `${ref.downloadStem}.${ref.version}.fsa_nt.gz`;
}

export class ArchiveFetcher {
  constructor(
    private readonly deps: {
      entrez: EntrezApi;
      retry: RetryExecutor;
      log: RunLog;
      downloader: HttpDownloader;
      decompressor: Decompressor;
      urlPrefix: string;
      outDir: string;
    }
  ) {}

  async fetch(archiveUid: string, accession: string): Promise<ArchiveFetchResult> {
    const { entrez, retry, log, downloader, decompressor, outDir } = this.deps;
    await log.info("archive.summary", `Processing wgsmaster UID ${archiveUid}`, { archive_uid: archiveUid });

    const summary = await retry.run(`esummary nuccore ${archiveUid}`, () => entrez.nucleotideSummary(archiveUid));
    const annotated = parseArchiveAnnotation(summary.extra);

    const { reference, probe } = await this.probeVersions(annotated);
    const fileName = archiveFileName(reference);
    const archivePath = path.join(outDir, fileName);

    await log.info("archive.download", `Downloading ${fileName} (${probe.contentLength} bytes)`, {
      url: probe.url,
      declared_bytes: probe.contentLength
    });
    const saved = await downloader.save(probe, archivePath, async (received, declared) => {
      const pct = declared > 0 ? ((received * 100) / declared).toFixed(2) : "100.00";
      await log.info("archive.progress", `${fileName}: ${received} bytes [${pct}%]`, { received, declared });
    });

    const fastaPath = path.join(outDir, `${accession}.fasta`);
    await log.info("archive.extract", `Extracting archive ${archivePath} to ${fastaPath}`, {
      archive_path: archivePath,
      fasta_path: fastaPath
    });
    await decompressor.decompress(archivePath, fastaPath);

    const contigIdentifiers = await readFastaHeaders(fastaPath);
    await log.info("archive.contigs", `Archive for ${accession} holds ${contigIdentifiers.length} sequences`, {
      accession,
      contig_count: contigIdentifiers.length
    });

    return {
      reference,
      annotatedVersion: annotated.version,
      url: probe.url,
      archivePath,
      fastaPath,
      bytes: saved.bytes,
      contigIdentifiers
    };
  }

  /**
   * Assembly and archive versions are maintained independently, so the annotated
   * version may not exist yet; walk down one version at a time until a probe
   * succeeds. Version 0 is never requested.
   */
  async probeVersions(start: ArchiveReference): Promise<{
    reference: ArchiveReference;
    probe: Extract<ProbeResult, { ok: true }>;
  }> {
    const { downloader, log, urlPrefix } = this.deps;
    const attempted: number[] = [];

    for (let version = start.version; version > 0; version--) {
      attempted.push(version);
      const reference = { downloadStem: start.downloadStem, version };
      const url = `${urlPrefix}${archiveFileName(reference)}`;
      await log.info("archive.probe", `Trying URL: ${url}`, { url, version });

      const probe = await downloader.probe(url);
      if (probe.ok) return { reference, probe };
      await log.warn("archive.probe_failed", `Download failed for ${url} (${probe.reason})`, {
        url,
        version,
        reason: probe.reason
      });
    }

    await log.error("archive.exhausted", `No archive version of ${start.downloadStem} could be downloaded (exiting)`, {
      download_stem: start.downloadStem,
      attempted_versions: attempted
    });
    throw new ArchiveVersionExhaustedError(start.downloadStem, attempted);
  }
}

import path from "path";
import type { AssemblyUid, TaxonId } from "../core/ids.js";
import type { Decompressor } from "../io/decompress.js";
import type { RunLog } from "../logging/runLog.js";
import type { ArchiveFetcher } from "../retrieval/archiveFetcher.js";
import type { AssemblyMetadata, AssemblyMetadataReader } from "../retrieval/assemblyMetadata.js";
import { classLabelFor } from "../retrieval/assemblyMetadata.js";
import type { BatchSequenceFetcher } from "../retrieval/batchFetcher.js";
import type { GenomeDownloader } from "../retrieval/genomeDownload.js";
import { assemblyFileStem } from "../retrieval/genomeDownload.js";
import type { HashCheckResult } from "../retrieval/integrity.js";
import { checkFileHash } from "../retrieval/integrity.js";
import type { LinkStrategy, LinkStrategyResolver } from "../retrieval/linkStrategy.js";
import type { TaxonResolver } from "../retrieval/taxonResolver.js";
import { pathExists, writeClassesAndLabels } from "./outputs.js";

export type AcquisitionSource = "entrez" | "genomes";

export type AssemblyState =
  | "resolving"
  | "metadata-fetched"
  | "strategy-chosen"
  | "archive-fetched"
  | "batch-fetched"
  | "verified"
  | "written"
  | "skipped";

export type OutcomeStrategy = LinkStrategy | "genome_download";

export interface SkippedAssembly {
  taxonId: TaxonId;
  assemblyUid: AssemblyUid;
  accession: string;
  organism: string;
  strain: string;
  url: string;
}

export interface AssemblyOutcome {
  taxonId: TaxonId;
  assemblyUid: AssemblyUid;
  accession: string;
  organism: string;
  strain: string;
  strategy: OutcomeStrategy;
  state: Extract<AssemblyState, "written" | "skipped">;
  outputPath: string | null;
  sourceUrl: string | null;
  expectedRecords: number | null;
  returnedRecords: number | null;
  hashCheck: HashCheckResult | null;
}

/** Run-scoped results, appended to in run order by the orchestrator alone. */
export interface RunAccumulator {
  classes: string[];
  labels: string[];
  skipped: SkippedAssembly[];
  outcomes: AssemblyOutcome[];
}

export function newAccumulator(): RunAccumulator {
  return { classes: [], labels: [], skipped: [], outcomes: [] };
}

export interface ContigCount {
  taxonId: TaxonId;
  assemblyUid: AssemblyUid;
  strategy: LinkStrategy;
  /** Null for archive assemblies, whose contigs are only known after download. */
  contigCount: number | null;
}

export interface RunSummary {
  assemblies: Map<TaxonId, Set<AssemblyUid>>;
  countOnly: boolean;
  contigCounts: ContigCount[];
  results: RunAccumulator;
  classesPath: string | null;
  labelsPath: string | null;
}

export interface OrchestratorDeps {
  log: RunLog;
  taxa: TaxonResolver;
  metadata: AssemblyMetadataReader;
  links: LinkStrategyResolver;
  archive: ArchiveFetcher;
  batch: BatchSequenceFetcher;
  genomes: GenomeDownloader;
  decompressor: Decompressor;
  outDir: string;
  source: AcquisitionSource;
  noclobber: boolean;
  outputNames: { classesFile: string; labelsFile: string };
  onOutcome?: (outcome: AssemblyOutcome) => Promise<void>;
}

/**
 * Drives every assembly of every taxon through
 * resolving → metadata-fetched → strategy-chosen → {archive,batch}-fetched →
 * [verified] → written | skipped, strictly one at a time. Failure policy lives
 * in each component; an assembly is never restarted from the top.
 */
export class PipelineOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(taxonIds: readonly TaxonId[], opts: { countOnly?: boolean } = {}): Promise<RunSummary> {
    const { log } = this.deps;
    await log.info("run.taxa", `Taxon IDs received: ${taxonIds.join(", ")}`, { taxa: [...taxonIds] });

    const assemblies = new Map<TaxonId, Set<AssemblyUid>>();
    for (const taxonId of taxonIds) {
      assemblies.set(taxonId, await this.deps.taxa.resolve(taxonId));
    }
    for (const [taxonId, uids] of assemblies) {
      await log.info("run.taxon_summary", `Taxon ${taxonId}: ${uids.size} assemblies`, {
        taxon_id: taxonId,
        assembly_count: uids.size
      });
    }
    await this.reportSharedAssemblies(assemblies);

    if (opts.countOnly) {
      const contigCounts = await this.countContigs(assemblies);
      await log.info("run.count_only", "Count only: not downloading", { assemblies: contigCounts.length });
      return { assemblies, countOnly: true, contigCounts, results: newAccumulator(), classesPath: null, labelsPath: null };
    }

    const results = newAccumulator();
    for (const [taxonId, uids] of assemblies) {
      await log.info("run.taxon", `Downloading contigs for taxon ${taxonId}`, { taxon_id: taxonId });
      for (const uid of uids) {
        await this.processAssembly(taxonId, uid, results);
      }
    }

    const { classesPath, labelsPath } = await writeClassesAndLabels(this.deps.outDir, results, this.deps.outputNames);
    await log.info("run.outputs", `Wrote ${results.classes.length} classes to ${classesPath} and labels to ${labelsPath}`, {
      classes_path: classesPath,
      labels_path: labelsPath,
      entries: results.classes.length
    });
    await this.reportSkipped(results.skipped);

    return { assemblies, countOnly: false, contigCounts: [], results, classesPath, labelsPath };
  }

  private async transition(uid: AssemblyUid, state: AssemblyState, detail: string = ""): Promise<void> {
    await this.deps.log.info("assembly.state", `Assembly ${uid}: ${state}${detail ? ` (${detail})` : ""}`, { uid, state });
  }

  private async processAssembly(taxonId: TaxonId, uid: AssemblyUid, results: RunAccumulator): Promise<void> {
    await this.transition(uid, "resolving");
    const meta = await this.deps.metadata.read(uid);
    await this.transition(uid, "metadata-fetched", meta.accession);

    const outcome =
      this.deps.source === "genomes"
        ? await this.acquireGenome(taxonId, meta)
        : await this.acquireContigs(taxonId, meta);

    if (outcome.state === "skipped") {
      results.skipped.push({
        taxonId,
        assemblyUid: uid,
        accession: meta.accession,
        organism: meta.organism,
        strain: meta.strain,
        url: outcome.sourceUrl ?? ""
      });
    } else {
      const key = this.deps.source === "genomes" ? assemblyFileStem(meta) : meta.accession;
      const { classLine, labelLine } = classLabelFor(meta, key);
      results.classes.push(classLine);
      results.labels.push(labelLine);
      await this.deps.log.info("assembly.class_label", `Label: ${labelLine} Class: ${classLine}`, {
        uid,
        label: labelLine,
        class: classLine
      });
    }
    results.outcomes.push(outcome);
    await this.transition(uid, outcome.state);
    if (this.deps.onOutcome) await this.deps.onOutcome(outcome);
  }

  private baseOutcome(
    taxonId: TaxonId,
    meta: AssemblyMetadata
  ): Pick<AssemblyOutcome, "taxonId" | "assemblyUid" | "accession" | "organism" | "strain"> {
    return {
      taxonId,
      assemblyUid: meta.uid,
      accession: meta.accession,
      organism: meta.organism,
      strain: meta.strain
    };
  }

  private async acquireContigs(taxonId: TaxonId, meta: AssemblyMetadata): Promise<AssemblyOutcome> {
    const links = await this.deps.links.resolve(meta.uid);
    await this.transition(meta.uid, "strategy-chosen", links.strategy);

    if (links.strategy === "archive_wgs") {
      const fetched = await this.deps.archive.fetch(links.archiveUid, meta.accession);
      await this.transition(meta.uid, "archive-fetched", fetched.url);
      return {
        ...this.baseOutcome(taxonId, meta),
        strategy: links.strategy,
        state: "written",
        outputPath: fetched.fastaPath,
        sourceUrl: fetched.url,
        expectedRecords: null,
        returnedRecords: fetched.contigIdentifiers.length,
        hashCheck: null
      };
    }

    await this.deps.log.info(
      "assembly.fetch",
      `Downloading FASTA records for assembly ${meta.uid} (${[meta.genus, meta.species, meta.strain].filter(Boolean).join(" ")})`,
      { uid: meta.uid, contig_count: links.contigUids.size }
    );
    const outputPath = path.join(this.deps.outDir, `${meta.accession}.fasta`);
    const written = await this.deps.batch.fetchToFile(meta.uid, links.contigUids, outputPath);
    await this.transition(meta.uid, "batch-fetched", `${written.returned}/${written.expected} records`);
    return {
      ...this.baseOutcome(taxonId, meta),
      strategy: links.strategy,
      state: "written",
      outputPath,
      sourceUrl: null,
      expectedRecords: written.expected,
      returnedRecords: written.returned,
      hashCheck: null
    };
  }

  private async acquireGenome(taxonId: TaxonId, meta: AssemblyMetadata): Promise<AssemblyOutcome> {
    const { log, decompressor, noclobber } = this.deps;
    const download = await this.deps.genomes.download(meta);
    const base = {
      ...this.baseOutcome(taxonId, meta),
      strategy: "genome_download" as const,
      sourceUrl: download.sourceUrl,
      expectedRecords: null,
      returnedRecords: null
    };
    if (download.skipped) {
      return { ...base, state: "skipped", outputPath: null, hashCheck: null };
    }
    await this.transition(meta.uid, "archive-fetched", download.sourceUrl);

    let hashCheck: HashCheckResult | null = null;
    if (download.hashFilePath) {
      hashCheck = await checkFileHash(download.localPath, download.hashFilePath, "md5");
      await log.info("assembly.hash", `Local MD5 hash: ${hashCheck.localHash ?? "-"} Declared MD5 hash: ${hashCheck.remoteHash ?? "-"}`, {
        uid: meta.uid,
        local_hash: hashCheck.localHash,
        remote_hash: hashCheck.remoteHash
      });
      if (hashCheck.passed) {
        await log.info("assembly.hash_passed", `MD5 hash check passed for ${download.localPath}`, { uid: meta.uid });
      } else {
        await log.warn("assembly.hash_failed", `MD5 hash check failed for ${download.localPath}${hashCheck.error ? ` (${hashCheck.error})` : ""}`, {
          uid: meta.uid,
          path: download.localPath,
          error: hashCheck.error
        });
      }
      await this.transition(meta.uid, "verified", hashCheck.passed ? "passed" : "failed");
    } else {
      await log.warn("assembly.hash_missing", `No declared hash for ${download.localPath}; integrity not checked`, {
        uid: meta.uid
      });
    }

    const extractedPath = download.localPath.replace(/\.gz$/, "");
    if (noclobber && (await pathExists(extractedPath))) {
      await log.warn("assembly.extract_skipped", `Output file ${extractedPath} exists, not extracting`, { path: extractedPath });
    } else {
      await log.info("assembly.extract", `Extracting archive ${download.localPath} to ${extractedPath}`, {
        archive_path: download.localPath,
        path: extractedPath
      });
      await decompressor.decompress(download.localPath, extractedPath);
    }

    return { ...base, state: "written", outputPath: extractedPath, hashCheck };
  }

  private async countContigs(assemblies: Map<TaxonId, Set<AssemblyUid>>): Promise<ContigCount[]> {
    const counts: ContigCount[] = [];
    for (const [taxonId, uids] of assemblies) {
      for (const uid of uids) {
        const links = await this.deps.links.resolve(uid);
        const contigCount = links.strategy === "archive_wgs" ? null : links.contigUids.size;
        counts.push({ taxonId, assemblyUid: uid, strategy: links.strategy, contigCount });
        await this.deps.log.info("run.count", `Assembly ${uid}: ${contigCount ?? "archive"} contigs`, {
          taxon_id: taxonId,
          uid,
          strategy: links.strategy,
          contig_count: contigCount
        });
      }
    }
    return counts;
  }

  /** An assembly under several taxa is processed once per taxon; the later write wins. */
  private async reportSharedAssemblies(assemblies: Map<TaxonId, Set<AssemblyUid>>): Promise<void> {
    const seen = new Map<AssemblyUid, TaxonId[]>();
    for (const [taxonId, uids] of assemblies) {
      for (const uid of uids) seen.set(uid, [...(seen.get(uid) ?? []), taxonId]);
    }
    for (const [uid, taxa] of seen) {
      if (taxa.length < 2) continue;
      await this.deps.log.warn("run.shared_assembly", `Assembly ${uid} appears under taxa ${taxa.join(", ")}; it will be fetched once per taxon`, {
        uid,
        taxa
      });
    }
  }

  private async reportSkipped(skipped: readonly SkippedAssembly[]): Promise<void> {
    if (!skipped.length) return;
    await this.deps.log.warn("run.skipped", `${skipped.length} genome downloads were skipped`, { count: skipped.length });
    for (const s of skipped) {
      await this.deps.log.warn(
        "run.skipped_entry",
        `${s.organism} ${s.strain}:\n\ttaxon id: ${s.taxonId}\n\taccession: ${s.accession}\n\tURL: ${s.url}`,
        { taxon_id: s.taxonId, uid: s.assemblyUid, accession: s.accession, organism: s.organism, strain: s.strain, url: s.url }
      );
    }
  }
}

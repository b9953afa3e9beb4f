import type { DownloadConfig } from "../config/downloadConfig.js";
import { EntrezClient } from "../entrez/entrezClient.js";
import type { EntrezApi, FetchLike } from "../entrez/types.js";
import type { Decompressor } from "../io/decompress.js";
import { GunzipDecompressor } from "../io/decompress.js";
import { HttpDownloader } from "../io/httpDownload.js";
import type { RunLog } from "../logging/runLog.js";
import { ArchiveFetcher } from "../retrieval/archiveFetcher.js";
import { AssemblyMetadataReader } from "../retrieval/assemblyMetadata.js";
import { BatchSequenceFetcher } from "../retrieval/batchFetcher.js";
import { GenomeDownloader } from "../retrieval/genomeDownload.js";
import { LinkStrategyResolver } from "../retrieval/linkStrategy.js";
import { RetryExecutor } from "../retrieval/retry.js";
import { TaxonResolver } from "../retrieval/taxonResolver.js";
import type { AcquisitionSource, AssemblyOutcome } from "./orchestrator.js";
import { PipelineOrchestrator } from "./orchestrator.js";

export interface PipelineOptions {
  config: DownloadConfig;
  log: RunLog;
  outDir: string;
  source: AcquisitionSource;
  noclobber: boolean;
  /** Defaults to an EntrezClient over `fetch`. */
  entrez?: EntrezApi;
  /** Used for archive and genome downloads, and by the default EntrezClient. */
  fetch?: FetchLike;
  decompressor?: Decompressor;
  onOutcome?: (outcome: AssemblyOutcome) => Promise<void>;
}

export function createPipeline(opts: PipelineOptions): PipelineOrchestrator {
  const { config, log, outDir } = opts;
  const contact = { email: config.contact.email, tool: config.contact.tool };
  const timeoutSeconds = config.entrez.request_timeout_seconds;

  const entrez =
    opts.entrez ??
    new EntrezClient({ baseUrl: config.entrez.base_url, contact, timeoutSeconds, fetch: opts.fetch });
  const downloader = new HttpDownloader({ contact, timeoutSeconds, fetch: opts.fetch });
  const decompressor = opts.decompressor ?? new GunzipDecompressor();
  const retry = new RetryExecutor({ maxAttempts: config.retry.max_attempts, delayMs: config.retry.delay_ms }, log);

  return new PipelineOrchestrator({
    log,
    taxa: new TaxonResolver({ entrez, retry, log, pageSize: config.limits.search_page_size }),
    metadata: new AssemblyMetadataReader({ entrez, retry, log }),
    links: new LinkStrategyResolver({ entrez, retry, log, resultCap: config.limits.link_result_cap }),
    archive: new ArchiveFetcher({
      entrez,
      retry,
      log,
      downloader,
      decompressor,
      urlPrefix: config.archive.url_prefix,
      outDir
    }),
    batch: new BatchSequenceFetcher({
      entrez,
      retry,
      log,
      batchSize: config.limits.fetch_batch_size,
      maxPasses: config.retry.max_attempts
    }),
    genomes: new GenomeDownloader({
      downloader,
      log,
      outDir,
      baseUrl: config.genomes.base_url,
      suffix: config.genomes.suffix,
      hashFile: config.genomes.hash_file
    }),
    decompressor,
    outDir,
    source: opts.source,
    noclobber: opts.noclobber,
    outputNames: { classesFile: config.output.classes_file, labelsFile: config.output.labels_file },
    onOutcome: opts.onOutcome
  });
}

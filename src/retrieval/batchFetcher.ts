import type { AssemblyUid, ContigUid } from "../core/ids.js";
import type { EntrezApi } from "../entrez/types.js";
import type { FastaRecord } from "../io/fasta.js";
import { parseFasta, totalSequenceLength, writeFasta } from "../io/fasta.js";
import type { RunLog } from "../logging/runLog.js";
import type { RetryExecutor } from "./retry.js";

export interface BatchFetchResult {
  records: FastaRecord[];
  expected: number;
  returned: number;
  /** Full passes made over the contig set. */
  passes: number;
  /** False when every pass returned fewer records than expected. */
  complete: boolean;
}

export interface WrittenSequences extends BatchFetchResult {
  outputPath: string;
  written: number;
}

export class BatchSequenceFetcher {
  constructor(
    private readonly deps: {
      entrez: EntrezApi;
      retry: RetryExecutor;
      log: RunLog;
      batchSize: number;
      /** Ceiling on full passes when a pass comes back short. */
      maxPasses: number;
    }
  ) {}

  /**
   * Fetches every contig in batches of the joined identifier list. A short pass
   * is repeated in full; if the ceiling is reached the last pass is returned
   * anyway and the shortfall is logged.
   */
  async fetchRecords(uid: AssemblyUid, contigUids: ReadonlySet<ContigUid>): Promise<BatchFetchResult> {
    const { log, maxPasses } = this.deps;
    const ids = [...contigUids];
    const expected = ids.length;
    let records: FastaRecord[] = [];
    let passes = 0;

    while (passes < maxPasses) {
      passes++;
      records = await this.fetchPass(uid, ids);
      await log.info("batch.size", `Downloaded genome size for ${uid}: ${totalSequenceLength(records)}`, {
        uid,
        pass: passes,
        total_length: totalSequenceLength(records)
      });

      if (records.length === expected) {
        return { records, expected, returned: records.length, passes, complete: true };
      }
      if (records.length > expected) {
        await log.warn("batch.excess", `${expected} contigs expected, ${records.length} contigs returned for ${uid} (continuing)`, {
          uid,
          expected,
          returned: records.length
        });
        return { records, expected, returned: records.length, passes, complete: true };
      }
      await log.warn(
        "batch.short",
        `${expected} contigs expected, ${records.length} contigs returned for ${uid} (try ${passes}/${maxPasses})`,
        { uid, expected, returned: records.length, pass: passes, max_passes: maxPasses }
      );
    }

    await log.error(
      "batch.shortfall",
      `Failed to download all records for ${uid}: ${expected - records.length} missing (continuing)`,
      { uid, expected, returned: records.length, shortfall: expected - records.length }
    );
    return { records, expected, returned: records.length, passes, complete: false };
  }

  async fetchToFile(uid: AssemblyUid, contigUids: ReadonlySet<ContigUid>, outputPath: string): Promise<WrittenSequences> {
    const result = await this.fetchRecords(uid, contigUids);
    const written = await writeFasta(outputPath, result.records);
    await this.deps.log.info("batch.written", `Wrote ${written} contigs to ${outputPath}`, {
      uid,
      output_path: outputPath,
      written
    });
    return { ...result, outputPath, written };
  }

  private async fetchPass(uid: AssemblyUid, ids: readonly string[]): Promise<FastaRecord[]> {
    const { entrez, retry, log, batchSize } = this.deps;
    const records: FastaRecord[] = [];
    for (let start = 0; start < ids.length; start += batchSize) {
      const end = Math.min(start + batchSize, ids.length);
      await log.info("batch.fetch", `Batch ${start}-${end} of ${ids.length} for ${uid}`, { uid, start, end });
      const text = await retry.run(`efetch nucleotide ${uid} [${start}+${batchSize}]`, () =>
        entrez.fetchFasta({ db: "nucleotide", ids, retStart: start, retMax: batchSize })
      );
      records.push(...parseFasta(text));
    }
    return records;
  }
}

import type { AssemblyUid, TaxonId } from "../core/ids.js";
import { EntrezResponseError } from "../core/errors.js";
import type { EntrezApi, SearchHistory } from "../entrez/types.js";
import type { RunLog } from "../logging/runLog.js";
import type { RetryExecutor } from "./retry.js";

/** Every assembly in the subtree rooted at the taxon, the taxon itself included. */
export function taxonSubtreeQuery(taxonId: TaxonId): string {
  return `txid${taxonId}[Organism:exp]`;
}

export class TaxonResolver {
  constructor(
    private readonly deps: {
      entrez: EntrezApi;
      retry: RetryExecutor;
      log: RunLog;
      pageSize: number;
    }
  ) {}

  async resolve(taxonId: TaxonId): Promise<Set<AssemblyUid>> {
    const { entrez, retry, log, pageSize } = this.deps;
    const term = taxonSubtreeQuery(taxonId);
    await log.info("taxon.search", `ESearch for ${term}`, { taxon_id: taxonId, term });

    const { count, history } = await retry.run(`esearch ${term}`, async () => {
      const page = await entrez.search({ db: "assembly", term, retStart: 0, retMax: 0, useHistory: true });
      if (page.count > 0 && !page.history) {
        throw new EntrezResponseError("esearch.fcgi", `no result handle returned for ${term}`);
      }
      return page;
    });
    await log.info("taxon.count", `ESearch returns ${count} assembly IDs for taxon ${taxonId}`, {
      taxon_id: taxonId,
      count
    });

    const uids = new Set<AssemblyUid>();
    if (count === 0 || !history) return uids;

    for (let start = 0; start < count; start += pageSize) {
      const ids = await this.fetchPage(term, history, start);
      // A page never contributes more than its share of the advertised count.
      for (const id of ids.slice(0, Math.min(pageSize, count - start))) uids.add(id);
    }

    await log.info("taxon.resolved", `Identified ${uids.size} unique assemblies for taxon ${taxonId}`, {
      taxon_id: taxonId,
      unique: uids.size
    });
    return uids;
  }

  private async fetchPage(term: string, history: SearchHistory, start: number): Promise<string[]> {
    const { entrez, retry, pageSize } = this.deps;
    const page = await retry.run(`esearch ${term} [${start}+${pageSize}]`, () =>
      entrez.search({ db: "assembly", term, retStart: start, retMax: pageSize, history })
    );
    return page.ids;
  }
}

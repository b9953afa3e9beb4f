import type { AssemblyUid, ContigUid } from "../core/ids.js";
import { NoRecognizedLinkError } from "../core/errors.js";
import type { EntrezApi, LinkSetDb } from "../entrez/types.js";
import type { RunLog } from "../logging/runLog.js";
import type { RetryExecutor } from "./retry.js";

export const LINK_INSDC = "assembly_nuccore_insdc";
export const LINK_REFSEQ = "assembly_nuccore_refseq";
export const LINK_WGS_MASTER = "assembly_nuccore_wgsmaster";

export type DirectStrategy = "direct_insdc" | "direct_refseq";
export type LinkStrategy = DirectStrategy | "archive_wgs";

export type LinkSelection =
  | { strategy: DirectStrategy; contigUids: ReadonlySet<ContigUid> }
  | { strategy: "archive_wgs"; archiveUid: string; capped: boolean }
  | { strategy: "unrecognized"; available: string[]; reason: string };

export type ResolvedLinks = Exclude<LinkSelection, { strategy: "unrecognized" }>;

const DIRECT_PRIORITY: ReadonlyArray<readonly [DirectStrategy, string]> = [
  ["direct_insdc", LINK_INSDC],
  ["direct_refseq", LINK_REFSEQ]
];

function selectArchive(linkSets: LinkSetDb[], available: string[], capped: boolean): LinkSelection {
  const wgs = linkSets.find((l) => l.linkName === LINK_WGS_MASTER);
  if (!wgs) {
    return {
      strategy: "unrecognized",
      available,
      reason: capped ? "direct link result hit the server cap and no archive link exists" : "no recognised contig link"
    };
  }
  const archiveUid = wgs.links[0];
  if (archiveUid === undefined) {
    return { strategy: "unrecognized", available, reason: `${LINK_WGS_MASTER} carries no linked record` };
  }
  return { strategy: "archive_wgs", archiveUid, capped };
}

/**
 * INSDC over RefSeq over the WGS master archive. A direct contig set whose size
 * equals the server's result cap is truncated, so it is discarded in favour of
 * the archive.
 */
export function selectLinkStrategy(linkSets: LinkSetDb[], resultCap: number): LinkSelection {
  const available = linkSets.map((l) => l.linkName);
  for (const [strategy, linkName] of DIRECT_PRIORITY) {
    const linkSet = linkSets.find((l) => l.linkName === linkName);
    if (!linkSet) continue;
    // The raw count is what the server truncates; repeated IDs must not hide the cap.
    if (linkSet.links.length === resultCap) return selectArchive(linkSets, available, true);
    return { strategy, contigUids: new Set(linkSet.links) };
  }
  return selectArchive(linkSets, available, false);
}

export class LinkStrategyResolver {
  constructor(
    private readonly deps: {
      entrez: EntrezApi;
      retry: RetryExecutor;
      log: RunLog;
      resultCap: number;
    }
  ) {}

  async resolve(uid: AssemblyUid): Promise<ResolvedLinks> {
    const { entrez, retry, log, resultCap } = this.deps;
    await log.info("links.lookup", `Finding contig UIDs for assembly ${uid}`, { uid });
    const linkSets = await retry.run(`elink assembly ${uid}`, () =>
      entrez.links({ dbFrom: "assembly", db: "nucleotide", uid })
    );

    const selection = selectLinkStrategy(linkSets, resultCap);
    switch (selection.strategy) {
      case "unrecognized":
        await log.error("links.unrecognized", `No recognised contig link for assembly ${uid} (exiting)`, {
          uid,
          available_links: selection.available,
          reason: selection.reason
        });
        throw new NoRecognizedLinkError(uid, selection.available, selection.reason);
      case "archive_wgs":
        if (selection.capped) {
          await log.warn("links.capped", `Direct contig links for ${uid} hit the ${resultCap} cap; using ${LINK_WGS_MASTER}`, {
            uid,
            result_cap: resultCap
          });
        }
        await log.info("links.selected", `Using ${LINK_WGS_MASTER} links for ${uid}`, {
          uid,
          strategy: selection.strategy,
          archive_uid: selection.archiveUid
        });
        return selection;
      case "direct_insdc":
      case "direct_refseq":
        await log.info("links.selected", `Identified ${selection.contigUids.size} contig UIDs for ${uid} (${selection.strategy})`, {
          uid,
          strategy: selection.strategy,
          contig_count: selection.contigUids.size
        });
        return selection;
    }
  }
}

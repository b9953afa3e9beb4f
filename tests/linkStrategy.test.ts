import { describe, it, expect } from "vitest";
import { NoRecognizedLinkError } from "../src/core/errors.js";
import { RunLog } from "../src/logging/runLog.js";
import {
  LINK_INSDC,
  LINK_REFSEQ,
  LINK_WGS_MASTER,
  LinkStrategyResolver,
  selectLinkStrategy
} from "../src/retrieval/linkStrategy.js";
import { RetryExecutor } from "../src/retrieval/retry.js";
import { FakeEntrez } from "./helpers/fakes.js";

const CAP = 100000;

function ids(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `c${i}`);
}

describe("selectLinkStrategy", () => {
  it("prefers INSDC over RefSeq", () => {
    const sel = selectLinkStrategy(
      [
        { linkName: LINK_REFSEQ, links: ["r1"] },
        { linkName: LINK_INSDC, links: ["i1", "i2", "i1"] }
      ],
      CAP
    );
    expect(sel.strategy).toBe("direct_insdc");
    if (sel.strategy !== "direct_insdc") return;
    expect([...sel.contigUids]).toEqual(["i1", "i2"]);
  });

  it("prefers RefSeq over the archive", () => {
    const sel = selectLinkStrategy(
      [
        { linkName: LINK_WGS_MASTER, links: ["900"] },
        { linkName: LINK_REFSEQ, links: ["r1"] }
      ],
      CAP
    );
    expect(sel.strategy).toBe("direct_refseq");
  });

  it("uses the archive when it is the only link", () => {
    expect(selectLinkStrategy([{ linkName: LINK_WGS_MASTER, links: ["900"] }], CAP)).toEqual({
      strategy: "archive_wgs",
      archiveUid: "900",
      capped: false
    });
  });

  it("switches to the archive when a direct set hits the cap exactly", () => {
    const sel = selectLinkStrategy(
      [
        { linkName: LINK_INSDC, links: ids(CAP) },
        { linkName: LINK_WGS_MASTER, links: ["900"] }
      ],
      CAP
    );
    expect(sel).toEqual({ strategy: "archive_wgs", archiveUid: "900", capped: true });
  });

  it("keeps a direct set one below the cap", () => {
    const sel = selectLinkStrategy(
      [
        { linkName: LINK_INSDC, links: ids(CAP - 1) },
        { linkName: LINK_WGS_MASTER, links: ["900"] }
      ],
      CAP
    );
    expect(sel.strategy).toBe("direct_insdc");
    if (sel.strategy !== "direct_insdc") return;
    expect(sel.contigUids.size).toBe(CAP - 1);
  });

  it("counts repeated identifiers toward the cap", () => {
    const sel = selectLinkStrategy(
      [
        { linkName: LINK_INSDC, links: ["c1", "c2", "c1"] },
        { linkName: LINK_WGS_MASTER, links: ["900"] }
      ],
      3
    );
    expect(sel).toEqual({ strategy: "archive_wgs", archiveUid: "900", capped: true });
  });

  it("reports a capped set with no archive as unrecognized", () => {
    const sel = selectLinkStrategy([{ linkName: LINK_REFSEQ, links: ids(3) }], 3);
    expect(sel).toEqual({
      strategy: "unrecognized",
      available: [LINK_REFSEQ],
      reason: "direct link result hit the server cap and no archive link exists"
    });
  });

  it("reports unknown link names as unrecognized", () => {
    const sel = selectLinkStrategy([{ linkName: "assembly_nuccore", links: ["1"] }], CAP);
    expect(sel).toEqual({ strategy: "unrecognized", available: ["assembly_nuccore"], reason: "no recognised contig link" });
  });
});

describe("LinkStrategyResolver", () => {
  it("raises NoRecognizedLinkError naming the links that were present", async () => {
    const entrez = new FakeEntrez({ links: { "5": [{ linkName: "assembly_nuccore", links: ["1"] }] } });
    const log = new RunLog();
    const resolver = new LinkStrategyResolver({
      entrez,
      retry: new RetryExecutor({ maxAttempts: 1, delayMs: 0 }, log),
      log,
      resultCap: CAP
    });

    const err = await resolver.resolve("5").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NoRecognizedLinkError);
    if (!(err instanceof NoRecognizedLinkError)) throw err;
    expect(err.context).toEqual({ assembly_uid: "5", available_links: ["assembly_nuccore"] });
    expect(log.events.at(-1)?.kind).toBe("links.unrecognized");
  });

  it("logs a warning when the cap forces the archive", async () => {
    const entrez = new FakeEntrez({
      links: {
        "6": [
          { linkName: LINK_INSDC, links: ids(2) },
          { linkName: LINK_WGS_MASTER, links: ["901"] }
        ]
      }
    });
    const log = new RunLog();
    const resolver = new LinkStrategyResolver({
      entrez,
      retry: new RetryExecutor({ maxAttempts: 1, delayMs: 0 }, log),
      log,
      resultCap: 2
    });

    expect(await resolver.resolve("6")).toEqual({ strategy: "archive_wgs", archiveUid: "901", capped: true });
    expect(log.events.filter((e) => e.level === "warn").map((e) => e.kind)).toEqual(["links.capped"]);
  });
});

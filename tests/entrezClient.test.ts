import { describe, it, expect } from "vitest";
import { EntrezResponseError } from "../src/core/errors.js";
import { EntrezClient } from "../src/entrez/entrezClient.js";
import type { FetchLike } from "../src/entrez/types.js";

const BASE = "https://eutils.example.org/entrez/eutils/";

interface Recorded {
  url: URL;
  method: string;
  body: string | null;
}

function clientWith(reply: (url: URL) => Response): { client: EntrezClient; requests: Recorded[] } {
  const requests: Recorded[] = [];
  const fetch: FetchLike = async (input, init) => {
    const url = new URL(String(input));
    const body = init?.body instanceof URLSearchParams ? init.body.toString() : null;
    requests.push({ url, method: init?.method ?? "GET", body });
    return reply(url);
  };
  const client = new EntrezClient({
    baseUrl: BASE,
    contact: { email: "test@example.org", tool: "test-tool" },
    timeoutSeconds: 0,
    fetch
  });
  return { client, requests };
}

describe("EntrezClient", () => {
  it("opens a search with history and identifies itself", async () => {
    const { client, requests } = clientWith(() =>
      Response.json({ esearchresult: { count: "3", idlist: [], webenv: "WE1", querykey: "1" } })
    );

    const page = await client.search({ db: "assembly", term: "txid7[Organism:exp]", retStart: 0, retMax: 0, useHistory: true });

    expect(page).toEqual({ count: 3, ids: [], history: { webEnv: "WE1", queryKey: "1" } });
    const url = requests[0]?.url;
    expect(url?.pathname).toBe("/entrez/eutils/esearch.fcgi");
    expect(url?.searchParams.get("term")).toBe("txid7[Organism:exp]");
    expect(url?.searchParams.get("usehistory")).toBe("y");
    expect(url?.searchParams.get("retmode")).toBe("json");
    expect(url?.searchParams.get("tool")).toBe("test-tool");
    expect(url?.searchParams.get("email")).toBe("test@example.org");
  });

  it("pages with the stored history handle", async () => {
    const { client, requests } = clientWith(() => Response.json({ esearchresult: { count: 3, idlist: [11, "12"] } }));

    const page = await client.search({
      db: "assembly",
      term: "txid7[Organism:exp]",
      retStart: 250,
      retMax: 250,
      history: { webEnv: "WE1", queryKey: "1" }
    });

    expect(page.ids).toEqual(["11", "12"]);
    expect(requests[0]?.url.searchParams.get("WebEnv")).toBe("WE1");
    expect(requests[0]?.url.searchParams.get("query_key")).toBe("1");
    expect(requests[0]?.url.searchParams.get("retstart")).toBe("250");
  });

  it("parses an assembly summary", async () => {
    const { client } = clientWith(() =>
      Response.json({
        result: {
          uids: ["11"],
          "11": {
            uid: "11",
            assemblyaccession: "GCA_000011.1",
            assemblyname: "ASM11v1",
            speciesname: "Escherichia coli",
            speciestaxid: 562,
            biosource: { infraspecieslist: [{ sub_type: "strain", sub_value: "K-12" }] },
            ftppath_genbank: "ftp://example.org/GCA_000011.1_ASM11v1",
            ftppath_refseq: ""
          }
        }
      })
    );

    const doc = await client.assemblySummary("11");

    expect(doc.assemblyaccession).toBe("GCA_000011.1");
    expect(doc.speciestaxid).toBe("562");
    expect(doc.biosource?.infraspecieslist[0]?.sub_value).toBe("K-12");
  });

  it("rejects a summary that does not mention the uid", async () => {
    const { client } = clientWith(() => Response.json({ result: { uids: [] } }));
    await expect(client.nucleotideSummary("900")).rejects.toThrow("no summary returned for nuccore uid 900");
  });

  it("maps link sets", async () => {
    const { client, requests } = clientWith(() =>
      Response.json({
        linksets: [{ dbfrom: "assembly", linksetdbs: [{ dbto: "nuccore", linkname: "assembly_nuccore_insdc", links: [1, 2] }] }]
      })
    );

    expect(await client.links({ dbFrom: "assembly", db: "nucleotide", uid: "11" })).toEqual([
      { linkName: "assembly_nuccore_insdc", links: ["1", "2"] }
    ]);
    expect(requests[0]?.url.searchParams.get("dbfrom")).toBe("assembly");
  });

  it("posts FASTA requests with the joined identifier list", async () => {
    const { client, requests } = clientWith(() => new Response(">c1\nACGT\n"));

    const text = await client.fetchFasta({ db: "nucleotide", ids: ["c1", "c2"], retStart: 0, retMax: 10000 });

    expect(text).toBe(">c1\nACGT\n");
    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.url.search).toBe("");
    const form = new URLSearchParams(requests[0]?.body ?? "");
    expect(form.get("id")).toBe("c1,c2");
    expect(form.get("rettype")).toBe("fasta");
    expect(form.get("retmax")).toBe("10000");
  });

  it("turns an HTTP error into a retryable response error", async () => {
    const { client } = clientWith(() => new Response("busy", { status: 503 }));
    const err = await client.links({ dbFrom: "assembly", db: "nucleotide", uid: "11" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EntrezResponseError);
    if (!(err instanceof EntrezResponseError)) throw err;
    expect(err.status).toBe(503);
    expect(err.message).toBe("elink.fcgi: HTTP 503");
  });

  it("rejects a response with the wrong shape", async () => {
    const { client } = clientWith(() => Response.json({ linksets: [] }));
    await expect(client.links({ dbFrom: "assembly", db: "nucleotide", uid: "11" })).rejects.toBeInstanceOf(EntrezResponseError);
  });
});

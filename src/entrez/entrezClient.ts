import type { ZodType } from "zod/v4";
import { EntrezResponseError } from "../core/errors.js";
import { errorMessage } from "../core/json.js";
import { fetchWithHeaderTimeout } from "../io/httpDownload.js";
import { zAssemblyDocSum, zELinkResponse, zESearchResponse, zESummaryResponse, zNucleotideDocSum } from "./schemas.js";
import type {
  AssemblyDocSum,
  ContactInfo,
  EntrezApi,
  FastaFetchRequest,
  FetchLike,
  LinkSetDb,
  NucleotideDocSum,
  SearchPage,
  SearchRequest
} from "./types.js";

export interface EntrezClientOptions {
  baseUrl: string;
  contact: ContactInfo;
  /** Wait for response headers; 0 waits indefinitely. */
  timeoutSeconds: number;
  fetch?: FetchLike;
}

type Params = Record<string, string | number>;

/**
 * E-utilities over HTTPS. Each method performs exactly one request; retrying is
 * the caller's concern.
 */
export class EntrezClient implements EntrezApi {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: EntrezClientOptions) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async search(req: SearchRequest): Promise<SearchPage> {
    const params: Params = { db: req.db, term: req.term, retstart: req.retStart, retmax: req.retMax };
    if (req.useHistory) params.usehistory = "y";
    if (req.history) {
      params.WebEnv = req.history.webEnv;
      params.query_key = req.history.queryKey;
    }
    const body = await this.getJson("esearch.fcgi", params, zESearchResponse);
    const r = body.esearchresult;
    return {
      count: r.count,
      ids: r.idlist,
      history: r.webenv && r.querykey ? { webEnv: r.webenv, queryKey: r.querykey } : null
    };
  }

  async assemblySummary(uid: string): Promise<AssemblyDocSum> {
    return this.summary("assembly", uid, zAssemblyDocSum);
  }

  async nucleotideSummary(uid: string): Promise<NucleotideDocSum> {
    return this.summary("nuccore", uid, zNucleotideDocSum);
  }

  async links(req: { dbFrom: string; db: string; uid: string }): Promise<LinkSetDb[]> {
    const body = await this.getJson("elink.fcgi", { dbfrom: req.dbFrom, db: req.db, id: req.uid }, zELinkResponse);
    const first = body.linksets[0];
    if (!first) return [];
    return first.linksetdbs.map((l) => ({ linkName: l.linkname, links: l.links }));
  }

  async fetchFasta(req: FastaFetchRequest): Promise<string> {
    const res = await this.request("efetch.fcgi", {
      db: req.db,
      id: req.ids.join(","),
      rettype: "fasta",
      retmode: "text",
      retstart: req.retStart,
      retmax: req.retMax
    }, "POST");
    return res.text();
  }

  private async summary<T>(db: string, uid: string, schema: ZodType<T>): Promise<T> {
    const body = await this.getJson("esummary.fcgi", { db, id: uid }, zESummaryResponse);
    const doc = body.result[uid];
    if (doc === undefined) {
      throw new EntrezResponseError("esummary.fcgi", `no summary returned for ${db} uid ${uid}`);
    }
    const parsed = schema.safeParse(doc);
    if (!parsed.success) {
      throw new EntrezResponseError("esummary.fcgi", `unexpected ${db} summary for ${uid}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async getJson<T>(endpoint: string, params: Params, schema: ZodType<T>): Promise<T> {
    const res = await this.request(endpoint, { ...params, retmode: "json" }, "GET");
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new EntrezResponseError(endpoint, `malformed JSON: ${errorMessage(err)}`);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new EntrezResponseError(endpoint, `unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async request(endpoint: string, params: Params, method: "GET" | "POST"): Promise<Response> {
    const search = new URLSearchParams();
    for (const [k, v] of Object.entries({ ...params, tool: this.opts.contact.tool, email: this.opts.contact.email })) {
      search.set(k, String(v));
    }
    const url = new URL(endpoint, this.opts.baseUrl);
    const init: RequestInit = { method };
    if (method === "GET") {
      url.search = search.toString();
    } else {
      init.body = search;
      init.headers = { "content-type": "application/x-www-form-urlencoded" };
    }

    const res = await fetchWithHeaderTimeout(this.fetchImpl, url.toString(), init, this.opts.timeoutSeconds * 1000);
    if (!res.ok) {
      throw new EntrezResponseError(endpoint, `HTTP ${res.status}`, res.status);
    }
    return res;
  }
}

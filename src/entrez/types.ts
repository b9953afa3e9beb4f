import type { AssemblyDocSum, NucleotideDocSum } from "./schemas.js";

export type { AssemblyDocSum, NucleotideDocSum };

export interface SearchRequest {
  db: string;
  term: string;
  retStart: number;
  retMax: number;
  /** Ask the server to keep the result set and return a handle for paging. */
  useHistory?: boolean;
  history?: SearchHistory;
}

export interface SearchHistory {
  webEnv: string;
  queryKey: string;
}

export interface SearchPage {
  count: number;
  ids: string[];
  history: SearchHistory | null;
}

export interface LinkSetDb {
  linkName: string;
  links: string[];
}

export interface FastaFetchRequest {
  db: string;
  ids: readonly string[];
  retStart: number;
  retMax: number;
}

/** The remote query surface the retrieval components depend on. */
export interface EntrezApi {
  search(req: SearchRequest): Promise<SearchPage>;
  assemblySummary(uid: string): Promise<AssemblyDocSum>;
  nucleotideSummary(uid: string): Promise<NucleotideDocSum>;
  links(req: { dbFrom: string; db: string; uid: string }): Promise<LinkSetDb[]>;
  fetchFasta(req: FastaFetchRequest): Promise<string>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface ContactInfo {
  email: string;
  tool: string;
}

import { ulid } from "ulid";

export type RunId = `run_${string}`;

// Entrez identifiers are opaque decimal strings; they are never parsed as numbers.
export type TaxonId = string;
export type AssemblyUid = string;
export type ContigUid = string;

export function newRunId(): RunId {
  return `run_${ulid()}`;
}

export function isRunId(value: string): value is RunId {
  return /^run_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

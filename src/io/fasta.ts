import { createReadStream, promises as fs } from "fs";
import { createInterface } from "readline";

export interface FastaRecord {
  /** Header line without the leading `>`. */
  description: string;
  sequence: string;
}

export const FASTA_LINE_WIDTH = 60;

export function parseFasta(text: string): FastaRecord[] {
  const records: FastaRecord[] = [];
  let current: { description: string; chunks: string[] } | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    if (line.startsWith(">")) {
      if (current) records.push({ description: current.description, sequence: current.chunks.join("") });
      current = { description: line.slice(1).trim(), chunks: [] };
      continue;
    }
    // Sequence lines before the first header are not part of any record.
    if (current) current.chunks.push(line.replace(/\s+/g, ""));
  }
  if (current) records.push({ description: current.description, sequence: current.chunks.join("") });
  return records;
}

export function formatFasta(records: readonly FastaRecord[], width: number = FASTA_LINE_WIDTH): string {
  let out = "";
  for (const r of records) {
    out += `>${r.description}\n`;
    for (let i = 0; i < r.sequence.length; i += width) {
      out += r.sequence.slice(i, i + width) + "\n";
    }
  }
  return out;
}

export async function writeFasta(filePath: string, records: readonly FastaRecord[]): Promise<number> {
  await fs.writeFile(filePath, formatFasta(records), "utf8");
  return records.length;
}

/** Header descriptions of a FASTA file, read line by line. */
export async function readFastaHeaders(filePath: string): Promise<string[]> {
  const headers: string[] = [];
  const lines = createInterface({ input: createReadStream(filePath, { encoding: "utf8" }), crlfDelay: Infinity });
  for await (const line of lines) {
    if (line.startsWith(">")) headers.push(line.slice(1).trim());
  }
  return headers;
}

export function totalSequenceLength(records: readonly FastaRecord[]): number {
  return records.reduce((sum, r) => sum + r.sequence.length, 0);
}

import { promises as fs } from "fs";
import path from "path";
import type { HashAlgorithm } from "../core/hash.js";
import { hashFileHex } from "../core/hash.js";
import { errorMessage } from "../core/json.js";

export interface HashCheckResult {
  localHash: string | null;
  remoteHash: string | null;
  passed: boolean;
  /** Why a hash could not be obtained, when that is the reason the check failed. */
  error: string | null;
}

/**
 * Finds the digest declared for `fileName` in a checksum listing
 * (`<hex>  ./<name>` per line, as published beside assembly files). A file
 * holding a single bare digest applies to whatever file it accompanies.
 */
export function declaredHashFor(listing: string, fileName: string): string | null {
  const lines = listing
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  for (const line of lines) {
    const [digest, name] = line.split(/\s+/, 2);
    if (!digest || !name) continue;
    if (path.posix.basename(name.replace(/^\*/, "")) === fileName) return digest.toLowerCase();
  }

  const only = lines.length === 1 ? lines[0] : undefined;
  if (only && /^[0-9a-fA-F]+$/.test(only)) return only.toLowerCase();
  return null;
}

/** Compares a downloaded file against its declared digest. Never throws: a failure is a result. */
export async function checkFileHash(
  filePath: string,
  hashFilePath: string,
  algorithm: HashAlgorithm = "md5"
): Promise<HashCheckResult> {
  let remoteHash: string | null;
  try {
    remoteHash = declaredHashFor(await fs.readFile(hashFilePath, "utf8"), path.basename(filePath));
  } catch (err) {
    return { localHash: null, remoteHash: null, passed: false, error: `reading ${hashFilePath}: ${errorMessage(err)}` };
  }

  let localHash: string;
  try {
    localHash = await hashFileHex(filePath, algorithm);
  } catch (err) {
    return { localHash: null, remoteHash, passed: false, error: `hashing ${filePath}: ${errorMessage(err)}` };
  }

  if (remoteHash === null) {
    return { localHash, remoteHash, passed: false, error: `no ${algorithm} entry for ${path.basename(filePath)}` };
  }
  return { localHash, remoteHash, passed: localHash === remoteHash, error: null };
}

import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { createHash } from "crypto";
import os from "os";
import path from "path";
import { checkFileHash, declaredHashFor } from "../src/retrieval/integrity.js";

const CONTENT = ">c1\nACGT\n";
const MD5 = createHash("md5").update(CONTENT).digest("hex");

async function withFiles(listing: string | null, body: (files: { data: string; hashes: string }) => Promise<void>) {
  const dir = await mkdtemp(path.join(os.tmpdir(), "genome-fetch-hash-"));
  try {
    const data = path.join(dir, "genome.fna.gz");
    const hashes = path.join(dir, "md5checksums.txt");
    await writeFile(data, CONTENT);
    if (listing !== null) await writeFile(hashes, listing);
    await body({ data, hashes });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("declaredHashFor", () => {
  it("matches entries by file name", () => {
    const listing = "aaaa  ./other.fna.gz\nBBBB  ./genome.fna.gz\n";
    expect(declaredHashFor(listing, "genome.fna.gz")).toBe("bbbb");
    expect(declaredHashFor(listing, "missing.gz")).toBeNull();
  });

  it("accepts a file holding a single digest", () => {
    expect(declaredHashFor("ABCDEF0123\n", "anything")).toBe("abcdef0123");
  });
});

describe("checkFileHash", () => {
  it("passes when the digests agree", async () => {
    await withFiles(`${MD5}  ./genome.fna.gz\n`, async ({ data, hashes }) => {
      expect(await checkFileHash(data, hashes)).toEqual({ localHash: MD5, remoteHash: MD5, passed: true, error: null });
    });
  });

  it("reports a mismatch without throwing", async () => {
    const wrong = "0".repeat(32);
    await withFiles(`${wrong}  ./genome.fna.gz\n`, async ({ data, hashes }) => {
      expect(await checkFileHash(data, hashes)).toEqual({ localHash: MD5, remoteHash: wrong, passed: false, error: null });
    });
  });

  it("fails when the listing has no entry for the file", async () => {
    await withFiles("aaaa  ./other.fna.gz\nbbbb  ./third.fna.gz\n", async ({ data, hashes }) => {
      const result = await checkFileHash(data, hashes);
      expect(result.passed).toBe(false);
      expect(result.error).toBe("no md5 entry for genome.fna.gz");
    });
  });

  it("fails when the hash file cannot be read", async () => {
    await withFiles(null, async ({ data, hashes }) => {
      const result = await checkFileHash(data, hashes);
      expect(result.passed).toBe(false);
      expect(result.localHash).toBeNull();
      expect(result.error?.startsWith(`reading ${hashes}`)).toBe(true);
    });
  });
});

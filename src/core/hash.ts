import { createHash } from "crypto";
import { promises as fs } from "fs";

export type HashAlgorithm = "md5" | "sha256";

export async function hashFileHex(filePath: string, algorithm: HashAlgorithm): Promise<string> {
  const hash = createHash(algorithm);
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(1024 * 1024);
    for (;;) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      hash.update(buf.subarray(0, bytesRead));
    }
    return hash.digest("hex");
  } finally {
    await fd.close();
  }
}

import { spawn } from "child_process";
import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { ExtractionError } from "../core/errors.js";
import { errorMessage } from "../core/json.js";

const MAX_STDERR_BYTES = 64 * 1024;

export interface Decompressor {
  decompress(archivePath: string, destPath: string): Promise<void>;
}

/** `gunzip -c <archive> > <dest>` as a child process. */
export class GunzipDecompressor implements Decompressor {
  constructor(private readonly command: string = "gunzip") {}

  async decompress(archivePath: string, destPath: string): Promise<void> {
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    const child = spawn(this.command, ["-c", archivePath], { stdio: ["ignore", "pipe", "pipe"] as const });

    let stderr = "";
    child.stderr.on("data", (chunk: Buffer) => {
      if (stderr.length < MAX_STDERR_BYTES) stderr += chunk.toString("utf8");
    });

    const exited = new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? 1));
    });

    try {
      const [, exitCode] = await Promise.all([pipeline(child.stdout, createWriteStream(destPath)), exited]);
      if (exitCode !== 0) {
        throw new Error(`${this.command} exited with code ${exitCode}${stderr ? `: ${stderr.trim()}` : ""}`);
      }
    } catch (err) {
      throw new ExtractionError(archivePath, destPath, errorMessage(err));
    }
  }
}

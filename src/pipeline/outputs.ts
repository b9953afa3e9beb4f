import { promises as fs } from "fs";
import path from "path";
import { OutputDirectoryError } from "../core/errors.js";
import type { TaxonId } from "../core/ids.js";

export interface OutputDirectoryPolicy {
  force: boolean;
  noclobber: boolean;
}

export type OutputDirectoryAction = "created" | "recreated" | "kept";

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/**
 * An existing directory is an error unless forced; forcing removes it first,
 * and forcing with noclobber keeps its contents.
 */
export async function prepareOutputDirectory(dir: string, policy: OutputDirectoryPolicy): Promise<OutputDirectoryAction> {
  if (await pathExists(dir)) {
    if (!policy.force) throw new OutputDirectoryError(dir, "would overwrite existing files (use --force)");
    if (policy.noclobber) return "kept";
    await fs.rm(dir, { recursive: true, force: true });
    await fs.mkdir(dir, { recursive: true });
    return "recreated";
  }
  await fs.mkdir(dir, { recursive: true });
  return "created";
}

export function splitTaxa(value: string): TaxonId[] {
  return value
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export async function writeLines(filePath: string, lines: readonly string[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, lines.length ? lines.join("\n") + "\n" : "", "utf8");
}

export async function writeClassesAndLabels(
  outDir: string,
  records: { classes: readonly string[]; labels: readonly string[] },
  names: { classesFile: string; labelsFile: string }
): Promise<{ classesPath: string; labelsPath: string }> {
  const classesPath = path.join(outDir, names.classesFile);
  const labelsPath = path.join(outDir, names.labelsFile);
  await writeLines(classesPath, records.classes);
  await writeLines(labelsPath, records.labels);
  return { classesPath, labelsPath };
}

import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from "fs/promises";
import os from "os";
import path from "path";
import { parseCliArgs } from "../src/cli/args.js";
import { OutputDirectoryError } from "../src/core/errors.js";
import { prepareOutputDirectory, splitTaxa, writeClassesAndLabels } from "../src/pipeline/outputs.js";
import { classLabelFor, metadataFromSummary } from "../src/retrieval/assemblyMetadata.js";
import { assemblyDirectoryUrl, assemblyFileStem } from "../src/retrieval/genomeDownload.js";
import { assemblyDoc } from "./helpers/fakes.js";

describe("parseCliArgs", () => {
  it("reads short and long options", () => {
    const args = parseCliArgs(["-o", "out", "-t", "562,1280", "--email", "test@example.org", "-v", "--retries", "5", "--count"]);
    expect(args).toMatchObject({
      outDir: "out",
      taxon: "562,1280",
      email: "test@example.org",
      verbose: true,
      force: false,
      retries: 5,
      timeoutSeconds: null,
      count: true,
      source: "entrez"
    });
  });

  it("accepts the genomes source and rejects others", () => {
    expect(parseCliArgs(["--source", "genomes"]).source).toBe("genomes");
    expect(() => parseCliArgs(["--source", "ftp"])).toThrow("--source must be entrez or genomes (got ftp)");
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseCliArgs(["--bogus"])).toThrow("unknown option: --bogus");
    expect(() => parseCliArgs(["-o"])).toThrow("missing value for -o");
    expect(() => parseCliArgs(["stray"])).toThrow("unexpected arg: stray");
    expect(() => parseCliArgs(["--retries", "0"])).toThrow("--retries must be an integer >= 1 (got 0)");
  });
});

describe("output files", () => {
  it("splits taxon lists", () => {
    expect(splitTaxa(" 562, ,1280,")).toEqual(["562", "1280"]);
  });

  it("refuses an existing directory unless forced", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "genome-fetch-out-"));
    try {
      const dir = path.join(root, "out");
      expect(await prepareOutputDirectory(dir, { force: false, noclobber: false })).toBe("created");
      await writeFile(path.join(dir, "old.fasta"), ">x\nA\n");

      await expect(prepareOutputDirectory(dir, { force: false, noclobber: false })).rejects.toBeInstanceOf(OutputDirectoryError);
      expect(await prepareOutputDirectory(dir, { force: true, noclobber: true })).toBe("kept");
      expect(await readdir(dir)).toEqual(["old.fasta"]);
      expect(await prepareOutputDirectory(dir, { force: true, noclobber: false })).toBe("recreated");
      expect(await readdir(dir)).toEqual([]);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("writes one line per entry with a trailing newline", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "genome-fetch-out-"));
    try {
      await mkdir(root, { recursive: true });
      const { classesPath, labelsPath } = await writeClassesAndLabels(
        root,
        { classes: ["A\tEscherichia coli"], labels: [] },
        { classesFile: "classes.txt", labelsFile: "labels.txt" }
      );
      expect(await readFile(classesPath, "utf8")).toBe("A\tEscherichia coli\n");
      expect(await readFile(labelsPath, "utf8")).toBe("");
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});

describe("assembly metadata", () => {
  it("splits the organism into genus and species and takes the first strain", () => {
    const meta = metadataFromSummary(
      assemblyDoc({ uid: "1", accession: "GCA_000001.1", organism: "Escherichia coli O157:H7", strain: "Sakai" })
    );
    expect(meta).toMatchObject({ genus: "Escherichia", species: "coli O157:H7", strain: "Sakai", ftpPath: null });
    expect(classLabelFor(meta)).toEqual({
      classLine: "GCA_000001.1\tEscherichia coli O157:H7",
      labelLine: "GCA_000001.1\tE. coli O157:H7 Sakai"
    });
  });

  it("drops empty label parts", () => {
    const meta = metadataFromSummary(assemblyDoc({ uid: "2", accession: "GCA_000002.1", organism: "Bacteria" }));
    expect(classLabelFor(meta, "key").labelLine).toBe("key\tB.");
  });

  it("compiles genome directory URLs", () => {
    const meta = { accession: "GCA_012345678.2", assemblyName: "ASM 1234v2", ftpPath: null };
    expect(assemblyFileStem(meta)).toBe("GCA_012345678.2_ASM_1234v2");
    expect(assemblyDirectoryUrl(meta, "https://genomes.example.org/all/")).toBe(
      "https://genomes.example.org/all/GCA/012/345/678/GCA_012345678.2_ASM_1234v2"
    );
    expect(() => assemblyDirectoryUrl({ ...meta, accession: "XYZ" }, "https://genomes.example.org/all")).toThrow(
      "cannot compile a genome directory for accession XYZ"
    );
  });
});

import type { AssemblyUid } from "../core/ids.js";
import type { AssemblyDocSum, EntrezApi } from "../entrez/types.js";
import type { RunLog } from "../logging/runLog.js";
import type { RetryExecutor } from "./retry.js";

export interface AssemblyMetadata {
  uid: AssemblyUid;
  accession: string;
  assemblyName: string;
  organism: string;
  genus: string;
  species: string;
  /** Empty when the record carries no infraspecific name. */
  strain: string;
  speciesTaxid: string;
  /** RefSeq directory when present, GenBank otherwise; null if neither is published. */
  ftpPath: string | null;
}

export interface ClassLabel {
  classLine: string;
  labelLine: string;
}

export function metadataFromSummary(doc: AssemblyDocSum): AssemblyMetadata {
  const organism = doc.speciesname.trim();
  const space = organism.indexOf(" ");
  const genus = space === -1 ? organism : organism.slice(0, space);
  const species = space === -1 ? "" : organism.slice(space + 1).trim();
  const strain = doc.biosource?.infraspecieslist[0]?.sub_value.trim() ?? "";
  const ftpPath = doc.ftppath_refseq.trim() || doc.ftppath_genbank.trim() || null;

  return {
    uid: doc.uid,
    accession: doc.assemblyaccession,
    assemblyName: doc.assemblyname,
    organism,
    genus,
    species,
    strain,
    speciesTaxid: doc.speciestaxid,
    ftpPath
  };
}

/** `key<TAB>organism` and `key<TAB>G. species strain`, keyed by accession unless told otherwise. */
export function classLabelFor(meta: AssemblyMetadata, key: string = meta.accession): ClassLabel {
  const initial = meta.genus ? `${meta.genus.charAt(0)}.` : "";
  const label = [initial, meta.species, meta.strain].filter((s) => s.length > 0).join(" ");
  return {
    classLine: `${key}\t${meta.organism}`,
    labelLine: `${key}\t${label}`
  };
}

export class AssemblyMetadataReader {
  constructor(
    private readonly deps: {
      entrez: EntrezApi;
      retry: RetryExecutor;
      log: RunLog;
    }
  ) {}

  async read(uid: AssemblyUid): Promise<AssemblyMetadata> {
    const doc = await this.deps.retry.run(`esummary assembly ${uid}`, () => this.deps.entrez.assemblySummary(uid));
    const meta = metadataFromSummary(doc);
    await this.deps.log.info(
      "assembly.summary",
      `UID ${uid}: ${meta.accession} ${meta.organism}${meta.strain ? ` ${meta.strain}` : ""}`,
      {
        uid,
        accession: meta.accession,
        assembly_name: meta.assemblyName,
        organism: meta.organism,
        genus: meta.genus,
        species: meta.species,
        strain: meta.strain,
        species_taxid: meta.speciesTaxid
      }
    );
    return meta;
  }
}

import * as z from "zod/v4";

const zUid = z.union([z.string(), z.number()]).transform(String);

export const zESearchResponse = z.object({
  esearchresult: z.object({
    count: z.coerce.number().int().min(0),
    idlist: z.array(zUid).default([]),
    webenv: z.string().optional(),
    querykey: zUid.optional()
  })
});

export const zELinkResponse = z.object({
  linksets: z
    .array(
      z.object({
        dbfrom: z.string().optional(),
        linksetdbs: z
          .array(
            z.object({
              dbto: z.string().optional(),
              linkname: z.string(),
              links: z.array(zUid).default([])
            })
          )
          .default([])
      })
    )
    .min(1)
});

export const zESummaryResponse = z.object({
  result: z.record(z.string(), z.unknown())
});

export const zAssemblyDocSum = z.object({
  uid: zUid,
  assemblyaccession: z.string().min(1),
  assemblyname: z.string().default(""),
  speciesname: z.string().min(1),
  speciestaxid: zUid,
  biosource: z
    .object({
      infraspecieslist: z
        .array(z.object({ sub_type: z.string().default(""), sub_value: z.string().default("") }))
        .default([])
    })
    .optional(),
  ftppath_genbank: z.string().default(""),
  ftppath_refseq: z.string().default("")
});

export const zNucleotideDocSum = z.object({
  uid: zUid,
  caption: z.string().default(""),
  extra: z.string()
});

export type AssemblyDocSum = z.output<typeof zAssemblyDocSum>;
export type NucleotideDocSum = z.output<typeof zNucleotideDocSum>;

import type { MutationRecord } from "@/types/table";
import { createTable, fromColumns } from "@/lib/table-ops";
import { TableRegistry } from "@/lib/table-registry";

// Records are deliberately out of sample order; the registry sorts them.
export const MUTATION_RECORDS: MutationRecord[] = [
  { sampleId: "S006", gene: "TP53", mutation: "stopgain", location: "p.R196*" },
  { sampleId: "S001", gene: "TP53", mutation: "frameshift deletion", location: "p.K132fs" },
  { sampleId: "S001", gene: "TP53", mutation: "nonsynonymous SNV", location: "p.R273H" },
  { sampleId: "S003", gene: "KRAS", mutation: "nonsynonymous SNV", location: "p.G12D" },
  { sampleId: "S001", gene: "KRAS", mutation: "Silent", location: "p.L19L" },
];

export function makeClinical() {
  return fromColumns("clinical", ["S001", "S002", "S003", "S004"], {
    Sample_Tumor_Normal: ["Tumor", "Normal", "Tumor", null],
    Age: [60, 55, 70, 48],
  });
}

export function makeProteomics() {
  return fromColumns("proteomics", ["S003", "S001", "S002"], {
    TP53: [0.3, 1.5, -0.2],
    KRAS: [0.3, 0.1, 0.2],
  });
}

export function makePhosphoproteomics() {
  return createTable({
    name: "phosphoproteomics",
    index: ["S001", "S002", "S004"],
    levels: ["Name", "Site", "Database_ID"],
    keys: [
      ["TP53", "S15", "NP_1"],
      ["TP53", "S20", "NP_1"],
      ["KRAS", "T58", "NP_2"],
    ],
    values: [
      [0.5, 0.6, 0.7],
      [1, 2, 3],
      [4, 5, 6],
    ],
  });
}

/**
 * Small colon dataset:
 *   clinical           S001 Tumor, S002 Normal, S003 Tumor, S004 unknown
 *   derived_molecular  S001, S002, S005
 *   proteomics         S001–S003, flat
 *   phosphoproteomics  S001, S002, S004; Name/Site/Database_ID
 *   treatment          registered but not a valid metadata table
 *   somatic_mutation   S001 (TP53 x2, KRAS), S003 (KRAS), S006 (TP53)
 */
export function makeRegistry(): TableRegistry {
  return new TableRegistry({
    cancerType: "Colon",
    tables: {
      clinical: { category: "metadata", table: makeClinical() },
      derived_molecular: {
        category: "metadata",
        table: fromColumns("derived_molecular", ["S001", "S002", "S005"], {
          Age: [61, 56, 71],
          MSI: ["MSI-H", "MSS", "MSS"],
        }),
      },
      proteomics: { category: "omics", table: makeProteomics() },
      phosphoproteomics: { category: "omics", table: makePhosphoproteomics() },
      treatment: {
        category: "metadata",
        table: fromColumns("treatment", ["S001"], { Drug: ["oxaliplatin"] }),
      },
      somatic_mutation: { category: "mutation", records: MUTATION_RECORDS },
    },
  });
}

/**
 * Table and column constants — single source of truth for the join engines.
 */

import type { ColumnLevel } from "@/types/table";

/** Column-index levels in the order every harmonized index uses. */
export const CANONICAL_LEVELS: readonly ColumnLevel[] = ["Name", "Site", "Peptide", "Database_ID"];

/** Omics tables the selection and join functions accept. */
export const VALID_OMICS_TABLES: readonly string[] = [
  "acetylproteomics",
  "circular_RNA",
  "CNV",
  "lipidomics",
  "metabolomics",
  "miRNA",
  "phosphoproteomics",
  "phosphoproteomics_gene",
  "proteomics",
  "somatic_mutation_binary",
  "transcriptomics",
];

/**
 * Metadata tables the selection and join functions accept. Tables with
 * several rows per sample (treatment, medical_history) are left out.
 */
export const VALID_METADATA_TABLES: readonly string[] = [
  "clinical",
  "derived_molecular",
  "experimental_design",
];

export const SOMATIC_MUTATION_TABLE = "somatic_mutation";
export const CLINICAL_TABLE = "clinical";

/** Clinical column holding each sample's Tumor/Normal status. */
export const SAMPLE_STATUS_SOURCE_COLUMN = "Sample_Tumor_Normal";
/** Column appended to mutation joins. */
export const SAMPLE_STATUS_COLUMN = "Sample_Status";

export const MUTATION_SUFFIX = "_Mutation";
export const LOCATION_SUFFIX = "_Location";
export const MUTATION_STATUS_SUFFIX = "_Mutation_Status";

export const SINGLE_MUTATION = "Single_mutation";
export const MULTIPLE_MUTATION = "Multiple_mutation";

export const WILDTYPE_TUMOR = "Wildtype_Tumor";
export const WILDTYPE_NORMAL = "Wildtype_Normal";
export const NO_MUTATION = "No_mutation";

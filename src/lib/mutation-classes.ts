/**
 * Mutation-type class sets used by the default prioritization hierarchy.
 *
 * Each cancer type's annotation pipeline uses its own vocabulary (ANNOVAR
 * labels for colon and hnscc, MAF Variant_Classification elsewhere), so the
 * sets are keyed by cancer type. Adding a cancer type is a data change.
 */

import { ConfigurationError } from "@/lib/join-errors";

export interface MutationClassSet {
  /** Highest default priority. */
  truncating: readonly string[];
  missense: readonly string[];
  /** Only consulted when defined, after truncating and missense. */
  noncoding?: readonly string[];
  /** Known lowest-priority types; anything else at that stage is reported. */
  silent: readonly string[];
}

/** cancer type → class set. `default` applies to unlisted cancer types. */
export type MutationClassConfig = Readonly<Record<string, MutationClassSet>>;

const SILENT = ["Silent", "synonymous SNV"];

const MAF_CLASSES: MutationClassSet = {
  truncating: ["Frame_Shift_Del", "Frame_Shift_Ins", "Nonsense_Mutation", "Nonstop_Mutation", "Splice_Site"],
  missense: ["In_Frame_Del", "In_Frame_Ins", "Missense_Mutation"],
  silent: SILENT,
};

export const DEFAULT_MUTATION_CLASSES: MutationClassConfig = {
  colon: {
    truncating: [
      "frameshift deletion",
      "frameshift insertion",
      "frameshift substitution",
      "stopgain",
      "stoploss",
    ],
    missense: [
      "nonframeshift deletion",
      "nonframeshift insertion",
      "nonframeshift substitution",
      "nonsynonymous SNV",
    ],
    silent: SILENT,
  },
  hnscc: {
    truncating: ["stopgain", "stoploss"],
    missense: ["nonframeshift insertion", "nonframeshift deletion"],
    silent: SILENT,
  },
  gbm: {
    ...MAF_CLASSES,
    noncoding: ["Intron", "RNA", "3'Flank", "Splice_Region", "5'UTR", "5'Flank", "3'UTR"],
  },
  default: MAF_CLASSES,
};

/** Class set for a cancer type, falling back to `default`. */
export function resolveMutationClasses(
  cancerType: string,
  config: MutationClassConfig = DEFAULT_MUTATION_CLASSES,
): MutationClassSet {
  const key = cancerType.toLowerCase();
  const classes = Object.prototype.hasOwnProperty.call(config, key) ? config[key] : config.default;
  if (!classes) {
    throw new ConfigurationError(
      `No mutation classes configured for cancer type ${cancerType}, and no default entry.`,
    );
  }
  return classes;
}

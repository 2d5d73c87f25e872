/**
 * Warning builders. Warnings are aggregated per call: one entry names every
 * affected column, sample or gene, never one entry per cell.
 */

import type { JoinWarning } from "@/types/table";
import { SOMATIC_MUTATION_TABLE } from "@/lib/omics-constants";
import { indexDifference } from "@/lib/table-ops";

export function missingColumnsWarning(tableName: string, missing: string[]): JoinWarning {
  return {
    kind: "missing_columns",
    message:
      `The following columns were not found in the ${tableName} table, so they were inserted ` +
      `into the joined table, but filled with missing values: ${missing.join(", ")}`,
  };
}

/**
 * Warn about rows an outer join filled with missing values: samples only in
 * `index1` lack `name2` data and vice versa. Gaps on the somatic_mutation
 * side are skipped, the wildtype imputation reports those.
 */
export function insertedMissingRowWarnings(
  name1: string,
  name2: string,
  index1: readonly string[],
  index2: readonly string[],
): JoinWarning[] {
  const warnings: JoinWarning[] = [];
  const only1 = indexDifference(index1, index2);
  const only2 = indexDifference(index2, index1);
  const w1 = insertedMissingRowWarning(only1, name2);
  if (w1) warnings.push(w1);
  const w2 = insertedMissingRowWarning(only2, name1);
  if (w2) warnings.push(w2);
  return warnings;
}

function insertedMissingRowWarning(samples: string[], otherName: string): JoinWarning | null {
  if (otherName === SOMATIC_MUTATION_TABLE || samples.length === 0) return null;
  return {
    kind: "inserted_missing_rows",
    message:
      `${otherName} data was not found for the following samples, so ${otherName} data ` +
      `columns were filled with missing values for these samples: ${samples.join(", ")}`,
  };
}

export function wildtypeFilledWarning(counts: { gene: string; count: number }[]): JoinWarning {
  const parts = counts.map(({ gene, count }) => `${count} samples for the ${gene} gene`);
  return {
    kind: "wildtype_filled",
    message:
      `In joining the somatic_mutation table, no mutations were found for the following samples, ` +
      `so they were filled with Wildtype_Tumor or Wildtype_Normal: ${parts.join(", ")}`,
  };
}

export function unknownMutationTypesWarning(types: string[]): JoinWarning {
  return {
    kind: "unknown_mutation_type",
    message: `Unknown mutation type(s) ${types.join(", ")}. Assigned lowest priority in filtering.`,
  };
}

export function filterValuesAbsentWarning(absent: { gene: string; values: string[] }[]): JoinWarning {
  const parts = absent.map(({ gene, values }) => `${gene} (${values.join(", ")})`);
  return {
    kind: "filter_value_absent_for_gene",
    message:
      `The following filter values do not exist in the mutations data for these genes, ` +
      `though they exist for other genes: ${parts.join("; ")}`,
  };
}

/**
 * Builds per-sample mutation columns from per-record mutation calls.
 *
 * For each requested gene: `<gene>_Mutation`, `<gene>_Location` and
 * `<gene>_Mutation_Status`. Cells hold the full lists of a sample's calls, or
 * one prioritized call when a filter is given.
 */

import type {
  CellValue,
  ColumnKey,
  JoinWarning,
  MutationRecord,
  PriorityFilter,
  TableResult,
} from "@/types/table";
import {
  LOCATION_SUFFIX,
  MULTIPLE_MUTATION,
  MUTATION_STATUS_SUFFIX,
  MUTATION_SUFFIX,
  SINGLE_MUTATION,
  SOMATIC_MUTATION_TABLE,
} from "@/lib/omics-constants";
import { InvalidGeneError, InvalidParameterError } from "@/lib/join-errors";
import { filterValuesAbsentWarning, unknownMutationTypesWarning } from "@/lib/join-warnings";
import { normalizeKeys } from "@/lib/column-selector";
import { compareIds } from "@/lib/table-ops";
import type { MutationPrioritizer } from "@/lib/mutation-prioritizer";

interface SampleCalls {
  mutations: string[];
  locations: (string | null)[];
}

export interface AggregateOptions {
  filter?: PriorityFilter;
  indexName?: string;
}

/** Validate the filter argument shape and that every token exists somewhere in the data. */
function checkFilter(filter: unknown, records: readonly MutationRecord[]): string[] | undefined {
  if (filter === undefined || filter === null) return undefined;
  if (!Array.isArray(filter) || filter.some((v) => typeof v !== "string")) {
    throw new InvalidParameterError("Mutations filter must be an array of strings, or undefined.");
  }
  const tokens: string[] = filter;
  const known = new Set<string>();
  for (const r of records) {
    known.add(r.mutation);
    if (r.location !== null) known.add(r.location);
  }
  for (const token of tokens) {
    if (!known.has(token)) {
      throw new InvalidParameterError(
        `Filter value ${token} does not exist in the mutations table for this dataset. ` +
          `Check for typos and existence. Merge aborted.`,
      );
    }
  }
  return tokens;
}

function groupBySample(records: readonly MutationRecord[]): Map<string, SampleCalls> {
  const bySample = new Map<string, SampleCalls>();
  for (const r of records) {
    const calls = bySample.get(r.sampleId);
    if (calls) {
      calls.mutations.push(r.mutation);
      calls.locations.push(r.location);
    } else {
      bySample.set(r.sampleId, { mutations: [r.mutation], locations: [r.location] });
    }
  }
  return bySample;
}

/**
 * Aggregate mutation records for `genes` into one flat table. The row index
 * holds every sample of the mutation table; samples with no call for a gene
 * have null cells for that gene, left for the wildtype imputation.
 */
export function aggregateMutations(
  records: readonly MutationRecord[],
  genes: unknown,
  prioritizer: MutationPrioritizer,
  options: AggregateOptions = {},
): TableResult {
  const requested = normalizeKeys(genes, "Genes");
  if (requested === undefined || requested.length === 0) {
    throw new InvalidParameterError("At least one gene is required to select mutations.");
  }
  const filter = checkFilter(options.filter, records);

  const index = [...new Set(records.map((r) => r.sampleId))].sort(compareIds);
  const keys: ColumnKey[] = [];
  const values: CellValue[][] = [];
  const unknownTypes = new Set<string>();
  const absentFilterValues: { gene: string; values: string[] }[] = [];

  for (const gene of requested) {
    const geneRecords = records.filter((r) => r.gene === gene);
    if (geneRecords.length === 0) throw new InvalidGeneError(gene);

    if (filter) {
      const absent = filter.filter(
        (token) => !geneRecords.some((r) => r.mutation === token || r.location === token),
      );
      if (absent.length > 0) absentFilterValues.push({ gene, values: absent });
    }

    const bySample = groupBySample(geneRecords);
    const mutationCol: CellValue[] = [];
    const locationCol: CellValue[] = [];
    const statusCol: CellValue[] = [];

    for (const sample of index) {
      const calls = bySample.get(sample);
      if (!calls) {
        mutationCol.push(null);
        locationCol.push(null);
        statusCol.push(null);
        continue;
      }
      statusCol.push(calls.mutations.length > 1 ? MULTIPLE_MUTATION : SINGLE_MUTATION);
      if (filter) {
        const chosen = prioritizer.choose(filter, calls.mutations, calls.locations);
        chosen.unknownTypes.forEach((t) => unknownTypes.add(t));
        mutationCol.push(chosen.mutation);
        locationCol.push(chosen.location);
      } else {
        mutationCol.push([...calls.mutations]);
        locationCol.push([...calls.locations]);
      }
    }

    keys.push([gene + MUTATION_SUFFIX], [gene + LOCATION_SUFFIX], [gene + MUTATION_STATUS_SUFFIX]);
    values.push(mutationCol, locationCol, statusCol);
  }

  const warnings: JoinWarning[] = [];
  if (absentFilterValues.length > 0) warnings.push(filterValuesAbsentWarning(absentFilterValues));
  if (unknownTypes.size > 0) warnings.push(unknownMutationTypesWarning([...unknownTypes]));

  return {
    table: {
      name: SOMATIC_MUTATION_TABLE,
      indexName: options.indexName ?? "Patient_ID",
      index,
      columns: { levels: ["Name"], keys },
      values,
    },
    warnings,
  };
}

/**
 * Sample index helpers for assembling a dataset's tables onto one shared
 * sample-id scheme before they go into the registry.
 */

import type { CellValue, SampleStatus, Table } from "@/types/table";
import { cloneCell, compareIds, sortRows } from "@/lib/table-ops";

/** Sorted union of every table's row index, without duplicates. */
export function unionizeIndices(tables: Iterable<Table>): string[] {
  const ids = new Set<string>();
  for (const table of tables) table.index.forEach((id) => ids.add(id));
  return [...ids].sort(compareIds);
}

/** Map each id to a sample id `S001`, `S002`, … in the order given. */
export function generateSampleIdMap(index: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  index.forEach((id, i) => map.set(id, `S${String(i + 1).padStart(3, "0")}`));
  return map;
}

export interface ReindexOptions {
  newIndexName?: string;
  /** Keep the old ids as a first column named after the old index. */
  keepOld?: boolean;
}

/**
 * Reindex a table through `reindexMap`. Returns null when any row has no
 * mapping, so the caller can decide how to report it.
 */
export function reindexTable(
  table: Table,
  reindexMap: ReadonlyMap<string, string>,
  options: ReindexOptions = {},
): Table | null {
  const index: string[] = [];
  for (const id of table.index) {
    const mapped = reindexMap.get(id);
    if (mapped === undefined) return null;
    index.push(mapped);
  }
  if (new Set(index).size !== index.length) return null;

  let keys = table.columns.keys.map((k) => [...k]);
  let values: CellValue[][] = table.values.map((col) => col.map(cloneCell));
  if (options.keepOld) {
    const namePos = table.columns.levels.indexOf("Name");
    keys = [table.columns.levels.map((_, i) => (i === namePos ? table.indexName : null)), ...keys];
    values = [[...table.index], ...values];
  }

  return sortRows({
    name: table.name,
    indexName: options.newIndexName ?? "Sample_ID",
    index,
    columns: { levels: [...table.columns.levels], keys },
    values,
  });
}

/** Normal/Tumor status of every sample, by a caller-supplied normal test. */
export function buildSampleStatusColumn(
  index: readonly string[],
  isNormal: (sampleId: string) => boolean,
): SampleStatus[] {
  return index.map((id) => (isNormal(id) ? "Normal" : "Tumor"));
}

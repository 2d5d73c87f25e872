/**
 * Column-index harmonization.
 *
 * Two tables can only be joined once their column indices carry the same
 * levels. Missing levels are added in canonical order (Name, Site, Peptide,
 * Database_ID) and padded with null.
 */

import type { ColumnIndex, ColumnLevel, Table } from "@/types/table";
import { CANONICAL_LEVELS } from "@/lib/omics-constants";

function sameLevels(a: readonly ColumnLevel[], b: readonly ColumnLevel[]): boolean {
  return a.length === b.length && a.every((level, i) => level === b[i]);
}

/**
 * Add to `to` every level of `source` it lacks and put its levels in
 * canonical order. Returns `to` itself when it already has exactly that
 * union, in that order.
 */
export function addLevels(to: ColumnIndex, source: ColumnIndex): ColumnIndex {
  const levels = CANONICAL_LEVELS.filter(
    (level) => to.levels.includes(level) || source.levels.includes(level),
  );
  if (sameLevels(to.levels, levels)) return to;

  const keys = to.keys.map((key) =>
    levels.map((level) => {
      const pos = to.levels.indexOf(level);
      return pos < 0 ? null : key[pos];
    }),
  );
  return { levels, keys };
}

/** Upgrade both indices to the union of their levels. */
export function harmonizeColumns(a: ColumnIndex, b: ColumnIndex): [ColumnIndex, ColumnIndex] {
  return [addLevels(a, b), addLevels(b, a)];
}

/** Table-level convenience over harmonizeColumns. */
export function harmonizeTables(a: Table, b: Table): [Table, Table] {
  const [ca, cb] = harmonizeColumns(a.columns, b.columns);
  return [
    ca === a.columns ? a : { ...a, columns: ca },
    cb === b.columns ? b : { ...b, columns: cb },
  ];
}

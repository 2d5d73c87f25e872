/**
 * Wildtype imputation for mutation joins.
 *
 * A sample with a known Tumor/Normal status and no mutation call for a gene
 * is wildtype for it. Samples without a status are left missing: nothing can
 * be asserted about them.
 */

import type {
  CellValue,
  ColumnKey,
  JoinWarning,
  SampleStatusMap,
  Table,
  TableResult,
} from "@/types/table";
import {
  MUTATION_SUFFIX,
  NO_MUTATION,
  SAMPLE_STATUS_COLUMN,
  WILDTYPE_NORMAL,
  WILDTYPE_TUMOR,
} from "@/lib/omics-constants";
import { wildtypeFilledWarning } from "@/lib/join-warnings";
import { appendColumn, columnNames, dropColumns, isMissing, namePosition } from "@/lib/table-ops";

export type CellShape = "scalar" | "list" | "nested_list";

export interface ImputeOptions {
  /** Whether the mutation cells were collapsed to a single call. */
  filtered: boolean;
  /** Fill Location columns with No_mutation; drop them otherwise. */
  showLocation: boolean;
}

const MUTATION_COL = /^.*_Mutation$/;
const LOCATION_COL = /^.*_Location$/;
const MUTATION_STATUS_COL = /^.*_Mutation_Status$/;

function cellShape(value: CellValue): CellShape | null {
  if (isMissing(value)) return null;
  if (!Array.isArray(value)) return "scalar";
  return value.some((v) => Array.isArray(v)) ? "nested_list" : "list";
}

/**
 * Shape the existing cells of a column take, ignoring missing ones.
 * Nested lists win over plain lists; null when the column has no values.
 */
export function detectCellShape(values: readonly CellValue[]): CellShape | null {
  let shape: CellShape | null = null;
  for (const value of values) {
    const s = cellShape(value);
    if (s === "nested_list") return s;
    if (s !== null && shape === null) shape = s;
  }
  return shape;
}

/** Wrap a sentinel to the depth of the cells it sits among. */
export function shapeFill(sentinel: string, shape: CellShape): CellValue {
  switch (shape) {
    case "scalar":
      return sentinel;
    case "list":
      return [sentinel];
    case "nested_list":
      return [[sentinel]];
  }
}

function fillShapeFor(
  values: readonly CellValue[],
  fallback: CellShape,
  filtered: boolean,
): CellShape {
  if (filtered) return "scalar";
  const shape = detectCellShape(values);
  return shape === null || shape === "scalar" ? fallback : shape;
}

function geneOf(name: string, suffix: string): string {
  return name.slice(0, name.length - suffix.length);
}

/**
 * Append the Sample_Status column, fill missing Mutation and Mutation_Status
 * cells with Wildtype_Tumor / Wildtype_Normal and fill or drop the Location
 * columns. Fill values take the shape of the column's existing cells.
 */
export function imputeWildtype(
  joined: Table,
  statusMap: SampleStatusMap,
  options: ImputeOptions,
): TableResult {
  const pos = namePosition(joined.columns);
  const statusKey: ColumnKey = joined.columns.levels.map((_, i) => (i === pos ? SAMPLE_STATUS_COLUMN : null));
  const statuses = joined.index.map((id) => statusMap.get(id) ?? null);
  let table = appendColumn(joined, statusKey, [...statuses]);

  const names = columnNames(table.columns);

  // Shape for columns with no value to detect from: whatever prevails elsewhere.
  const tableShape: CellShape = names.some(
    (name, c) =>
      name !== null &&
      (MUTATION_COL.test(name) || LOCATION_COL.test(name)) &&
      detectCellShape(table.values[c]) === "nested_list",
  )
    ? "nested_list"
    : "list";

  const fillCounts: { gene: string; count: number }[] = [];
  const values = table.values.map((column, c) => {
    const name = names[c];
    if (name === null) return column;

    if (MUTATION_COL.test(name)) {
      const shape = fillShapeFor(column, tableShape, options.filtered);
      let count = 0;
      const filled = column.map((cell, r) => {
        const status = statuses[r];
        if (!isMissing(cell) || status === null) return cell;
        count++;
        return shapeFill(status === "Tumor" ? WILDTYPE_TUMOR : WILDTYPE_NORMAL, shape);
      });
      if (count > 0) fillCounts.push({ gene: geneOf(name, MUTATION_SUFFIX), count });
      return filled;
    }

    if (MUTATION_STATUS_COL.test(name)) {
      return column.map((cell, r) => {
        const status = statuses[r];
        if (!isMissing(cell) || status === null) return cell;
        return status === "Tumor" ? WILDTYPE_TUMOR : WILDTYPE_NORMAL;
      });
    }

    if (LOCATION_COL.test(name) && options.showLocation) {
      const shape = fillShapeFor(column, tableShape, options.filtered);
      return column.map((cell, r) =>
        isMissing(cell) && statuses[r] !== null ? shapeFill(NO_MUTATION, shape) : cell,
      );
    }

    return column;
  });
  table = { ...table, values };

  if (!options.showLocation) {
    table = dropColumns(table, (key) => {
      const name = key[pos];
      return name !== null && LOCATION_COL.test(name);
    });
  }

  const warnings: JoinWarning[] = fillCounts.length > 0 ? [wildtypeFilledWarning(fillCounts)] : [];
  return { table, warnings };
}

/**
 * In-memory table model shared by the selection, join and imputation engines.
 *
 * Tables are column-major: `values[c][r]` is the cell of column `c` at row
 * `r`. The row index holds unique sample identifiers in ascending order.
 */

/** Canonical column-index levels, in canonical order. */
export type ColumnLevel = "Name" | "Site" | "Peptide" | "Database_ID";

export type ScalarValue = string | number | boolean | null;

/** A cell is a scalar or a (possibly nested) list, as mutation cells are. */
export type CellValue = ScalarValue | CellValue[];

/** One column label; aligned with `ColumnIndex.levels`, `null` = missing level value. */
export type ColumnKey = readonly (string | null)[];

export interface ColumnIndex {
  levels: readonly ColumnLevel[];
  keys: ColumnKey[];
}

export interface Table {
  name: string;
  /** Name of the row axis, e.g. "Patient_ID" or "Sample_ID". */
  indexName: string;
  index: string[];
  columns: ColumnIndex;
  values: CellValue[][];
}

export type TableCategory = "omics" | "metadata" | "mutation";

export interface MutationRecord {
  sampleId: string;
  gene: string;
  mutation: string;
  location: string | null;
}

export type SampleStatus = "Tumor" | "Normal";

/** sample id → status; samples with unknown status are absent. */
export type SampleStatusMap = ReadonlyMap<string, SampleStatus>;

/**
 * Ordered mutation-type / location tokens to prefer when collapsing several
 * mutations. `undefined` keeps full lists; `[]` collapses with the default
 * hierarchy only.
 */
export type PriorityFilter = readonly string[] | undefined;

/** A single label, several labels, or `undefined` for the whole table. */
export type ColumnKeys = string | readonly string[] | undefined;

export type JoinWarningKind =
  | "missing_columns"
  | "inserted_missing_rows"
  | "wildtype_filled"
  | "unknown_mutation_type"
  | "filter_value_absent_for_gene"
  | "duplicate_column_headers"
  | "flatten_single_index";

export interface JoinWarning {
  kind: JoinWarningKind;
  message: string;
}

export interface TableResult {
  table: Table;
  warnings: JoinWarning[];
}

export interface TableShape {
  rows: number;
  columns: number;
}

export interface TableListing {
  name: string;
  category: TableCategory;
  shape: TableShape;
}

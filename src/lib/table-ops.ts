/**
 * Immutable table primitives: construction, copying, column lookup and the
 * row-index outer join every join operation is built on.
 *
 * Nothing here mutates its arguments; every function returns a new table.
 */

import type {
  CellValue,
  ColumnIndex,
  ColumnKey,
  ColumnLevel,
  Table,
  TableShape,
} from "@/types/table";
import { ConfigurationError, InvalidParameterError } from "@/lib/join-errors";

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

/** `null` and `NaN` are the missing-value markers. */
export function isMissing(value: CellValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === "number" && Number.isNaN(value));
}

export function cloneCell(value: CellValue): CellValue {
  return Array.isArray(value) ? value.map(cloneCell) : value;
}

/** Ascending code-unit order, the order every result index is sorted in. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface TableInit {
  name: string;
  indexName?: string;
  index: string[];
  /** Defaults to a flat `["Name"]` index. */
  levels?: readonly ColumnLevel[];
  keys: ColumnKey[];
  values: CellValue[][];
}

/**
 * Build a table, validating its shape and sorting rows ascending by index.
 * Throws InvalidParameterError on duplicate sample ids or ragged columns.
 */
export function createTable(init: TableInit): Table {
  const levels = init.levels ?? ["Name"];
  if (!levels.includes("Name")) {
    throw new InvalidParameterError(`Table ${init.name} has no Name column level.`);
  }
  if (init.keys.length !== init.values.length) {
    throw new InvalidParameterError(
      `Table ${init.name} has ${init.keys.length} column labels but ${init.values.length} columns.`,
    );
  }
  for (const key of init.keys) {
    if (key.length !== levels.length) {
      throw new InvalidParameterError(
        `Column label [${key.join(", ")}] in ${init.name} does not have ${levels.length} levels.`,
      );
    }
  }
  for (const column of init.values) {
    if (column.length !== init.index.length) {
      throw new InvalidParameterError(
        `Table ${init.name} has ${init.index.length} rows but a column with ${column.length} values.`,
      );
    }
  }
  const seen = new Set<string>();
  for (const id of init.index) {
    if (seen.has(id)) throw new InvalidParameterError(`Table ${init.name} has duplicate row ${id}.`);
    seen.add(id);
  }

  return sortRows({
    name: init.name,
    indexName: init.indexName ?? "Patient_ID",
    index: [...init.index],
    columns: { levels: [...levels], keys: init.keys.map((k) => [...k]) },
    values: init.values.map((col) => col.map(cloneCell)),
  });
}

/** Flat table from a `{ label: values }` record, in record order. */
export function fromColumns(
  name: string,
  index: string[],
  columns: Record<string, CellValue[]>,
  indexName = "Patient_ID",
): Table {
  const labels = Object.keys(columns);
  return createTable({
    name,
    indexName,
    index,
    keys: labels.map((label) => [label]),
    values: labels.map((label) => columns[label]),
  });
}

export function cloneTable(table: Table): Table {
  return {
    name: table.name,
    indexName: table.indexName,
    index: [...table.index],
    columns: cloneColumnIndex(table.columns),
    values: table.values.map((col) => col.map(cloneCell)),
  };
}

export function cloneColumnIndex(columns: ColumnIndex): ColumnIndex {
  return { levels: [...columns.levels], keys: columns.keys.map((k) => [...k]) };
}

/** Return a copy with rows in ascending index order. */
export function sortRows(table: Table): Table {
  const order = table.index.map((_, i) => i);
  order.sort((a, b) => compareIds(table.index[a], table.index[b]));
  if (order.every((pos, i) => pos === i)) return table;
  return {
    ...table,
    index: order.map((i) => table.index[i]),
    values: table.values.map((col) => order.map((i) => col[i])),
  };
}

// ---------------------------------------------------------------------------
// Column lookup
// ---------------------------------------------------------------------------

export function tableShape(table: Table): TableShape {
  return { rows: table.index.length, columns: table.columns.keys.length };
}

export function namePosition(columns: ColumnIndex): number {
  const pos = columns.levels.indexOf("Name");
  if (pos < 0) throw new ConfigurationError("Column index has no Name level.");
  return pos;
}

/** The Name level value of every column. */
export function columnNames(columns: ColumnIndex): (string | null)[] {
  const pos = namePosition(columns);
  return columns.keys.map((key) => key[pos]);
}

export function isFlat(columns: ColumnIndex): boolean {
  return columns.levels.length === 1;
}

export function keysEqual(a: ColumnKey, b: ColumnKey): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/** Display id of a column: non-missing level values joined by `sep`. */
export function columnId(key: ColumnKey, sep = "|"): string {
  return key.filter((v): v is string => v !== null).join(sep);
}

/** Column values by Name (first match), or undefined when absent. */
export function getColumnByName(table: Table, name: string): CellValue[] | undefined {
  const pos = columnNames(table.columns).indexOf(name);
  return pos < 0 ? undefined : table.values[pos];
}

export function getCell(table: Table, sampleId: string, name: string): CellValue | undefined {
  const row = table.index.indexOf(sampleId);
  const column = getColumnByName(table, name);
  if (row < 0 || !column) return undefined;
  return column[row];
}

/** One sample's row, in column order. */
export function rowOf(table: Table, sampleId: string): CellValue[] | undefined {
  const row = table.index.indexOf(sampleId);
  if (row < 0) return undefined;
  return table.values.map((col) => col[row]);
}

/** Rewrite the Name level of every column. */
export function renameNames(columns: ColumnIndex, rename: (name: string) => string): ColumnIndex {
  const pos = namePosition(columns);
  return {
    levels: [...columns.levels],
    keys: columns.keys.map((key) => key.map((v, i) => (i === pos && v !== null ? rename(v) : v))),
  };
}

export function dropColumns(table: Table, drop: (key: ColumnKey, position: number) => boolean): Table {
  const keep = table.columns.keys.map((key, i) => !drop(key, i));
  return {
    ...table,
    columns: {
      levels: [...table.columns.levels],
      keys: table.columns.keys.filter((_, i) => keep[i]),
    },
    values: table.values.filter((_, i) => keep[i]),
  };
}

export function appendColumn(table: Table, key: ColumnKey, values: CellValue[]): Table {
  return {
    ...table,
    columns: { levels: [...table.columns.levels], keys: [...table.columns.keys, [...key]] },
    values: [...table.values, values],
  };
}

// ---------------------------------------------------------------------------
// Row index set operations
// ---------------------------------------------------------------------------

/** Sample ids in `a` but not in `b`, ascending. */
export function indexDifference(a: readonly string[], b: readonly string[]): string[] {
  const other = new Set(b);
  return a.filter((id) => !other.has(id)).sort(compareIds);
}

export function indexUnion(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])].sort(compareIds);
}

// ---------------------------------------------------------------------------
// Outer join
// ---------------------------------------------------------------------------

export interface OuterJoinOptions {
  /** Appended to the Name of right-side columns whose label collides with a left-side one. */
  rsuffix?: string;
  name?: string;
}

/**
 * Outer join on the row index. Both sides must already share column levels
 * (see index-harmonizer.ts). Rows missing on one side are filled with null.
 * The result index is the ascending union of both indices.
 */
export function outerJoin(left: Table, right: Table, options: OuterJoinOptions = {}): Table {
  const { levels } = left.columns;
  if (levels.length !== right.columns.levels.length || levels.some((l, i) => l !== right.columns.levels[i])) {
    throw new ConfigurationError(
      `Cannot join ${left.name} [${levels.join(", ")}] to ${right.name} [${right.columns.levels.join(", ")}] before harmonizing column levels.`,
    );
  }

  const overlap = right.columns.keys.filter((rk) => left.columns.keys.some((lk) => keysEqual(lk, rk)));
  let rightColumns = right.columns;
  if (overlap.length > 0) {
    if (options.rsuffix === undefined) {
      throw new InvalidParameterError(
        `Columns overlap but no suffix specified: ${overlap.map((k) => columnId(k)).join(", ")}`,
      );
    }
    const suffix = options.rsuffix;
    const pos = namePosition(right.columns);
    rightColumns = {
      levels: [...levels],
      keys: right.columns.keys.map((key) =>
        overlap.some((o) => keysEqual(o, key))
          ? key.map((v, i) => (i === pos && v !== null ? v + suffix : v))
          : [...key],
      ),
    };
  }

  const index = indexUnion(left.index, right.index);
  const leftRow = new Map(left.index.map((id, i) => [id, i]));
  const rightRow = new Map(right.index.map((id, i) => [id, i]));

  const pick = (column: CellValue[], rows: Map<string, number>): CellValue[] =>
    index.map((id) => {
      const r = rows.get(id);
      return r === undefined ? null : cloneCell(column[r]);
    });

  return {
    name: options.name ?? `${left.name}+${right.name}`,
    indexName: left.indexName,
    index,
    columns: {
      levels: [...levels],
      keys: [...left.columns.keys.map((k) => [...k]), ...rightColumns.keys],
    },
    values: [
      ...left.values.map((col) => pick(col, leftRow)),
      ...right.values.map((col) => pick(col, rightRow)),
    ],
  };
}

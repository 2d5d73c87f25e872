/**
 * Column selection from registry tables.
 *
 * Omics lookup is lenient: unknown genes become all-missing columns and are
 * reported in one warning. Metadata lookup is strict: an unknown column is
 * an InvalidColumnError.
 */

import type {
  CellValue,
  ColumnKey,
  ColumnKeys,
  JoinWarning,
  Table,
  TableCategory,
  TableResult,
} from "@/types/table";
import { VALID_METADATA_TABLES, VALID_OMICS_TABLES } from "@/lib/omics-constants";
import {
  ConfigurationError,
  InvalidColumnError,
  InvalidParameterError,
  InvalidTableError,
} from "@/lib/join-errors";
import { missingColumnsWarning } from "@/lib/join-warnings";
import { columnNames, namePosition, renameNames } from "@/lib/table-ops";
import type { TableRegistry } from "@/lib/table-registry";

export interface SelectionConfig {
  validOmicsTables: readonly string[];
  validMetadataTables: readonly string[];
}

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  validOmicsTables: VALID_OMICS_TABLES,
  validMetadataTables: VALID_METADATA_TABLES,
};

// ---------------------------------------------------------------------------
// Argument handling
// ---------------------------------------------------------------------------

/**
 * Normalize a keys argument to a deduplicated list in request order, or
 * undefined for "whole table". Rejects anything that is not a string or an
 * array of strings, which untyped callers can still pass.
 */
export function normalizeKeys(keys: unknown, what = "Keys"): string[] | undefined {
  if (keys === undefined || keys === null) return undefined;
  if (typeof keys === "string") return [keys];
  if (Array.isArray(keys)) {
    const out: string[] = [];
    for (const k of keys) {
      if (typeof k !== "string") {
        throw new InvalidParameterError(
          `${what} parameter contains ${String(k)}, which is a ${typeof k}. Valid types: str, or array of str.`,
        );
      }
      if (!out.includes(k)) out.push(k);
    }
    return out;
  }
  throw new InvalidParameterError(
    `${what} parameter ${String(keys)} is of invalid type ${typeof keys}. Valid types: str, array of str, or undefined.`,
  );
}

/**
 * Throw unless `tableName` is registered and whitelisted for `category`.
 */
export function checkTableValid(
  registry: TableRegistry,
  tableName: unknown,
  category: TableCategory,
  config: SelectionConfig = DEFAULT_SELECTION_CONFIG,
): void {
  if (typeof tableName !== "string") {
    throw new InvalidParameterError(
      `Please pass a string for the table name. You passed ${String(tableName)}, which is a ${typeof tableName}.`,
    );
  }

  let valid: readonly string[];
  if (category === "omics") valid = config.validOmicsTables;
  else if (category === "metadata") valid = config.validMetadataTables;
  else throw new ConfigurationError(`Invalid category ${category} passed to checkTableValid.`);

  if (!registry.hasTable(tableName)) {
    throw new InvalidTableError(`${tableName} table not included in this dataset.`);
  }
  if (!valid.includes(tableName) || registry.categoryOf(tableName) !== category) {
    const options = valid.filter((name) => registry.hasTable(name));
    throw new InvalidTableError(
      `${tableName} is not a valid ${category} table for this function in this dataset. Valid options:` +
        options.map((name) => `\n\t${name}`).join(""),
    );
  }
}

// ---------------------------------------------------------------------------
// Omics
// ---------------------------------------------------------------------------

function suffixed(table: Table, tableName: string): Table {
  return { ...table, columns: renameNames(table.columns, (name) => `${name}_${tableName}`) };
}

/**
 * Select gene columns from an omics table. Every column Name gets a
 * `_<tableName>` suffix so provenance survives later joins.
 */
export function selectOmicsColumns(
  registry: TableRegistry,
  tableName: string,
  genes: ColumnKeys,
  config: SelectionConfig = DEFAULT_SELECTION_CONFIG,
): TableResult {
  checkTableValid(registry, tableName, "omics", config);
  const table = registry.getTable(tableName);
  const requested = normalizeKeys(genes, "Genes");

  if (requested === undefined) {
    return { table: suffixed(table, tableName), warnings: [] };
  }

  const names = columnNames(table.columns);
  const pos = namePosition(table.columns);
  const keys: ColumnKey[] = [];
  const values: CellValue[][] = [];
  const missing: string[] = [];

  for (const gene of requested) {
    let found = false;
    names.forEach((name, c) => {
      if (name !== gene) return;
      found = true;
      keys.push(table.columns.keys[c]);
      values.push(table.values[c]);
    });
    if (!found) {
      missing.push(gene);
      keys.push(table.columns.levels.map((_, i) => (i === pos ? gene : null)));
      values.push(table.index.map(() => null));
    }
  }

  const warnings: JoinWarning[] = missing.length > 0 ? [missingColumnsWarning(tableName, missing)] : [];
  const selected: Table = {
    ...table,
    columns: { levels: [...table.columns.levels], keys },
    values,
  };
  return { table: suffixed(selected, tableName), warnings };
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/** Select columns from a metadata table. Unknown columns are an error. */
export function selectMetadataColumns(
  registry: TableRegistry,
  tableName: string,
  cols: ColumnKeys,
  config: SelectionConfig = DEFAULT_SELECTION_CONFIG,
): TableResult {
  checkTableValid(registry, tableName, "metadata", config);
  const table = registry.getTable(tableName);
  const requested = normalizeKeys(cols, "Columns");

  if (requested === undefined) return { table, warnings: [] };

  const names = columnNames(table.columns);
  const missing = requested.filter((col) => !names.includes(col));
  if (missing.length > 0) {
    throw new InvalidColumnError(
      `The following columns were not found in the ${tableName} table: ${missing.join(", ")}`,
      missing,
    );
  }

  const positions = requested.map((col) => names.indexOf(col));
  return {
    table: {
      ...table,
      columns: {
        levels: [...table.columns.levels],
        keys: positions.map((p) => table.columns.keys[p]),
      },
      values: positions.map((p) => table.values[p]),
    },
    warnings: [],
  };
}

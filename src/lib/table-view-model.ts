/**
 * Flatten a joined table into the string grid the DataTable renders.
 */

import type { CellValue, Table } from "@/types/table";
import { isMissing, namePosition } from "@/lib/table-ops";

export const INDEX_COLUMN_ID = "__index";

export interface GridColumn {
  id: string;
  /** Name level value. */
  header: string;
  /** Remaining non-missing level values (Site, Peptide, Database_ID), or null. */
  label: string | null;
}

export type GridRow = Record<string, string | null>;

export interface GridModel {
  columns: GridColumn[];
  rows: GridRow[];
}

/** Display text of a cell; null for missing. Lists render as `[a, b]`. */
export function formatCell(value: CellValue): string | null {
  if (isMissing(value)) return null;
  if (Array.isArray(value)) {
    return `[${value.map((v) => formatCell(v) ?? "NA").join(", ")}]`;
  }
  return String(value);
}

export function toGridModel(table: Table): GridModel {
  const pos = namePosition(table.columns);
  const columns: GridColumn[] = [
    { id: INDEX_COLUMN_ID, header: table.indexName, label: null },
    ...table.columns.keys.map((key, c): GridColumn => {
      const rest = key.filter((v, i): v is string => i !== pos && v !== null);
      return {
        id: `c${c}`,
        header: key[pos] ?? "",
        label: rest.length > 0 ? rest.join(" / ") : null,
      };
    }),
  ];

  const rows = table.index.map((id, r) => {
    const row: GridRow = { [INDEX_COLUMN_ID]: id };
    table.values.forEach((col, c) => {
      row[`c${c}`] = formatCell(col[r]);
    });
    return row;
  });

  return { columns, rows };
}

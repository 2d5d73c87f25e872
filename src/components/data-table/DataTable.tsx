import { useMemo, useState } from "react";
import {
  flexRender,
  getCoreRowModel,
  getSortedRowModel,
  useReactTable,
  type ColumnDef,
  type SortingState,
} from "@tanstack/react-table";
import { AlertTriangle, ArrowDown, ArrowUp } from "lucide-react";
import { toGridModel, type GridRow } from "@/lib/table-view-model";
import type { JoinWarning, Table } from "@/types/table";

interface DataTableProps {
  table: Table;
  warnings?: JoinWarning[];
}

export function DataTable({ table: data, warnings = [] }: DataTableProps) {
  const [sorting, setSorting] = useState<SortingState>([]);
  const model = useMemo(() => toGridModel(data), [data]);

  const tableColumns: ColumnDef<GridRow>[] = model.columns.map((col) => ({
    accessorKey: col.id,
    header: () => (
      <div>
        <div>{col.header}</div>
        {col.label && (
          <div className="text-[9px] font-normal normal-case tracking-normal text-muted-foreground/70">
            {col.label}
          </div>
        )}
      </div>
    ),
    cell: ({ row }) => {
      const val = row.original[col.id];
      return val != null && val !== "" ? (
        val
      ) : (
        <span className="text-muted-foreground">--</span>
      );
    },
  }));

  const table = useReactTable({
    data: model.rows,
    columns: tableColumns,
    state: { sorting },
    onSortingChange: setSorting,
    getCoreRowModel: getCoreRowModel(),
    getSortedRowModel: getSortedRowModel(),
  });

  return (
    <div className="flex h-full flex-col rounded-md border">
      <div className="flex shrink-0 items-center justify-between border-b bg-muted/30 px-3 py-1.5">
        <span className="text-xs text-muted-foreground">
          {data.name} · {model.rows.length} rows · {model.columns.length - 1} columns
        </span>
      </div>
      {warnings.length > 0 && (
        <ul className="shrink-0 border-b px-3 py-1.5 text-xs text-amber-700">
          {warnings.map((w, i) => (
            <li key={i} className="flex items-start gap-1.5" data-kind={w.kind}>
              <AlertTriangle className="mt-px h-3 w-3 shrink-0" />
              <span>{w.message}</span>
            </li>
          ))}
        </ul>
      )}
      <div className="min-h-0 flex-1 overflow-auto">
        <table className="w-full text-[10px]">
          <thead className="sticky top-0 z-10 bg-background">
            {table.getHeaderGroups().map((headerGroup) => (
              <tr key={headerGroup.id} className="border-b bg-muted/30">
                {headerGroup.headers.map((header) => (
                  <th
                    key={header.id}
                    className="cursor-pointer px-1.5 py-1 text-left align-middle font-semibold uppercase tracking-wider whitespace-nowrap text-muted-foreground hover:bg-accent/50"
                    onClick={header.column.getToggleSortingHandler()}
                  >
                    {flexRender(header.column.columnDef.header, header.getContext())}
                    {header.column.getIsSorted() === "asc" && <ArrowUp className="inline h-3 w-3" />}
                    {header.column.getIsSorted() === "desc" && <ArrowDown className="inline h-3 w-3" />}
                  </th>
                ))}
              </tr>
            ))}
          </thead>
          <tbody>
            {table.getRowModel().rows.length ? (
              table.getRowModel().rows.map((row) => (
                <tr key={row.id} className="border-b transition-colors hover:bg-accent/50">
                  {row.getVisibleCells().map((cell) => (
                    <td key={cell.id} className="px-1.5 py-px align-middle whitespace-nowrap">
                      {flexRender(cell.column.columnDef.cell, cell.getContext())}
                    </td>
                  ))}
                </tr>
              ))
            ) : (
              <tr>
                <td colSpan={table.getVisibleLeafColumns().length || 1} className="h-24 text-center">
                  No data.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
}

import { useMemo } from "react";
import type { JoinEngine } from "@/lib/join-engine";
import { joinRequestKey, runJoin, type JoinRequest } from "@/lib/join-requests";
import { OmicsJoinError } from "@/lib/join-errors";
import type { JoinWarning, Table } from "@/types/table";

export type JoinedTableState =
  | { status: "idle" }
  | { status: "success"; table: Table; warnings: JoinWarning[] }
  | { status: "error"; error: OmicsJoinError };

/**
 * Run a join for the current request, recomputing only when the request
 * changes. Validation errors become an error state; anything else is a bug
 * and propagates.
 */
export function useJoinedTable(engine: JoinEngine, request: JoinRequest | null): JoinedTableState {
  const key = request ? joinRequestKey(request) : null;
  return useMemo((): JoinedTableState => {
    if (!request) return { status: "idle" };
    try {
      const { table, warnings } = runJoin(engine, request);
      return { status: "success", table, warnings };
    } catch (err) {
      if (err instanceof OmicsJoinError) return { status: "error", error: err };
      throw err;
    }
  }, [engine, key]); // eslint-disable-line react-hooks/exhaustive-deps
}

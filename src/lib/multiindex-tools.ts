/**
 * Reduce a multi-level column index: drop levels and/or flatten to one level.
 */

import type { ColumnLevel, JoinWarning, Table, TableResult } from "@/types/table";
import { InvalidParameterError } from "@/lib/join-errors";
import { cloneTable, columnId, isFlat } from "@/lib/table-ops";

export interface ReduceMultiIndexOptions {
  /** Level names or positions. Must be all names or all positions. */
  levelsToDrop?: string | number | readonly (string | number)[];
  flatten?: boolean;
  sep?: string;
}

function levelPositions(levels: readonly ColumnLevel[], toDrop: readonly (string | number)[]): number[] {
  if (toDrop.length >= levels.length) {
    throw new InvalidParameterError(
      `You tried to drop too many levels from the column index. The most levels you can drop is one ` +
        `less than however many exist. ${levels.length} levels exist; you tried to drop ${toDrop.length}.`,
    );
  }

  if (toDrop.every((l) => typeof l === "number")) {
    const bad = toDrop.filter((l) => typeof l === "number" && !(Number.isInteger(l) && l >= 0 && l < levels.length));
    if (bad.length > 0) {
      throw new InvalidParameterError(
        `Some level indices in [${toDrop.join(", ")}] do not exist in the column index, so they cannot be dropped. ` +
          `Existing column level indices: [${levels.map((_, i) => i).join(", ")}]`,
      );
    }
    return toDrop.map(Number);
  }

  if (toDrop.every((l) => typeof l === "string")) {
    const missing = toDrop.filter((l) => !levels.some((level) => level === l));
    if (missing.length > 0) {
      throw new InvalidParameterError(
        `Some levels in [${toDrop.join(", ")}] do not exist in the column index, so they cannot be dropped. ` +
          `Existing column levels: [${levels.join(", ")}]`,
      );
    }
    return levels.flatMap((level, i) => (toDrop.includes(level) ? [i] : []));
  }

  throw new InvalidParameterError("Levels to drop must be all level names or all level positions.");
}

function countDuplicatedKeys(ids: string[]): number {
  const counts = new Map<string, number>();
  ids.forEach((id) => counts.set(id, (counts.get(id) ?? 0) + 1));
  let dups = 0;
  counts.forEach((n) => {
    if (n > 1) dups += n;
  });
  return dups;
}

export function reduceMultiIndex(table: Table, options: ReduceMultiIndexOptions = {}): TableResult {
  const { levelsToDrop, flatten = false, sep = "_" } = options;
  let result = cloneTable(table);
  const warnings: JoinWarning[] = [];

  if (levelsToDrop !== undefined) {
    if (isFlat(result.columns)) {
      throw new InvalidParameterError("You attempted to drop level(s) from an index with only one level.");
    }
    const toDrop =
      typeof levelsToDrop === "string" || typeof levelsToDrop === "number" ? [levelsToDrop] : levelsToDrop;
    const positions = levelPositions(result.columns.levels, toDrop);
    if (positions.includes(result.columns.levels.indexOf("Name"))) {
      throw new InvalidParameterError(
        "The Name level cannot be dropped: selection, joins and imputation find every column by its Name.",
      );
    }

    const keep = (_: unknown, i: number) => !positions.includes(i);
    result = {
      ...result,
      columns: {
        levels: result.columns.levels.filter(keep),
        keys: result.columns.keys.map((key) => key.filter(keep)),
      },
    };

    const dups = countDuplicatedKeys(result.columns.keys.map((k) => JSON.stringify(k)));
    if (dups > 0) {
      warnings.push({
        kind: "duplicate_column_headers",
        message: `Due to dropping the specified levels, the table now has ${dups} duplicated column headers.`,
      });
    }
  }

  if (flatten) {
    if (isFlat(result.columns)) {
      warnings.push({
        kind: "flatten_single_index",
        message: "You tried to flatten an index that didn't have multiple levels, so nothing was changed.",
      });
      return { table: result, warnings };
    }
    result = {
      ...result,
      columns: { levels: ["Name"], keys: result.columns.keys.map((key) => [columnId(key, sep)]) },
    };
  }

  return { table: result, warnings };
}

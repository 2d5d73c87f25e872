/**
 * Registry of a dataset's tables, populated once by a loader and read-only
 * afterwards. Every accessor returns an independent copy so callers may
 * mutate their result without affecting the registry or each other.
 */

import type {
  MutationRecord,
  SampleStatus,
  SampleStatusMap,
  Table,
  TableCategory,
  TableListing,
} from "@/types/table";
import {
  CLINICAL_TABLE,
  SAMPLE_STATUS_SOURCE_COLUMN,
  SOMATIC_MUTATION_TABLE,
} from "@/lib/omics-constants";
import { InvalidParameterError, InvalidTableError } from "@/lib/join-errors";
import { cloneTable, compareIds, createTable, getColumnByName, tableShape } from "@/lib/table-ops";

export type RegisteredTable =
  | { category: "omics" | "metadata"; table: Table }
  | { category: "mutation"; records: MutationRecord[] };

export interface TableRegistryInit {
  cancerType: string;
  tables: Record<string, RegisteredTable>;
}

function cloneRecords(records: readonly MutationRecord[]): MutationRecord[] {
  return records.map((r) => ({ ...r }));
}

/** Records ordered by sample, keeping file order within a sample. */
function sortRecords(records: readonly MutationRecord[]): MutationRecord[] {
  return records
    .map((r, i) => ({ r, i }))
    .sort((a, b) => compareIds(a.r.sampleId, b.r.sampleId) || a.i - b.i)
    .map(({ r }) => ({ ...r }));
}

/** Copy of a loader's table, with the same shape checks createTable makes. */
function validated(table: Table, name: string): Table {
  return createTable({
    name,
    indexName: table.indexName,
    index: table.index,
    levels: table.columns.levels,
    keys: table.columns.keys,
    values: table.values,
  });
}

function toStatus(value: unknown): SampleStatus | null {
  return value === "Tumor" || value === "Normal" ? value : null;
}

export class TableRegistry {
  private readonly cancerType: string;
  private readonly entries: Map<string, RegisteredTable>;
  private statusMap: SampleStatusMap | null = null;

  constructor(init: TableRegistryInit) {
    this.cancerType = init.cancerType.toLowerCase();
    this.entries = new Map();
    for (const [name, entry] of Object.entries(init.tables)) {
      if (entry.category === "mutation") {
        this.entries.set(name, { category: "mutation", records: sortRecords(entry.records) });
      } else {
        this.entries.set(name, { category: entry.category, table: validated(entry.table, name) });
      }
    }
  }

  getCancerType(): string {
    return this.cancerType;
  }

  hasTable(name: string): boolean {
    return this.entries.has(name);
  }

  categoryOf(name: string): TableCategory | undefined {
    return this.entries.get(name)?.category;
  }

  /** Copy of a tabular (omics or metadata) table. */
  getTable(name: string): Table {
    const entry = this.entries.get(name);
    if (!entry) throw new InvalidTableError(`${name} table not included in this dataset.`);
    if (entry.category === "mutation") {
      throw new InvalidParameterError(
        `${name} holds per-record mutation calls; use getSomaticMutation() instead.`,
      );
    }
    return cloneTable(entry.table);
  }

  /** Copy of the somatic mutation records, ordered by sample. */
  getSomaticMutation(): MutationRecord[] {
    const entry = this.entries.get(SOMATIC_MUTATION_TABLE);
    if (!entry || entry.category !== "mutation") {
      throw new InvalidTableError(`${SOMATIC_MUTATION_TABLE} table not included in this dataset.`);
    }
    return cloneRecords(entry.records);
  }

  /** Names, categories and shapes, case-insensitively ordered by name. */
  listTables(): TableListing[] {
    return [...this.entries.entries()]
      .map(([name, entry]): TableListing => ({
        name,
        category: entry.category,
        shape:
          entry.category === "mutation"
            ? { rows: entry.records.length, columns: 3 }
            : tableShape(entry.table),
      }))
      .sort((a, b) => compareIds(a.name.toLowerCase(), b.name.toLowerCase()));
  }

  /**
   * Each sample's Tumor/Normal status from the clinical table. Derived once
   * and shared; samples with any other value are left out.
   */
  getSampleStatusMap(): SampleStatusMap {
    if (this.statusMap) return this.statusMap;
    const clinical = this.getTable(CLINICAL_TABLE);
    const column = getColumnByName(clinical, SAMPLE_STATUS_SOURCE_COLUMN);
    if (!column) {
      throw new InvalidTableError(
        `${CLINICAL_TABLE} table has no ${SAMPLE_STATUS_SOURCE_COLUMN} column, so sample status is unknown.`,
      );
    }
    const map = new Map<string, SampleStatus>();
    clinical.index.forEach((id, i) => {
      const status = toStatus(column[i]);
      if (status) map.set(id, status);
    });
    this.statusMap = map;
    return map;
  }
}

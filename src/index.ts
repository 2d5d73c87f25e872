export * from "@/types/table";
export * from "@/lib/omics-constants";
export * from "@/lib/join-errors";
export * from "@/lib/join-warnings";
export * from "@/lib/table-ops";
export * from "@/lib/table-registry";
export * from "@/lib/column-selector";
export * from "@/lib/index-harmonizer";
export * from "@/lib/mutation-classes";
export * from "@/lib/mutation-prioritizer";
export * from "@/lib/mutation-aggregator";
export * from "@/lib/wildtype-imputer";
export * from "@/lib/join-engine";
export * from "@/lib/join-requests";
export * from "@/lib/multiindex-tools";
export * from "@/lib/sample-index-tools";
export * from "@/lib/table-view-model";
export { DataTable } from "@/components/data-table/DataTable";
export { useJoinedTable, type JoinedTableState } from "@/hooks/useJoinedTable";

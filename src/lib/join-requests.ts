/**
 * Serializable join requests, so a UI or a saved view can describe a join as
 * data and run it through one entry point.
 */

import type { ColumnKeys, PriorityFilter, TableResult } from "@/types/table";
import type { JoinEngine } from "@/lib/join-engine";

export type JoinRequest =
  | { kind: "omics_omics"; df1: string; df2: string; genes1?: ColumnKeys; genes2?: ColumnKeys }
  | { kind: "metadata_metadata"; df1: string; df2: string; cols1?: ColumnKeys; cols2?: ColumnKeys }
  | { kind: "metadata_omics"; metadata: string; omics: string; metadataCols?: ColumnKeys; omicsGenes?: ColumnKeys }
  | {
      kind: "omics_mutations";
      omics: string;
      mutationGenes: ColumnKeys;
      omicsGenes?: ColumnKeys;
      mutationsFilter?: PriorityFilter;
      showLocation?: boolean;
    }
  | {
      kind: "metadata_mutations";
      metadata: string;
      mutationGenes: ColumnKeys;
      metadataCols?: ColumnKeys;
      mutationsFilter?: PriorityFilter;
      showLocation?: boolean;
    };

export type JoinKind = JoinRequest["kind"];

export function runJoin(engine: JoinEngine, request: JoinRequest): TableResult {
  switch (request.kind) {
    case "omics_omics":
      return engine.joinOmicsToOmics(request.df1, request.df2, request.genes1, request.genes2);
    case "metadata_metadata":
      return engine.joinMetadataToMetadata(request.df1, request.df2, request.cols1, request.cols2);
    case "metadata_omics":
      return engine.joinMetadataToOmics(request.metadata, request.omics, request.metadataCols, request.omicsGenes);
    case "omics_mutations":
      return engine.joinOmicsToMutations(request.omics, request.mutationGenes, {
        omicsGenes: request.omicsGenes,
        mutationsFilter: request.mutationsFilter,
        showLocation: request.showLocation,
      });
    case "metadata_mutations":
      return engine.joinMetadataToMutations(request.metadata, request.mutationGenes, {
        metadataCols: request.metadataCols,
        mutationsFilter: request.mutationsFilter,
        showLocation: request.showLocation,
      });
  }
}

/** Stable cache key for a request, used to memoize joins in the UI. */
export function joinRequestKey(request: JoinRequest): string {
  return JSON.stringify(request, Object.keys(request).sort());
}

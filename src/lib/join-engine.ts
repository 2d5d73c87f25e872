/**
 * Join engine — the five joins between omics, metadata and mutation data.
 *
 * Every join selects from the registry (copies), harmonizes column levels,
 * outer-joins on the sample index and returns a new table sorted by index
 * together with the warnings the call produced.
 */

import type {
  ColumnKeys,
  JoinWarning,
  PriorityFilter,
  Table,
  TableCategory,
  TableResult,
} from "@/types/table";
import { SOMATIC_MUTATION_TABLE } from "@/lib/omics-constants";
import { ConfigurationError, InvalidParameterError } from "@/lib/join-errors";
import { insertedMissingRowWarnings } from "@/lib/join-warnings";
import {
  DEFAULT_SELECTION_CONFIG,
  normalizeKeys,
  selectMetadataColumns,
  selectOmicsColumns,
  type SelectionConfig,
} from "@/lib/column-selector";
import { harmonizeTables } from "@/lib/index-harmonizer";
import {
  DEFAULT_MUTATION_CLASSES,
  resolveMutationClasses,
  type MutationClassConfig,
} from "@/lib/mutation-classes";
import { MutationPrioritizer } from "@/lib/mutation-prioritizer";
import { aggregateMutations } from "@/lib/mutation-aggregator";
import { imputeWildtype } from "@/lib/wildtype-imputer";
import { outerJoin } from "@/lib/table-ops";
import type { TableRegistry } from "@/lib/table-registry";

export interface JoinEngineOptions {
  mutationClasses?: MutationClassConfig;
  validOmicsTables?: readonly string[];
  validMetadataTables?: readonly string[];
}

export interface MutationJoinOptions {
  mutationsFilter?: PriorityFilter;
  /** Keep `<gene>_Location` columns (filled with No_mutation). Default true. */
  showLocation?: boolean;
}

export interface OmicsMutationJoinOptions extends MutationJoinOptions {
  omicsGenes?: ColumnKeys;
}

export interface MetadataMutationJoinOptions extends MutationJoinOptions {
  metadataCols?: ColumnKeys;
}

export class JoinEngine {
  private readonly selection: SelectionConfig;
  private readonly prioritizer: MutationPrioritizer;

  constructor(
    private readonly registry: TableRegistry,
    options: JoinEngineOptions = {},
  ) {
    this.selection = {
      validOmicsTables: options.validOmicsTables ?? DEFAULT_SELECTION_CONFIG.validOmicsTables,
      validMetadataTables: options.validMetadataTables ?? DEFAULT_SELECTION_CONFIG.validMetadataTables,
    };
    this.prioritizer = new MutationPrioritizer(
      resolveMutationClasses(registry.getCancerType(), options.mutationClasses ?? DEFAULT_MUTATION_CLASSES),
    );
  }

  // ── Selection ──

  selectOmics(tableName: string, genes?: ColumnKeys): TableResult {
    return selectOmicsColumns(this.registry, tableName, genes, this.selection);
  }

  selectMetadata(tableName: string, cols?: ColumnKeys): TableResult {
    return selectMetadataColumns(this.registry, tableName, cols, this.selection);
  }

  /** Aggregated mutation columns for `genes`, before any join or imputation. */
  selectMutations(genes: ColumnKeys, filter?: PriorityFilter): TableResult {
    return aggregateMutations(this.registry.getSomaticMutation(), genes, this.prioritizer, { filter });
  }

  /** Category-dispatched selection. Mutation selection requires genes. */
  select(tableName: string, category: TableCategory, keys?: ColumnKeys, filter?: PriorityFilter): TableResult {
    switch (category) {
      case "omics":
        return this.selectOmics(tableName, keys);
      case "metadata":
        return this.selectMetadata(tableName, keys);
      case "mutation":
        if (tableName !== SOMATIC_MUTATION_TABLE) {
          throw new InvalidParameterError(`${tableName} is not a mutation table. Use ${SOMATIC_MUTATION_TABLE}.`);
        }
        if (normalizeKeys(keys, "Genes") === undefined) {
          throw new InvalidParameterError("Genes are required when selecting from the mutation table.");
        }
        return this.selectMutations(keys, filter);
      default:
        throw new ConfigurationError(`Unknown table category ${String(category)}.`);
    }
  }

  /** All phosphosites of the given gene(s). */
  getPhosphosites(genes: ColumnKeys): TableResult {
    return this.selectOmics("phosphoproteomics", genes);
  }

  // ── Omics / metadata joins ──

  joinOmicsToOmics(df1Name: string, df2Name: string, genes1?: ColumnKeys, genes2?: ColumnKeys): TableResult {
    const s1 = this.selectOmics(df1Name, genes1);
    const s2 = this.selectOmics(df2Name, genes2);
    const [a, b] = harmonizeTables(s1.table, s2.table);
    const table = outerJoin(a, b, { name: `${df1Name}+${df2Name}` });
    return {
      table,
      warnings: [
        ...s1.warnings,
        ...s2.warnings,
        ...insertedMissingRowWarnings(df1Name, df2Name, a.index, b.index),
      ],
    };
  }

  joinMetadataToMetadata(df1Name: string, df2Name: string, cols1?: ColumnKeys, cols2?: ColumnKeys): TableResult {
    const s1 = this.selectMetadata(df1Name, cols1);
    const s2 = this.selectMetadata(df2Name, cols2);
    const [a, b] = harmonizeTables(s1.table, s2.table);
    // Shared columns such as Patient_ID stay distinguishable.
    const table = outerJoin(a, b, { rsuffix: `_from_${df2Name}`, name: `${df1Name}+${df2Name}` });
    return {
      table,
      warnings: insertedMissingRowWarnings(df1Name, df2Name, a.index, b.index),
    };
  }

  joinMetadataToOmics(
    metadataName: string,
    omicsName: string,
    metadataCols?: ColumnKeys,
    omicsGenes?: ColumnKeys,
  ): TableResult {
    const meta = this.selectMetadata(metadataName, metadataCols);
    const omics = this.selectOmics(omicsName, omicsGenes);
    const [a, b] = harmonizeTables(meta.table, omics.table);
    const table = outerJoin(a, b, { name: `${metadataName}+${omicsName}` });
    return {
      table,
      warnings: [
        ...omics.warnings,
        ...insertedMissingRowWarnings(metadataName, omicsName, a.index, b.index),
      ],
    };
  }

  // ── Mutation joins ──

  joinOmicsToMutations(
    omicsName: string,
    mutationGenes: ColumnKeys,
    options: OmicsMutationJoinOptions = {},
  ): TableResult {
    const omics = this.selectOmics(omicsName, options.omicsGenes);
    return this.joinOtherToMutations(omicsName, omics, mutationGenes, options);
  }

  joinMetadataToMutations(
    metadataName: string,
    mutationGenes: ColumnKeys,
    options: MetadataMutationJoinOptions = {},
  ): TableResult {
    const metadata = this.selectMetadata(metadataName, options.metadataCols);
    return this.joinOtherToMutations(metadataName, metadata, mutationGenes, options);
  }

  private joinOtherToMutations(
    otherName: string,
    other: TableResult,
    mutationGenes: ColumnKeys,
    options: MutationJoinOptions,
  ): TableResult {
    const mutations = this.selectMutations(mutationGenes, options.mutationsFilter);
    const [a, b] = harmonizeTables(other.table, mutations.table);
    const joined: Table = outerJoin(a, b, { name: `${otherName}+${SOMATIC_MUTATION_TABLE}` });

    const imputed = imputeWildtype(joined, this.registry.getSampleStatusMap(), {
      filtered: options.mutationsFilter != null,
      showLocation: options.showLocation ?? true,
    });

    const warnings: JoinWarning[] = [
      ...other.warnings,
      ...mutations.warnings,
      ...imputed.warnings,
      ...insertedMissingRowWarnings(otherName, SOMATIC_MUTATION_TABLE, a.index, b.index),
    ];
    return { table: imputed.table, warnings };
  }
}

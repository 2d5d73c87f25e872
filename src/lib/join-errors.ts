/**
 * Error taxonomy for the selection and join engines.
 *
 * Validation failures abort the whole call; no partial result is returned.
 * Recoverable gaps (missing omics columns, rows inserted by an outer join)
 * are reported as warnings instead, see join-warnings.ts.
 */

export type OmicsJoinErrorCode =
  | "INVALID_TABLE"
  | "INVALID_COLUMN"
  | "INVALID_GENE"
  | "INVALID_PARAMETER"
  | "CONFIGURATION";

export class OmicsJoinError extends Error {
  public readonly code: OmicsJoinErrorCode;

  constructor(message: string, code: OmicsJoinErrorCode) {
    super(message);
    this.name = "OmicsJoinError";
    this.code = code;
  }
}

/** Unknown table, or a table used under the wrong category. */
export class InvalidTableError extends OmicsJoinError {
  constructor(message: string) {
    super(message, "INVALID_TABLE");
    this.name = "InvalidTableError";
  }
}

/** Metadata lookup miss. Metadata selection is strict. */
export class InvalidColumnError extends OmicsJoinError {
  public readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message, "INVALID_COLUMN");
    this.name = "InvalidColumnError";
    this.missing = missing;
  }
}

/** A requested gene has no records anywhere in the mutation table. */
export class InvalidGeneError extends OmicsJoinError {
  public readonly gene: string;

  constructor(gene: string) {
    super(`${gene} gene not found in somatic_mutation data.`, "INVALID_GENE");
    this.name = "InvalidGeneError";
    this.gene = gene;
  }
}

/** Malformed keys, genes or filter argument. */
export class InvalidParameterError extends OmicsJoinError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

/** Internal category/config inconsistency. Programmer-facing. */
export class ConfigurationError extends OmicsJoinError {
  constructor(message: string) {
    super(message, "CONFIGURATION");
    this.name = "ConfigurationError";
  }
}

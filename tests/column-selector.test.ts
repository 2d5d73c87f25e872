import { describe, test, expect } from "vitest";
import { normalizeKeys, selectMetadataColumns, selectOmicsColumns } from "@/lib/column-selector";
import { InvalidColumnError, InvalidParameterError, InvalidTableError } from "@/lib/join-errors";
import { makeRegistry } from "./fixtures/dataset";

describe("normalizeKeys", () => {
  test("accepts a label, a list or nothing", () => {
    expect(normalizeKeys("TP53")).toEqual(["TP53"]);
    expect(normalizeKeys(["TP53", "KRAS", "TP53"])).toEqual(["TP53", "KRAS"]);
    expect(normalizeKeys(undefined)).toBeUndefined();
  });

  test("rejects other types", () => {
    expect(() => normalizeKeys(5)).toThrow(InvalidParameterError);
    expect(() => normalizeKeys(["TP53", 7])).toThrow(InvalidParameterError);
  });
});

// ─── Omics ────────────────────────────────────────────────

describe("selectOmicsColumns", () => {
  test("whole table gets the table-name suffix", () => {
    const { table, warnings } = selectOmicsColumns(makeRegistry(), "proteomics", undefined);
    expect(table.columns.keys).toEqual([["TP53_proteomics"], ["KRAS_proteomics"]]);
    expect(warnings).toEqual([]);
  });

  test("whole-table selection is deterministic", () => {
    const registry = makeRegistry();
    expect(selectOmicsColumns(registry, "phosphoproteomics", undefined)).toEqual(
      selectOmicsColumns(registry, "phosphoproteomics", undefined),
    );
  });

  test("unknown genes become one all-missing column each", () => {
    const { table, warnings } = selectOmicsColumns(makeRegistry(), "proteomics", ["TP53", "MADEUP"]);
    expect(table.columns.keys).toEqual([["TP53_proteomics"], ["MADEUP_proteomics"]]);
    expect(table.values).toEqual([
      [1.5, -0.2, 0.3],
      [null, null, null],
    ]);
    expect(warnings).toEqual([
      {
        kind: "missing_columns",
        message:
          "The following columns were not found in the proteomics table, so they were inserted " +
          "into the joined table, but filled with missing values: MADEUP",
      },
    ]);
  });

  test("a gene selects every matching column of a multi-level table", () => {
    const { table } = selectOmicsColumns(makeRegistry(), "phosphoproteomics", ["TP53", "MADEUP"]);
    expect(table.columns.keys).toEqual([
      ["TP53_phosphoproteomics", "S15", "NP_1"],
      ["TP53_phosphoproteomics", "S20", "NP_1"],
      ["MADEUP_phosphoproteomics", null, null],
    ]);
  });

  test("repeated genes are selected once", () => {
    const { table } = selectOmicsColumns(makeRegistry(), "proteomics", ["KRAS", "KRAS"]);
    expect(table.columns.keys).toEqual([["KRAS_proteomics"]]);
  });

  test("a table outside the dataset", () => {
    expect(() => selectOmicsColumns(makeRegistry(), "CNV", "TP53")).toThrow(
      "CNV table not included in this dataset.",
    );
  });

  test("a metadata table used as omics lists the valid options", () => {
    expect(() => selectOmicsColumns(makeRegistry(), "clinical", "TP53")).toThrow(
      new InvalidTableError(
        "clinical is not a valid omics table for this function in this dataset. Valid options:" +
          "\n\tphosphoproteomics\n\tproteomics",
      ),
    );
  });
});

// ─── Metadata ─────────────────────────────────────────────

describe("selectMetadataColumns", () => {
  test("whole table is returned without a suffix", () => {
    const { table } = selectMetadataColumns(makeRegistry(), "clinical", undefined);
    expect(table.columns.keys).toEqual([["Sample_Tumor_Normal"], ["Age"]]);
  });

  test("columns come back in request order", () => {
    const { table } = selectMetadataColumns(makeRegistry(), "clinical", ["Age", "Sample_Tumor_Normal"]);
    expect(table.columns.keys).toEqual([["Age"], ["Sample_Tumor_Normal"]]);
    expect(table.values[0]).toEqual([60, 55, 70, 48]);
  });

  test("unknown columns are an error naming all of them", () => {
    let caught: unknown;
    try {
      selectMetadataColumns(makeRegistry(), "clinical", ["Age", "Stage", "Grade"]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidColumnError);
    if (caught instanceof InvalidColumnError) {
      expect(caught.missing).toEqual(["Stage", "Grade"]);
      expect(caught.message).toBe("The following columns were not found in the clinical table: Stage, Grade");
      expect(caught.code).toBe("INVALID_COLUMN");
    }
  });

  test("a registered table that is not a valid metadata table", () => {
    expect(() => selectMetadataColumns(makeRegistry(), "treatment", undefined)).toThrow(
      "treatment is not a valid metadata table for this function in this dataset. Valid options:" +
        "\n\tclinical\n\tderived_molecular",
    );
  });
});

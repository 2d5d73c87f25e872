import { describe, test, expect } from "vitest";
import { JoinEngine, joinRequestKey, runJoin, type JoinRequest } from "@/index";
import { makeRegistry } from "./fixtures/dataset";

const engine = new JoinEngine(makeRegistry());

describe("runJoin", () => {
  test("omics_omics", () => {
    const request: JoinRequest = { kind: "omics_omics", df1: "proteomics", df2: "phosphoproteomics", genes2: "KRAS" };
    expect(runJoin(engine, request)).toEqual(
      engine.joinOmicsToOmics("proteomics", "phosphoproteomics", undefined, "KRAS"),
    );
  });

  test("metadata_metadata", () => {
    const request: JoinRequest = { kind: "metadata_metadata", df1: "clinical", df2: "derived_molecular", cols2: "MSI" };
    expect(runJoin(engine, request)).toEqual(
      engine.joinMetadataToMetadata("clinical", "derived_molecular", undefined, "MSI"),
    );
  });

  test("metadata_omics", () => {
    const request: JoinRequest = { kind: "metadata_omics", metadata: "clinical", omics: "proteomics", omicsGenes: "TP53" };
    expect(runJoin(engine, request)).toEqual(engine.joinMetadataToOmics("clinical", "proteomics", undefined, "TP53"));
  });

  test("omics_mutations passes options through", () => {
    const request: JoinRequest = {
      kind: "omics_mutations",
      omics: "proteomics",
      mutationGenes: "TP53",
      mutationsFilter: [],
      showLocation: false,
    };
    expect(runJoin(engine, request)).toEqual(
      engine.joinOmicsToMutations("proteomics", "TP53", { mutationsFilter: [], showLocation: false }),
    );
  });

  test("metadata_mutations", () => {
    const request: JoinRequest = {
      kind: "metadata_mutations",
      metadata: "clinical",
      mutationGenes: ["KRAS"],
      metadataCols: "Age",
    };
    expect(runJoin(engine, request)).toEqual(
      engine.joinMetadataToMutations("clinical", ["KRAS"], { metadataCols: "Age" }),
    );
  });
});

describe("joinRequestKey", () => {
  test("does not depend on property order", () => {
    const a: JoinRequest = { kind: "omics_omics", df1: "proteomics", df2: "phosphoproteomics" };
    const b: JoinRequest = { df2: "phosphoproteomics", df1: "proteomics", kind: "omics_omics" };
    expect(joinRequestKey(a)).toBe(joinRequestKey(b));
  });

  test("differs when the request differs", () => {
    const a: JoinRequest = { kind: "omics_mutations", omics: "proteomics", mutationGenes: "TP53" };
    const b: JoinRequest = { kind: "omics_mutations", omics: "proteomics", mutationGenes: "KRAS" };
    expect(joinRequestKey(a)).not.toBe(joinRequestKey(b));
  });
});

import { describe, test, expect } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import { DataTable } from "@/components/data-table/DataTable";
import { useJoinedTable } from "@/hooks/useJoinedTable";
import { JoinEngine } from "@/lib/join-engine";
import type { JoinRequest } from "@/lib/join-requests";
import { fromColumns } from "@/lib/table-ops";
import { makeProteomics, makeRegistry } from "./fixtures/dataset";

describe("DataTable", () => {
  test("renders the header bar, column headers and cells", () => {
    const html = renderToStaticMarkup(<DataTable table={makeProteomics()} />);
    expect(html).toContain("proteomics · 3 rows · 2 columns");
    expect(html).toContain("<div>Patient_ID</div>");
    expect(html).toContain("<div>TP53</div>");
    expect(html).toContain(">1.5</td>");
    expect(html).toContain(">S003</td>");
  });

  test("shows missing cells as a dash and list cells in brackets", () => {
    const table = fromColumns("t", ["S001", "S002"], { G_Mutation: [["stopgain", "Silent"], null] });
    const html = renderToStaticMarkup(<DataTable table={table} />);
    expect(html).toContain(">[stopgain, Silent]</td>");
    expect(html).toContain('<span class="text-muted-foreground">--</span>');
  });

  test("lists warnings with their kind", () => {
    const html = renderToStaticMarkup(
      <DataTable table={makeProteomics()} warnings={[{ kind: "missing_columns", message: "MADEUP was not found" }]} />,
    );
    expect(html).toContain('data-kind="missing_columns"');
    expect(html).toContain("<span>MADEUP was not found</span>");
  });

  test("empty table", () => {
    const html = renderToStaticMarkup(<DataTable table={fromColumns("t", [], { X: [] })} />);
    expect(html).toContain("No data.");
  });
});

// ─── useJoinedTable ───────────────────────────────────────

const engine = new JoinEngine(makeRegistry());

function Probe({ request }: { request: JoinRequest | null }) {
  const state = useJoinedTable(engine, request);
  if (state.status === "success") return <span>{`${state.table.name}:${state.warnings.length}`}</span>;
  if (state.status === "error") return <span>{state.error.code}</span>;
  return <span>idle</span>;
}

describe("useJoinedTable", () => {
  test("idle without a request", () => {
    expect(renderToStaticMarkup(<Probe request={null} />)).toBe("<span>idle</span>");
  });

  test("runs the join", () => {
    const request: JoinRequest = { kind: "omics_omics", df1: "proteomics", df2: "phosphoproteomics", genes2: "KRAS" };
    expect(renderToStaticMarkup(<Probe request={request} />)).toBe("<span>proteomics+phosphoproteomics:2</span>");
  });

  test("validation errors become an error state", () => {
    const request: JoinRequest = { kind: "omics_omics", df1: "CNV", df2: "proteomics" };
    expect(renderToStaticMarkup(<Probe request={request} />)).toBe("<span>INVALID_TABLE</span>");
  });
});

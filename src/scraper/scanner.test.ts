import { describe, expect, it } from "vitest";
import { scanTable, transition, type ScanEvent, type ScanState } from "./scanner";

const open = (name: string, attribs: Record<string, string> = {}): ScanEvent => ({ type: "open", name, attribs });
const close = (name: string): ScanEvent => ({ type: "close", name });

describe("transition", () => {
  it("enters only the table with the target id", () => {
    const outside: ScanState = { kind: "outside" };
    expect(transition(outside, open("table", { id: "other" }), "stats").state).toEqual(outside);
    expect(transition(outside, open("table", { id: "stats" }), "stats").state).toEqual({
      kind: "table",
      section: "none",
    });
  });

  it("excludes a header-repeat row in the body", () => {
    const body: ScanState = { kind: "table", section: "body" };
    const next = transition(body, open("tr", { class: "thead" }), "stats").state;
    expect(next).toEqual({ kind: "row", section: "body", excluded: true, cells: [] });
  });

  it("keeps a header-repeat row in the header section", () => {
    const header: ScanState = { kind: "table", section: "header" };
    const next = transition(header, open("tr", { class: "over_header thead" }), "stats").state;
    expect(next).toEqual({ kind: "row", section: "header", excluded: false, cells: [] });
  });

  it("does not capture cells of an excluded row", () => {
    const row: ScanState = { kind: "row", section: "body", excluded: true, cells: [] };
    expect(transition(row, open("td"), "stats").state).toBe(row);
    expect(transition(row, close("tr"), "stats")).toEqual({ state: { kind: "table", section: "body" } });
  });

  it("turns a line break into a single space", () => {
    const cell: ScanState = { kind: "cell", section: "body", cells: [], text: ["A"] };
    expect(transition(cell, open("br"), "stats").state).toEqual({ ...cell, text: ["A", " "] });
  });

  it("emits a finished row with its section", () => {
    const cell: ScanState = { kind: "cell", section: "body", cells: ["x"], text: ["  12 "] };
    const afterCell = transition(cell, close("td"), "stats").state;
    expect(afterCell).toEqual({ kind: "row", section: "body", excluded: false, cells: ["x", "12"] });
    expect(transition(afterCell, close("tr"), "stats").emit).toEqual({ section: "body", cells: ["x", "12"] });
  });

  it("ignores everything once the table is closed", () => {
    const closed: ScanState = { kind: "closed" };
    expect(transition(closed, open("table", { id: "stats" }), "stats").state).toBe(closed);
  });
});

describe("scanTable", () => {
  it("keeps the last header row and drops body header repeats", () => {
    const html = `
      <table id="stats">
        <thead>
          <tr class="over_header thead"><th>Group</th></tr>
          <tr class="thead"><th>Name</th><th>Pts</th></tr>
        </thead>
        <tbody>
          <tr><td>A</td><td>10</td></tr>
          <tr class="thead"><th>Name</th><th>Pts</th></tr>
          <tr><td>B</td><td>20</td></tr>
        </tbody>
      </table>`;

    expect(scanTable(html, "stats")).toEqual({
      headers: ["Name", "Pts"],
      rows: [
        ["A", "10"],
        ["B", "20"],
      ],
    });
  });

  it("separates fragments split by a line break", () => {
    const html = `<table id="t"><thead><tr><th>Line</th></tr></thead><tbody><tr><td>A<br>B</td></tr></tbody></table>`;
    expect(scanTable(html, "t").rows).toEqual([["A B"]]);
  });

  it("ignores other tables and later tables with the same id", () => {
    const html = `
      <table id="other"><thead><tr><th>X</th></tr></thead><tbody><tr><td>1</td></tr></tbody></table>
      <table id="t"><thead><tr><th>Y</th></tr></thead><tbody><tr><td>2</td></tr></tbody></table>
      <table id="t"><thead><tr><th>Z</th></tr></thead><tbody><tr><td>3</td></tr></tbody></table>`;
    expect(scanTable(html, "t")).toEqual({ headers: ["Y"], rows: [["2"]] });
  });

  it("decodes entities in cell text", () => {
    const html = `<table id="t"><thead><tr><th>Tm</th></tr></thead><tbody><tr><td>A&amp;M</td></tr></tbody></table>`;
    expect(scanTable(html, "t").rows).toEqual([["A&M"]]);
  });

  it("returns nothing when the id never appears", () => {
    expect(scanTable("<p>nothing</p>", "t")).toEqual({ headers: [], rows: [] });
  });
});

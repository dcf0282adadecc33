import { Parser } from "htmlparser2";

/**
 * Finite-state scan of one target table.
 *
 * Rows are classified by the section they sit in: `<thead>` rows become the
 * header (last one wins), `<tbody>` rows become data. The site repeats the
 * header inside long bodies as `<tr class="thead">`; those rows are dropped,
 * but only in the body, since real header rows carry the same class.
 */

export type Section = "none" | "header" | "body";

export type ScanState =
  | { kind: "outside" }
  | { kind: "table"; section: Section }
  | { kind: "row"; section: Section; excluded: boolean; cells: string[] }
  | { kind: "cell"; section: Section; cells: string[]; text: string[] }
  | { kind: "closed" };

export type ScanEvent =
  | { type: "open"; name: string; attribs: Record<string, string> }
  | { type: "close"; name: string }
  | { type: "text"; data: string };

export interface EmittedRow {
  section: Section;
  cells: string[];
}

export interface Transition {
  state: ScanState;
  emit?: EmittedRow;
}

export interface ScanResult {
  headers: string[];
  rows: string[][];
}

export const HEADER_REPEAT_CLASS = "thead";

const CELL_TAGS = new Set(["th", "td"]);

export const INITIAL_STATE: ScanState = { kind: "outside" };

function hasClass(attribs: Record<string, string>, className: string): boolean {
  return (attribs.class ?? "").split(/\s+/).includes(className);
}

function finishCell(state: Extract<ScanState, { kind: "cell" }>): string[] {
  return [...state.cells, state.text.join("").trim()];
}

function sectionOnOpen(section: Section, name: string): Section {
  if (name === "thead") return "header";
  if (name === "tbody") return "body";
  return section;
}

function sectionOnClose(section: Section, name: string): Section {
  if (name === "thead" && section === "header") return "none";
  if (name === "tbody" && section === "body") return "none";
  return section;
}

function closeRow(section: Section, excluded: boolean, cells: string[]): Transition {
  const state: ScanState = { kind: "table", section };
  if (excluded || cells.length === 0) return { state };
  return { state, emit: { section, cells } };
}

export function transition(state: ScanState, event: ScanEvent, tableId: string): Transition {
  switch (state.kind) {
    case "closed":
      return { state };

    case "outside":
      if (event.type === "open" && event.name === "table" && event.attribs.id === tableId) {
        return { state: { kind: "table", section: "none" } };
      }
      return { state };

    case "table":
      if (event.type === "open") {
        if (event.name === "tr") {
          return {
            state: {
              kind: "row",
              section: state.section,
              excluded: state.section === "body" && hasClass(event.attribs, HEADER_REPEAT_CLASS),
              cells: [],
            },
          };
        }
        return { state: { ...state, section: sectionOnOpen(state.section, event.name) } };
      }
      if (event.type === "close") {
        if (event.name === "table") return { state: { kind: "closed" } };
        return { state: { ...state, section: sectionOnClose(state.section, event.name) } };
      }
      return { state };

    case "row":
      if (event.type === "open") {
        if (CELL_TAGS.has(event.name)) {
          if (state.excluded) return { state };
          return { state: { kind: "cell", section: state.section, cells: state.cells, text: [] } };
        }
        if (event.name === "tr") {
          // An unterminated row is abandoned
          return transition({ kind: "table", section: state.section }, event, tableId);
        }
        return { state: { ...state, section: sectionOnOpen(state.section, event.name) } };
      }
      if (event.type === "close") {
        if (event.name === "table") return { state: { kind: "closed" } };
        if (event.name === "tr") return closeRow(state.section, state.excluded, state.cells);
        return { state: { ...state, section: sectionOnClose(state.section, event.name) } };
      }
      return { state };

    case "cell":
      if (event.type === "text") {
        return { state: { ...state, text: [...state.text, event.data] } };
      }
      if (event.type === "open") {
        if (event.name === "br") return { state: { ...state, text: [...state.text, " "] } };
        if (CELL_TAGS.has(event.name)) {
          return { state: { ...state, cells: finishCell(state), text: [] } };
        }
        if (event.name === "tr") {
          return transition({ kind: "table", section: state.section }, event, tableId);
        }
        return { state: { ...state, section: sectionOnOpen(state.section, event.name) } };
      }
      if (event.name === "table") return { state: { kind: "closed" } };
      if (CELL_TAGS.has(event.name)) {
        return {
          state: { kind: "row", section: state.section, excluded: false, cells: finishCell(state) },
        };
      }
      if (event.name === "tr") return closeRow(state.section, false, finishCell(state));
      return { state: { ...state, section: sectionOnClose(state.section, event.name) } };
  }
}

/**
 * Streams `html` through htmlparser2 and folds the tag events through
 * {@link transition}. Only the first table whose id equals `tableId` is read.
 */
export function scanTable(html: string, tableId: string): ScanResult {
  let state = INITIAL_STATE;
  let headers: string[] = [];
  const rows: string[][] = [];

  const apply = (event: ScanEvent) => {
    if (state.kind === "closed") return;
    const next = transition(state, event, tableId);
    state = next.state;
    if (next.emit?.section === "header") {
      headers = next.emit.cells;
    } else if (next.emit?.section === "body") {
      rows.push(next.emit.cells);
    }
  };

  const parser = new Parser(
    {
      onopentag: (name, attribs) => apply({ type: "open", name, attribs }),
      onclosetag: (name) => apply({ type: "close", name }),
      ontext: (data) => apply({ type: "text", data }),
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );
  parser.write(html);
  parser.end();

  return { headers, rows };
}

import { EmptyTableError, TableNotFoundError } from "../errors";
import type { RecordSet, StatRecord, Table } from "../types";
import { logger } from "../utils/logger";
import { scanTable, type ScanResult } from "./scanner";

/**
 * The site ships many tables inside `<!-- ... -->` blocks. Each delimiter is
 * replaced by a space rather than removed, so `id="a"<!--class="b"` cannot
 * collapse into one attribute token.
 */
export function stripCommentDelimiters(html: string): string {
  return html.replace(/<!--/g, " ").replace(/-->/g, " ");
}

function sliceTableMarkup(html: string, tableId: string): string | null {
  const idIndex = html.indexOf(`id="${tableId}"`);
  if (idIndex === -1) return null;

  const start = html.lastIndexOf("<table", idIndex);
  const end = html.indexOf("</table>", idIndex);
  if (start === -1 || end === -1) return null;

  return html.slice(start, end + "</table>".length);
}

export function extractTable(html: string, tableId: string): Table {
  const document = stripCommentDelimiters(html);
  let scan: ScanResult = scanTable(document, tableId);

  if (!scan.headers.length) {
    const snippet = sliceTableMarkup(document, tableId);
    if (snippet !== null) {
      logger.debug(`Table '${tableId}' not reached by the full scan, rescanning its markup slice`);
      scan = scanTable(snippet, tableId);
    }
  }
  if (!scan.headers.length) {
    throw new TableNotFoundError(tableId);
  }

  const width = scan.headers.length;
  const rows = scan.rows.filter((row) => row.length === width);
  if (!rows.length) {
    throw new EmptyTableError(tableId);
  }

  return { headers: scan.headers, rows };
}

export function toRecordSet(headers: string[], rows: string[][]): RecordSet {
  const records = rows.map((row) => {
    const record: StatRecord = {};
    headers.forEach((header, index) => {
      record[header] = row[index];
    });
    return record;
  });

  return { columns: [...new Set(headers)], records };
}

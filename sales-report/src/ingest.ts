import { parseRow } from "./parser";
import type { RawRow, Rejection, Sale } from "./sales";

export type IngestResult = { sales: Sale[]; rejections: Rejection[] };

// a bad row never stops the rest; order of both lists follows the input
export function ingest(rows: readonly RawRow[]): IngestResult {
  const sales: Sale[] = [];
  const rejections: Rejection[] = [];
  for (const row of rows) {
    parseRow(row).match(
      sale => { sales.push(sale); },
      rejection => { rejections.push(rejection); }
    );
  }
  return { sales, rejections };
}

import fs from "fs";
import path from "path";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { REQUIRED_COLUMNS } from "./sales";
import type { RawRow } from "./sales";

export type SourceErrorKind = "not_found" | "unreadable" | "missing_columns";

/** The whole input is unusable; no row of it gets analysed. */
export class SourceError extends Error {
  constructor(public readonly kind: SourceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceError";
  }
}

export type ReadOptions = { delimiter?: string };

function stripBom(text: string) {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** Split delimited text into cells; handles quoted fields, `""` escapes and CRLF. */
export function splitRecords(text: string, delimiter = ","): string[][] {
  const records: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === '"') {
      inQuotes = true;
    } else if (c === delimiter) {
      current.push(field);
      field = "";
    } else if (c === "\n") {
      current.push(field);
      records.push(current);
      current = [];
      field = "";
    } else if (c !== "\r") {
      field += c;
    }
  }
  current.push(field);
  records.push(current);
  return records;
}

// only a physically empty line; `,,` is a row with empty cells
const isEmptyLine = (cells: string[]) => cells.length === 1 && cells[0] === "";

/** Build keyed rows from delimited text, or fail if the header lacks a required column. */
export function toRawRows(text: string, delimiter = ","): Result<RawRow[], SourceError> {
  const records = splitRecords(stripBom(text), delimiter);
  const headers = (records[0] ?? []).map(h => h.trim());
  const absent = REQUIRED_COLUMNS.filter(c => !headers.includes(c));
  if (absent.length) {
    return err(new SourceError("missing_columns", `CSV must contain columns: ${REQUIRED_COLUMNS.join(", ")}`));
  }

  const rows: RawRow[] = [];
  for (const cells of records.slice(1)) {
    if (isEmptyLine(cells)) continue;
    const fields: Record<string, string | undefined> = {};
    headers.forEach((h, idx) => {
      // short line: leave the trailing columns absent
      if (idx < cells.length) fields[h] = cells[idx];
    });
    rows.push({ index: rows.length + 1, fields });
  }
  return ok(rows);
}

export function readRows(file: string, opts: ReadOptions = {}): Result<RawRow[], SourceError> {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    return err(new SourceError("not_found", `CSV file not found: ${file}`));
  }
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(new SourceError("unreadable", `Cannot read CSV file ${file}: ${reason}`, { cause: e }));
  }
  return toRawRows(text, opts.delimiter);
}

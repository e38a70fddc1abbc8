import type { Result } from "neverthrow";
import { aggregate, DEFAULT_TOP_N } from "./aggregate";
import { readRows } from "./csv";
import type { SourceError } from "./csv";
import { ingest } from "./ingest";
import type { AnalysisReport, RawRow, Rejection, Sale } from "./sales";

export type PipelineOptions = { topN?: number; delimiter?: string };

export type PipelineOutcome = {
  rowCount: number;
  sales: Sale[];
  rejections: Rejection[];
  report: AnalysisReport;
};

export function analyzeRows(rows: readonly RawRow[], topN = DEFAULT_TOP_N): PipelineOutcome {
  // 1) validate every row, keep the good ones
  const { sales, rejections } = ingest(rows);
  // 2) totals + ranking over valid sales only
  const report = aggregate(sales, topN);
  return { rowCount: rows.length, sales, rejections, report };
}

/** err: the file as a whole is unusable. ok: analysed, with zero or more rejections. */
export function runPipeline(file: string, opts: PipelineOptions = {}): Result<PipelineOutcome, SourceError> {
  return readRows(file, { delimiter: opts.delimiter }).map(rows => analyzeRows(rows, opts.topN));
}

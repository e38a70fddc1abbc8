import { loadConfig } from "./config";
import type { Config } from "./config";
import { runPipeline } from "./pipeline";
import { formatRejection, formatReport } from "./report";

/** Runs one analysis and returns the process exit code. */
export function main(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  let cfg: Config;
  try {
    cfg = loadConfig(env);
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const csvPath = argv[0] ?? cfg.csvPath;
  console.log(`Reading sales data from ${csvPath}...`);

  const result = runPipeline(csvPath, { topN: cfg.topN, delimiter: cfg.delimiter });
  if (result.isErr()) {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }

  const { rowCount, rejections, report } = result.value;
  if (rowCount === 0) {
    console.warn("Warning: No sales records found in CSV file.");
    return 0;
  }
  console.log(`Successfully loaded ${rowCount} sales records.\n`);

  for (const r of rejections) console.warn(`Warning: ${formatRejection(r)}`);
  for (const line of formatReport(report)) console.log(line);

  if (rejections.length) {
    console.log(`[sales-report] done: ${report.saleCount} sales, ${rejections.length} rows skipped`);
  }
  return 0;
}

import "dotenv/config";

export type Config = {
  csvPath: string;
  topN: number;
  delimiter: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cfg: Config = {
    csvPath: env.SALES_CSV_PATH || "sales.csv",
    topN: Number(env.TOP_N || "5"),
    // "\t" in .env means tab
    delimiter: env.CSV_DELIMITER === "\\t" ? "\t" : env.CSV_DELIMITER || ","
  };

  if (!Number.isInteger(cfg.topN) || cfg.topN < 1) {
    throw new Error(`TOP_N must be a positive integer, got "${env.TOP_N}"`);
  }
  if (cfg.delimiter.length !== 1 || cfg.delimiter === '"') {
    throw new Error(`CSV_DELIMITER must be a single character other than '"', got "${cfg.delimiter}"`);
  }
  return cfg;
}

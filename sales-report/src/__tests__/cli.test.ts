import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { main } from "../cli";

describe("main", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sales-report-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, lines: string[]) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, lines.join("\n"));
    return file;
  };

  it("prints the report and warns about skipped rows", () => {
    const file = write("sales.csv", [
      "product_name,quantity,unit_price",
      "Laptop,5,999.99",
      "Mouse,-1,10.00",
      ",2,5.00"
    ]);

    expect(main([file], {})).toBe(0);
    expect(console.log).toHaveBeenCalledWith(`Reading sales data from ${file}...`);
    expect(console.log).toHaveBeenCalledWith("Successfully loaded 3 sales records.\n");
    expect(console.log).toHaveBeenCalledWith("Total Revenue: $4,999.95");
    expect(console.log).toHaveBeenCalledWith("[sales-report] done: 1 sales, 2 rows skipped");
    expect(console.warn).toHaveBeenCalledWith("Warning: Skipping row 2 - quantity must be positive, got -1");
    expect(console.warn).toHaveBeenCalledWith("Warning: Skipping row 3 - missing product name");
    expect(console.error).not.toHaveBeenCalled();
  });

  it("takes the path from SALES_CSV_PATH when no argument is given", () => {
    const file = write("env.csv", ["product_name,quantity,unit_price", "Pen,1,2"]);
    expect(main([], { SALES_CSV_PATH: file })).toBe(0);
    expect(console.log).toHaveBeenCalledWith(`Reading sales data from ${file}...`);
  });

  it("warns and exits cleanly when there are no data rows", () => {
    const file = write("empty.csv", ["product_name,quantity,unit_price"]);
    expect(main([file], {})).toBe(0);
    expect(console.warn).toHaveBeenCalledWith("Warning: No sales records found in CSV file.");
    expect(console.log).not.toHaveBeenCalledWith("SALES ANALYSIS REPORT");
  });

  it("fails with exit code 1 for a missing file", () => {
    const file = path.join(dir, "missing.csv");
    expect(main([file], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`Error: CSV file not found: ${file}`);
  });

  it("fails with exit code 1 for missing headers", () => {
    const file = write("bad.csv", ["product,quantity,price", "Pen,1,2"]);
    expect(main([file], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error: CSV must contain columns: product_name, quantity, unit_price");
  });

  it("fails with exit code 1 for bad configuration", () => {
    expect(main([], { TOP_N: "x" })).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: TOP_N must be a positive integer, got "x"');
  });
});

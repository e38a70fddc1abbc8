import { toCents } from "./amount";
import type { Amount } from "./amount";
import type { AnalysisReport, Rejection } from "./sales";

const RULE = "=".repeat(60);

/** `$1,234.56`; negative amounts as `-$1.50`. */
export function formatCurrency(amount: Amount): string {
  const rounded = toCents(amount);
  const [whole, cents] = rounded.abs().toFixed(2).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  const sign = rounded.isNeg() && !rounded.isZero() ? "-" : "";
  return `${sign}$${grouped}.${cents}`;
}

export function formatRejection(r: Rejection): string {
  return `Skipping row ${r.row} - ${r.reason}`;
}

export function formatReport(report: AnalysisReport): string[] {
  const lines = [
    "",
    RULE,
    "SALES ANALYSIS REPORT",
    RULE,
    "",
    `Total Revenue: ${formatCurrency(report.totalRevenue)}`,
    `Average Order Value: ${formatCurrency(report.averageOrderValue)}`,
    "",
    `Top ${report.topProducts.length} Products by Revenue:`,
    "-".repeat(60)
  ];

  if (report.topProducts.length === 0) {
    lines.push("No valid product data found.");
  } else {
    report.topProducts.forEach((p, i) => {
      lines.push(`${i + 1}. ${p.productName.padEnd(40)} ${formatCurrency(p.revenue).padStart(15)}`);
    });
  }

  lines.push(RULE, "");
  return lines;
}

import { Amount, ZERO, divideToCents } from "./amount";
import type { AnalysisReport, ProductRevenue, Sale } from "./sales";

export const DEFAULT_TOP_N = 5;

function byRevenueThenName(a: ProductRevenue, b: ProductRevenue) {
  const diff = b.revenue.comparedTo(a.revenue);
  if (diff !== 0) return diff;
  return a.productName < b.productName ? -1 : a.productName > b.productName ? 1 : 0;
}

export function rankProducts(sales: readonly Sale[], topN = DEFAULT_TOP_N): ProductRevenue[] {
  const sums = new Map<string, Amount>();
  for (const s of sales) {
    sums.set(s.productName, (sums.get(s.productName) ?? ZERO).plus(s.revenue));
  }
  const merged = [...sums.entries()].map(([productName, revenue]) => ({ productName, revenue }));
  merged.sort(byRevenueThenName);
  return merged.slice(0, topN);
}

export function aggregate(sales: readonly Sale[], topN = DEFAULT_TOP_N): AnalysisReport {
  const totalRevenue = sales.reduce((sum, s) => sum.plus(s.revenue), ZERO);
  // no sales: report 0 rather than divide
  const averageOrderValue = sales.length === 0 ? ZERO : divideToCents(totalRevenue, sales.length);
  return {
    totalRevenue,
    averageOrderValue,
    saleCount: sales.length,
    topProducts: rankProducts(sales, topN)
  };
}

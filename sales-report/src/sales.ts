// src/sales.ts
import type { Amount } from "./amount";

export const REQUIRED_COLUMNS = ["product_name", "quantity", "unit_price"] as const;
export type Column = (typeof REQUIRED_COLUMNS)[number];

/** One data line of the input, keyed by header. `index` is 1-based and excludes the header. */
export type RawRow = {
  index: number;
  fields: Readonly<Record<string, string | undefined>>;
};

export type Sale = {
  readonly productName: string;
  readonly quantity: Amount;
  readonly unitPrice: Amount;
  readonly revenue: Amount;
};

export type Rejection = { readonly row: number; readonly reason: string };

export type ProductRevenue = { readonly productName: string; readonly revenue: Amount };

export type AnalysisReport = {
  readonly totalRevenue: Amount;
  /** 0 when there are no sales; callers should read `saleCount` to tell "no data" apart. */
  readonly averageOrderValue: Amount;
  readonly saleCount: number;
  readonly topProducts: readonly ProductRevenue[];
};

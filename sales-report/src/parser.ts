import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { Amount, isDecimalLiteral } from "./amount";
import { REQUIRED_COLUMNS } from "./sales";
import type { RawRow, Rejection, Sale } from "./sales";

type NumericField = "quantity" | "unit_price";

/**
 * Parse one numeric cell into a strictly positive decimal.
 * The error side carries the rejection reason.
 */
export function parseAmount(raw: string, field: NumericField): Result<Amount, string> {
  const cleaned = raw.trim();
  if (!cleaned) return err(`missing ${field} value`);
  const invalid = `Invalid ${field} value: '${raw}'. Must be a number.`;
  if (!isDecimalLiteral(cleaned)) return err(invalid);
  const value = new Amount(cleaned);
  // exponent beyond decimal.js's range overflows to Infinity
  if (!value.isFinite()) return err(invalid);
  if (value.lte(0)) return err(`${field} must be positive, got ${value.toString()}`);
  return ok(value);
}

function parseQuantity(raw: string): Result<Amount, string> {
  return parseAmount(raw, "quantity").andThen(q =>
    q.isInteger() ? ok(q) : err("quantity must be a whole number")
  );
}

/** Turn a raw row into a Sale, or say why it can't be one. */
export function parseRow(row: RawRow): Result<Sale, Rejection> {
  const reject = (reason: string) => err<never, Rejection>({ row: row.index, reason });

  const missing = REQUIRED_COLUMNS.find(c => row.fields[c] === undefined);
  if (missing) return reject(`missing column ${missing}`);

  const productName = (row.fields.product_name ?? "").trim();
  if (!productName) return reject("missing product name");

  return parseQuantity(row.fields.quantity ?? "")
    .andThen(quantity =>
      parseAmount(row.fields.unit_price ?? "", "unit_price").map((unitPrice): Sale => ({
        productName,
        quantity,
        unitPrice,
        revenue: quantity.times(unitPrice)
      }))
    )
    .mapErr((reason): Rejection => ({ row: row.index, reason }));
}

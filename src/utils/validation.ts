/**
 * Input validation schemas for the persisted tables.
 */

import { z } from "zod";
import { isValid, parseISO } from "date-fns";

/** Ticker as stored in the holdings table (exchange suffix excluded) */
export const TickerSchema = z
  .string()
  .min(1)
  .max(20)
  .regex(/^[A-Z0-9][A-Z0-9.&_-]*$/, "Ticker must be uppercase letters, digits or . & _ -");

/** Calendar date, YYYY-MM-DD */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD")
  .refine((s) => isValid(parseISO(s)), "Date is not a valid calendar date");

/** One row of the holdings table */
export const PositionSchema = z.object({
  symbol: TickerSchema,
  name: z.string().default(""),
  purchasePrice: z.number().finite(),
  quantity: z.number().finite(),
  purchaseDate: IsoDateSchema,
});

export const HoldingsTableSchema = z.array(PositionSchema);

export const SnapshotSchema = z.object({
  date: IsoDateSchema,
  totalInvestment: z.number().finite(),
  totalCurrentValue: z.number().finite(),
  totalPl: z.number().finite(),
  totalPlPercentage: z.number().finite(),
});

export const HistoryTableSchema = z.object({
  isSynthetic: z.boolean().default(false),
  snapshots: z.array(SnapshotSchema),
});

/** Persisted priced-position row; only the fields read back are checked */
export const PricedPositionRowSchema = z
  .object({
    symbol: TickerSchema,
    currentPrice: z.number().finite().nonnegative().nullable(),
  })
  .passthrough();

export const PricedPositionTableSchema = z.array(PricedPositionRowSchema);

/** Mock price file: { "SYMBOL": price } */
export const PriceMapSchema = z.record(TickerSchema, z.number().finite().nonnegative());

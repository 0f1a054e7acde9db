/**
 * Time-Series Builder
 *
 * Maintains the daily PerformanceHistory:
 *   - append mode: upsert today's snapshot keyed by date
 *   - synthesize mode: seeded backfill from the first purchase date when no
 *     persisted history exists. The result is flagged isSynthetic and is
 *     not market history.
 */

import { addDays, format, isAfter, isWeekend, parseISO } from "date-fns";
import type {
  IsoDate,
  PerformanceHistory,
  PortfolioSnapshot,
  Position,
} from "../types/portfolio.js";
import { createNormalSampler, createRng } from "./random.js";

/** Mean daily return of the synthetic walk (0.08%) */
export const SYNTHETIC_DAILY_DRIFT = 0.0008;
/** Daily volatility of the synthetic walk (1.5%) */
export const SYNTHETIC_DAILY_VOLATILITY = 0.015;
export const DEFAULT_SYNTHETIC_SEED = 42;

export function emptyHistory(isSynthetic = false): PerformanceHistory {
  return { snapshots: [], isSynthetic };
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, "yyyy-MM-dd");
}

/**
 * Sort loaded rows by date and drop duplicates (the later row for a date wins).
 */
export function normalizeHistory(
  snapshots: readonly PortfolioSnapshot[],
  isSynthetic: boolean
): PerformanceHistory {
  const byDate = new Map<IsoDate, PortfolioSnapshot>();
  for (const s of snapshots) byDate.set(s.date, s);
  const sorted = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
  return { snapshots: sorted, isSynthetic };
}

/**
 * Insert or replace the snapshot for its date, keeping strict date order.
 */
export function upsertSnapshot(
  history: PerformanceHistory,
  snapshot: PortfolioSnapshot
): PerformanceHistory {
  const snapshots = [...history.snapshots];
  const idx = snapshots.findIndex((s) => s.date >= snapshot.date);

  if (idx === -1) {
    snapshots.push(snapshot);
  } else if (snapshots[idx].date === snapshot.date) {
    snapshots[idx] = snapshot;
  } else {
    snapshots.splice(idx, 0, snapshot);
  }

  return { snapshots, isSynthetic: history.isSynthetic };
}

/** Earliest purchase date across holdings, or null for none */
export function earliestPurchaseDate(positions: readonly Position[]): IsoDate | null {
  let earliest: IsoDate | null = null;
  for (const p of positions) {
    if (earliest === null || p.purchaseDate < earliest) earliest = p.purchaseDate;
  }
  return earliest;
}

/** Monday-Friday dates from start through end, inclusive */
export function businessDays(start: IsoDate, end: IsoDate): IsoDate[] {
  const last = parseISO(end);
  const days: IsoDate[] = [];
  for (let d = parseISO(start); !isAfter(d, last); d = addDays(d, 1)) {
    if (!isWeekend(d)) days.push(toIsoDate(d));
  }
  return days;
}

export interface SynthesizeParams {
  startDate: IsoDate;
  endDate: IsoDate;
  initialInvestment: number;
  seed?: number;
}

/**
 * Generate a deterministic business-day history from a seeded random walk.
 * Same params → same snapshots.
 */
export function synthesizeHistory(params: SynthesizeParams): PerformanceHistory {
  const { startDate, endDate, initialInvestment } = params;
  const seed = params.seed ?? DEFAULT_SYNTHETIC_SEED;

  if (!(initialInvestment > 0)) {
    throw new RangeError(`initialInvestment must be positive, got ${initialInvestment}`);
  }

  const nextReturn = createNormalSampler(
    createRng(seed),
    SYNTHETIC_DAILY_DRIFT,
    SYNTHETIC_DAILY_VOLATILITY
  );

  let value = initialInvestment;
  const snapshots: PortfolioSnapshot[] = businessDays(startDate, endDate).map((date) => {
    value = value * (1 + nextReturn());
    const totalPl = value - initialInvestment;
    return {
      date,
      totalInvestment: initialInvestment,
      totalCurrentValue: value,
      totalPl,
      totalPlPercentage: (totalPl / initialInvestment) * 100,
    };
  });

  return { snapshots, isSynthetic: true };
}

/**
 * Risk/reward and realized R from planned price levels
 *
 * Direction-aware: risk and reward are measured from entry towards the stop
 * and towards the target on the side the trade was taken.
 */

import { parseDirection, parseResult } from "../types/trade";
import { roundTo } from "../utils/round";

export type PriceInput = number | string | null | undefined;

export interface RRComputation {
  rrRatio: number | null;
  realizedR: number | null;
}

const NO_RR: RRComputation = { rrRatio: null, realizedR: null };

/**
 * Coerce a price field into a finite number.
 * Blank strings, non-numeric strings and non-finite numbers become null.
 */
export function toPrice(value: PriceInput): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function computeRR(
  direction: string | null | undefined,
  entryPrice: PriceInput,
  stopLoss: PriceInput,
  takeProfit: PriceInput,
  result: string | null | undefined
): RRComputation {
  const side = parseDirection(direction);
  const entry = toPrice(entryPrice);
  const stop = toPrice(stopLoss);
  const target = toPrice(takeProfit);

  if (!side || entry === null || stop === null || target === null) {
    return NO_RR;
  }

  const risk = side === "BUY" ? entry - stop : stop - entry;
  const reward = side === "BUY" ? target - entry : entry - target;

  if (!(risk > 0)) {
    return NO_RR;
  }

  const rrRatio = roundTo(reward / risk, 2);
  if (!Number.isFinite(rrRatio)) {
    return NO_RR;
  }

  switch (parseResult(result)) {
    case "WIN":
      return { rrRatio, realizedR: rrRatio };
    case "LOSE":
      return { rrRatio, realizedR: -1 };
    case "BE":
      return { rrRatio, realizedR: 0 };
    default:
      return { rrRatio, realizedR: null };
  }
}

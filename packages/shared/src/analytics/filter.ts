import type { Trade } from "../types/trade";

export const ALL = "ALL";

export interface TradeFilter {
  status?: string | null;
  direction?: string | null;
  strategy?: string | null;
  symbol?: string | null;
}

/**
 * Normalizes one equality criterion; null means "do not filter".
 */
function criterion(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  if (trimmed === "" || trimmed.toUpperCase() === ALL) return null;
  return trimmed.toUpperCase();
}

/**
 * Conjunctive, case-insensitive filtering.
 * Always a stable subsequence of the input; never reorders.
 */
export function filterTrades<T extends Trade>(trades: readonly T[], filter: TradeFilter = {}): T[] {
  const status = criterion(filter.status);
  const direction = criterion(filter.direction);
  const strategy = criterion(filter.strategy);
  const symbol = (filter.symbol ?? "").trim().toLowerCase();

  return trades.filter((t) => {
    if (status !== null && (t.status ?? "") !== status) return false;
    if (direction !== null && (t.direction ?? "") !== direction) return false;
    if (strategy !== null && t.strategyTag.trim().toUpperCase() !== strategy) return false;
    if (symbol !== "" && !t.symbol.toLowerCase().includes(symbol)) return false;
    return true;
  });
}

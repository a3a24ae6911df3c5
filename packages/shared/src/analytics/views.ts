/**
 * Selections and summaries behind the owner dashboard and the public page
 */

import type { Trade } from "../types/trade";
import { aggregate, closedTrades, type TradeStats } from "./aggregate";
import { buildEquityCurve } from "./equity";

export const STRATEGY_INFO: Readonly<Record<string, string>> = {
  SND: "Supply & demand continuation after liquidity sweep.",
  MR: "Mean reversion after extended move away from value.",
  BO: "Breakout & retest strategy with structural confirmation.",
  SWING: "Swing trading based on higher timeframe structures.",
  INTRA: "Intraday momentum within specific trading sessions.",
};

export const UNKNOWN_STRATEGY_DESCRIPTION = "No description yet - used as tag in my trades.";

export interface DashboardStats extends TradeStats {
  maxDrawdown: number;
  equityLabels: string[];
  equityPoints: number[];
}

export interface StatusCounts {
  planned: number;
  active: number;
  closed: number;
}

export interface PlaybookEntry {
  tag: string;
  description: string;
}

/**
 * Stats plus the equity curve of closed trades.
 * Expects the chronological order the store returns.
 */
export function buildDashboardStats(trades: readonly Trade[]): DashboardStats {
  const curve = buildEquityCurve(closedTrades(trades));
  return {
    ...aggregate(trades),
    maxDrawdown: curve.maxDrawdown,
    equityLabels: curve.labels,
    equityPoints: curve.points,
  };
}

export function countByStatus(trades: readonly Trade[]): StatusCounts {
  const counts: StatusCounts = { planned: 0, active: 0, closed: 0 };
  for (const t of trades) {
    if (t.status === "PLANNED") counts.planned++;
    else if (t.status === "ACTIVE") counts.active++;
    else if (t.status === "CLOSED") counts.closed++;
  }
  return counts;
}

/**
 * Most recent featured trades, newest first.
 */
export function featuredTrades<T extends Trade>(trades: readonly T[], limit = 3): T[] {
  if (limit <= 0) return [];
  const featured = trades.filter((t) => t.featured);
  return featured.slice(Math.max(featured.length - limit, 0)).reverse();
}

export function newestFirst<T>(trades: readonly T[]): T[] {
  return [...trades].reverse();
}

export function uniqueStrategies(trades: readonly Trade[]): string[] {
  const tags = new Set<string>();
  for (const t of trades) {
    const tag = t.strategyTag.trim();
    if (tag) tags.add(tag);
  }
  return [...tags].sort();
}

export function buildPlaybook(trades: readonly Trade[]): PlaybookEntry[] {
  const tags = new Set(uniqueStrategies(trades).map((tag) => tag.toUpperCase()));
  return [...tags].sort().map((tag) => ({
    tag,
    description: STRATEGY_INFO[tag] ?? UNKNOWN_STRATEGY_DESCRIPTION,
  }));
}

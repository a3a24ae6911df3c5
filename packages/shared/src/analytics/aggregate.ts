/**
 * Portfolio statistics over closed trades
 *
 * A trade counts as closed once it has a result, whatever its status says.
 * The same predicate drives the equity curve and the CSV export.
 */

import type { Trade } from "../types/trade";
import { mean, roundTo } from "../utils/round";
import { isFullyDisciplined } from "./discipline";

export interface TimeframeStats {
  count: number;
  wins: number;
  loses: number;
  avgR: number;
  winRate: number;
}

export interface StrategyStats {
  count: number;
  wins: number;
  loses: number;
}

export interface TradeStats {
  total: number;
  wins: number;
  loses: number;
  winRate: number;
  avgRr: number;
  avgRealizedR: number;
  avgRisk: number;
  maxRisk: number;
  disciplineScore: number;
  byTimeframe: Record<string, TimeframeStats>;
  byStrategy: Record<string, StrategyStats>;
}

export function isClosedForStats(trade: Trade): boolean {
  return trade.result !== null;
}

export function closedTrades<T extends Trade>(trades: readonly T[]): T[] {
  return trades.filter(isClosedForStats);
}

function percent(part: number, whole: number): number {
  return whole > 0 ? roundTo((part / whole) * 100, 1) : 0;
}

function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

export function aggregate(trades: readonly Trade[]): TradeStats {
  const closed = closedTrades(trades);
  const total = closed.length;
  const wins = closed.filter((t) => t.result === "WIN").length;
  const loses = closed.filter((t) => t.result === "LOSE").length;

  const rrList = present(closed.map((t) => t.rrRatio));
  const realizedList = present(closed.map((t) => t.realizedR));
  const riskList = present(closed.map((t) => t.riskPercent));

  const disciplined = closed.filter((t) => isFullyDisciplined(t.discipline)).length;

  return {
    total,
    wins,
    loses,
    winRate: percent(wins, total),
    avgRr: roundTo(mean(rrList), 2),
    avgRealizedR: roundTo(mean(realizedList), 2),
    avgRisk: roundTo(mean(riskList), 2),
    maxRisk: riskList.length > 0 ? roundTo(riskList.reduce((m, v) => Math.max(m, v), -Infinity), 2) : 0,
    disciplineScore: percent(disciplined, total),
    byTimeframe: timeframeBreakdown(closed),
    byStrategy: strategyBreakdown(closed),
  };
}

function timeframeBreakdown(closed: readonly Trade[]): Record<string, TimeframeStats> {
  const buckets = new Map<string, { count: number; wins: number; loses: number; rs: number[] }>();

  for (const t of closed) {
    const key = t.timeframe.trim();
    if (!key) continue;

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { count: 0, wins: 0, loses: 0, rs: [] };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (t.result === "WIN") bucket.wins++;
    else if (t.result === "LOSE") bucket.loses++;
    if (t.realizedR !== null) bucket.rs.push(t.realizedR);
  }

  return Object.fromEntries(
    Array.from(buckets, ([key, b]) => [
      key,
      {
        count: b.count,
        wins: b.wins,
        loses: b.loses,
        avgR: roundTo(mean(b.rs), 2),
        winRate: percent(b.wins, b.count),
      },
    ])
  );
}

function strategyBreakdown(closed: readonly Trade[]): Record<string, StrategyStats> {
  const buckets = new Map<string, StrategyStats>();

  for (const t of closed) {
    const key = t.strategyTag.trim();
    if (!key) continue;

    const bucket = buckets.get(key) ?? { count: 0, wins: 0, loses: 0 };
    bucket.count++;
    if (t.result === "WIN") bucket.wins++;
    else if (t.result === "LOSE") bucket.loses++;
    buckets.set(key, bucket);
  }

  return Object.fromEntries(buckets);
}

import type { Trade } from "../types/trade";
import { roundTo } from "../utils/round";

export interface EquityCurve {
  labels: string[];
  points: number[];
  // Running max drawdown after each step, same length as points
  drawdowns: number[];
  maxDrawdown: number;
}

export function equityLabel(trade: Trade): string {
  return `${trade.tradeDate} ${trade.symbol} ${trade.direction ?? ""}`;
}

/**
 * Cumulative R and peak-to-trough drawdown.
 *
 * Callers pass trades ascending by trade date then id. Nothing is sorted here,
 * so reversed input yields a reversed (and meaningless) curve.
 */
export function buildEquityCurve(trades: readonly Trade[]): EquityCurve {
  const labels: string[] = [];
  const points: number[] = [];
  const drawdowns: number[] = [];

  let cumulative = 0;
  let peak = 0;
  let maxDrawdown = 0;

  for (const trade of trades) {
    cumulative += trade.realizedR ?? 0;
    if (cumulative > peak) peak = cumulative;
    maxDrawdown = Math.max(maxDrawdown, peak - cumulative);

    labels.push(equityLabel(trade));
    points.push(roundTo(cumulative, 2));
    drawdowns.push(roundTo(maxDrawdown, 2));
  }

  return {
    labels,
    points,
    drawdowns,
    maxDrawdown: roundTo(maxDrawdown, 2),
  };
}

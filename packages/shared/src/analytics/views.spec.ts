import { describe, it, expect } from "vitest";

import { loss, makeTrade, win } from "./fixtures";
import {
  buildDashboardStats,
  buildPlaybook,
  countByStatus,
  featuredTrades,
  newestFirst,
  uniqueStrategies,
  UNKNOWN_STRATEGY_DESCRIPTION,
} from "./views";

describe("buildDashboardStats", () => {
  it("combines aggregate stats with the closed-trade equity curve", () => {
    const stats = buildDashboardStats([
      win(2, { tradeDate: "2024-01-01", symbol: "EURUSD" }),
      makeTrade({ tradeDate: "2024-01-02", symbol: "GBPUSD", result: null, realizedR: null }),
      loss({ tradeDate: "2024-01-03", symbol: "XAUUSD", direction: "SELL" }),
      loss({ tradeDate: "2024-01-04", symbol: "XAUUSD", direction: "SELL" }),
    ]);

    expect(stats.total).toBe(3);
    expect(stats.equityLabels).toEqual([
      "2024-01-01 EURUSD BUY",
      "2024-01-03 XAUUSD SELL",
      "2024-01-04 XAUUSD SELL",
    ]);
    expect(stats.equityPoints).toEqual([2, 1, 0]);
    expect(stats.maxDrawdown).toBe(2);
  });
});

describe("countByStatus", () => {
  it("counts by status, ignoring unknown ones", () => {
    expect(
      countByStatus([
        makeTrade({ status: "PLANNED" }),
        makeTrade({ status: "ACTIVE" }),
        makeTrade({ status: "CLOSED" }),
        makeTrade({ status: "CLOSED" }),
        makeTrade({ status: null }),
      ])
    ).toEqual({ planned: 1, active: 1, closed: 2 });
  });
});

describe("featuredTrades", () => {
  it("returns the latest featured trades newest first", () => {
    const trades = [1, 2, 3, 4, 5].map((id) => makeTrade({ id, featured: id !== 3 }));
    expect(featuredTrades(trades).map((t) => t.id)).toEqual([5, 4, 2]);
    expect(featuredTrades(trades, 1).map((t) => t.id)).toEqual([5]);
  });

  it("returns nothing when no trade is featured", () => {
    expect(featuredTrades([makeTrade()])).toEqual([]);
  });

  it("returns nothing for a zero or negative limit", () => {
    const trades = [1, 2, 3].map((id) => makeTrade({ id, featured: true }));
    expect(featuredTrades(trades, 0)).toEqual([]);
    expect(featuredTrades(trades, -2)).toEqual([]);
  });

  it("returns every featured trade when the limit exceeds them", () => {
    const trades = [1, 2].map((id) => makeTrade({ id, featured: true }));
    expect(featuredTrades(trades, 10).map((t) => t.id)).toEqual([2, 1]);
  });
});

describe("newestFirst", () => {
  it("reverses without mutating", () => {
    const input = [1, 2, 3];
    expect(newestFirst(input)).toEqual([3, 2, 1]);
    expect(input).toEqual([1, 2, 3]);
  });
});

describe("strategies", () => {
  const trades = [
    makeTrade({ strategyTag: "SND" }),
    makeTrade({ strategyTag: "BO" }),
    makeTrade({ strategyTag: " SND " }),
    makeTrade({ strategyTag: "" }),
    makeTrade({ strategyTag: "SCALP" }),
  ];

  it("lists distinct tags sorted", () => {
    expect(uniqueStrategies(trades)).toEqual(["BO", "SCALP", "SND"]);
  });

  it("describes each tag from the catalogue", () => {
    expect(buildPlaybook(trades)).toEqual([
      { tag: "BO", description: "Breakout & retest strategy with structural confirmation." },
      { tag: "SCALP", description: UNKNOWN_STRATEGY_DESCRIPTION },
      { tag: "SND", description: "Supply & demand continuation after liquidity sweep." },
    ]);
  });
});

/**
 * Trade fixtures for analytics and server tests
 */

import type { Trade } from "../types/trade";

let nextId = 1;

export function makeTrade(overrides: Partial<Trade> = {}): Trade {
  const id = overrides.id ?? nextId++;
  return {
    id,
    tradeDate: "2024-03-01",
    symbol: "EURUSD",
    timeframe: "H1",
    direction: "BUY",
    entryPrice: 100,
    stopLoss: 95,
    takeProfit: 110,
    riskPercent: 1,
    result: null,
    status: "PLANNED",
    rrRatio: 2,
    realizedR: null,
    discipline: { followedPlan: false, noRevenge: false, noFomo: false, respectedRr: false },
    strategyTag: "",
    marketCondition: "",
    grade: "",
    featured: false,
    notesPublic: "",
    notesPrivate: "",
    screenshotBefore: null,
    screenshotAfter: null,
    createdAt: "2024-03-01T08:00:00.000Z",
    updatedAt: "2024-03-01T08:00:00.000Z",
    ...overrides,
  };
}

export const FULL_DISCIPLINE = {
  followedPlan: true,
  noRevenge: true,
  noFomo: true,
  respectedRr: true,
} as const;

export function win(rr: number, overrides: Partial<Trade> = {}): Trade {
  return makeTrade({ result: "WIN", status: "CLOSED", rrRatio: rr, realizedR: rr, ...overrides });
}

export function loss(overrides: Partial<Trade> = {}): Trade {
  return makeTrade({ result: "LOSE", status: "CLOSED", realizedR: -1, ...overrides });
}

// Trade journal types shared between the analytics engine and the server

export const DIRECTIONS = ["BUY", "SELL"] as const;
export const TRADE_RESULTS = ["WIN", "LOSE", "BE"] as const;
export const TRADE_STATUSES = ["PLANNED", "ACTIVE", "CLOSED"] as const;

export type Direction = (typeof DIRECTIONS)[number];
export type TradeResult = (typeof TRADE_RESULTS)[number];
export type TradeStatus = (typeof TRADE_STATUSES)[number];

export type TradeId = number;

export interface DisciplineFlags {
  followedPlan: boolean;
  noRevenge: boolean;
  noFomo: boolean;
  respectedRr: boolean;
}

export interface Trade {
  id: TradeId;
  tradeDate: string; // YYYY-MM-DD
  symbol: string;
  timeframe: string; // M15, H1, D1 ...
  direction: Direction | null;
  entryPrice: number | null;
  stopLoss: number | null;
  takeProfit: number | null;
  riskPercent: number | null;
  result: TradeResult | null;
  status: TradeStatus | null;
  // Derived on every write, never user-entered
  rrRatio: number | null;
  realizedR: number | null;
  discipline: DisciplineFlags;
  strategyTag: string;
  marketCondition: string;
  grade: string;
  featured: boolean;
  notesPublic: string;
  notesPrivate: string;
  screenshotBefore: string | null;
  screenshotAfter: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Everything a write supplies; storage assigns id and timestamps.
 */
export type TradeRecord = Omit<Trade, "id" | "createdAt" | "updatedAt">;

export type PublicTrade = Omit<Trade, "notesPrivate">;

function matchEnum<T extends string>(values: readonly T[], raw: unknown): T | null {
  if (typeof raw !== "string") return null;
  const upper = raw.trim().toUpperCase();
  return values.find((v) => v === upper) ?? null;
}

export function parseDirection(raw: unknown): Direction | null {
  return matchEnum(DIRECTIONS, raw);
}

export function parseResult(raw: unknown): TradeResult | null {
  return matchEnum(TRADE_RESULTS, raw);
}

export function parseStatus(raw: unknown): TradeStatus | null {
  return matchEnum(TRADE_STATUSES, raw);
}

export function normalizeStrategyTag(raw: string | null | undefined): string {
  return (raw ?? "").trim().toUpperCase();
}

export function toPublicTrade(trade: Trade): PublicTrade {
  const { notesPrivate: _private, ...rest } = trade;
  return rest;
}

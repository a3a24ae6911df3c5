import { asc, eq } from "drizzle-orm";
import {
  parseDirection,
  parseResult,
  parseStatus,
  type Trade,
  type TradeId,
  type TradeRecord,
} from "@shared/types/trade";

import type { Database } from "../db/index";
import { trades, type NewTradeRow, type TradeRow } from "../db/schema";

export type StorageKind = "postgres" | "memory";

/**
 * Persistence boundary for trades.
 * `list()` returns trades ascending by trade date, then id; the equity curve
 * relies on that order.
 */
export interface TradeStore {
  readonly kind: StorageKind;
  list(): Promise<Trade[]>;
  get(id: TradeId): Promise<Trade | null>;
  insert(record: TradeRecord): Promise<Trade>;
  update(id: TradeId, record: TradeRecord): Promise<Trade | null>;
  remove(id: TradeId): Promise<Trade | null>;
}

function finite(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

/**
 * Rows may hold anything an older writer stored; enums are normalized here
 * and unknown values become null.
 */
export function rowToTrade(row: TradeRow): Trade {
  return {
    id: row.id,
    tradeDate: row.tradeDate,
    symbol: row.symbol,
    timeframe: row.timeframe,
    direction: parseDirection(row.direction),
    entryPrice: finite(row.entryPrice),
    stopLoss: finite(row.stopLoss),
    takeProfit: finite(row.takeProfit),
    riskPercent: finite(row.riskPercent),
    result: parseResult(row.result),
    status: parseStatus(row.status),
    rrRatio: finite(row.rrRatio),
    realizedR: finite(row.realizedR),
    discipline: {
      followedPlan: row.followedPlan,
      noRevenge: row.noRevenge,
      noFomo: row.noFomo,
      respectedRr: row.respectedRr,
    },
    strategyTag: row.strategyTag,
    marketCondition: row.marketCondition,
    grade: row.grade,
    featured: row.featured,
    notesPublic: row.notesPublic,
    notesPrivate: row.notesPrivate,
    screenshotBefore: row.screenshotBefore,
    screenshotAfter: row.screenshotAfter,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function recordToRow(record: TradeRecord): Omit<NewTradeRow, "id" | "createdAt" | "updatedAt"> {
  const { discipline, ...fields } = record;
  return {
    ...fields,
    followedPlan: discipline.followedPlan,
    noRevenge: discipline.noRevenge,
    noFomo: discipline.noFomo,
    respectedRr: discipline.respectedRr,
  };
}

export class DrizzleTradeStore implements TradeStore {
  readonly kind: StorageKind = "postgres";

  constructor(private readonly db: Database) {}

  async list(): Promise<Trade[]> {
    const rows = await this.db.select().from(trades).orderBy(asc(trades.tradeDate), asc(trades.id));
    return rows.map(rowToTrade);
  }

  async get(id: TradeId): Promise<Trade | null> {
    const rows = await this.db.select().from(trades).where(eq(trades.id, id)).limit(1);
    const row = rows[0];
    return row ? rowToTrade(row) : null;
  }

  async insert(record: TradeRecord): Promise<Trade> {
    const rows = await this.db.insert(trades).values(recordToRow(record)).returning();
    const row = rows[0];
    if (!row) {
      throw new Error("Trade insert returned no row");
    }
    return rowToTrade(row);
  }

  async update(id: TradeId, record: TradeRecord): Promise<Trade | null> {
    const rows = await this.db
      .update(trades)
      .set({ ...recordToRow(record), updatedAt: new Date() })
      .where(eq(trades.id, id))
      .returning();
    const row = rows[0];
    return row ? rowToTrade(row) : null;
  }

  async remove(id: TradeId): Promise<Trade | null> {
    const rows = await this.db.delete(trades).where(eq(trades.id, id)).returning();
    const row = rows[0];
    return row ? rowToTrade(row) : null;
  }
}

import type { Trade, TradeId, TradeRecord } from "@shared/types/trade";

import type { StorageKind, TradeStore } from "./store";

function byDateThenId(a: Trade, b: Trade): number {
  if (a.tradeDate !== b.tradeDate) return a.tradeDate < b.tradeDate ? -1 : 1;
  return a.id - b.id;
}

/**
 * Process-local store used when DATABASE_URL is unset, and by tests.
 */
export class InMemoryTradeStore implements TradeStore {
  readonly kind: StorageKind = "memory";
  private readonly trades = new Map<TradeId, Trade>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async list(): Promise<Trade[]> {
    return Array.from(this.trades.values(), (t) => clone(t)).sort(byDateThenId);
  }

  async get(id: TradeId): Promise<Trade | null> {
    const trade = this.trades.get(id);
    return trade ? clone(trade) : null;
  }

  async insert(record: TradeRecord): Promise<Trade> {
    const stamp = this.now().toISOString();
    const trade: Trade = { ...clone(record), id: this.nextId++, createdAt: stamp, updatedAt: stamp };
    this.trades.set(trade.id, trade);
    return clone(trade);
  }

  async update(id: TradeId, record: TradeRecord): Promise<Trade | null> {
    const existing = this.trades.get(id);
    if (!existing) return null;

    const trade: Trade = {
      ...clone(record),
      id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    };
    this.trades.set(id, trade);
    return clone(trade);
  }

  async remove(id: TradeId): Promise<Trade | null> {
    const existing = this.trades.get(id);
    if (!existing) return null;
    this.trades.delete(id);
    return existing;
  }
}

function clone<T extends TradeRecord>(trade: T): T {
  return { ...trade, discipline: { ...trade.discipline } };
}

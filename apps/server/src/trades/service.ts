import {
  buildDashboardStats,
  buildPlaybook,
  closedTrades,
  computeRR,
  countByStatus,
  featuredTrades,
  filterTrades,
  newestFirst,
  scoreDiscipline,
  toCsv,
  uniqueStrategies,
  STRATEGY_INFO,
  type DashboardStats,
  type DisciplinePolicy,
  type PlaybookEntry,
  type StatusCounts,
} from "@shared/analytics";
import type { TradeFilterQuery, TradeFormInput } from "@shared/schemas";
import { toPublicTrade, type PublicTrade, type Trade, type TradeId, type TradeRecord } from "@shared/types/trade";

import { logger as rootLogger } from "../logger";
import { NotFoundError } from "../middleware/error";
import type { ScreenshotKind, ScreenshotStorage, UploadedFile } from "./screenshots";
import type { TradeStore } from "./store";

export type ScreenshotUploads = Partial<Record<ScreenshotKind, UploadedFile>>;

export interface DashboardView {
  trades: Trade[];
  featured: Trade[];
  stats: DashboardStats;
  uniqueStrategies: string[];
  strategyInfo: Readonly<Record<string, string>>;
  counts: StatusCounts;
}

export interface PublicView {
  trades: PublicTrade[];
  featured: PublicTrade[];
  stats: DashboardStats;
  uniqueStrategies: string[];
  playbook: PlaybookEntry[];
  filters: TradeFilterQuery;
  counts: StatusCounts;
}

export interface TradeDetail {
  trade: Trade | PublicTrade;
  disciplineScore: number | null;
}

export interface TradeServiceOptions {
  store: TradeStore;
  screenshots: ScreenshotStorage;
  disciplinePolicy: DisciplinePolicy;
  today?: () => string;
}

const logger = rootLogger.child({ component: "trades" });

function utcToday(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Builds the full record a write persists; derived fields are always recomputed.
 */
export function buildTradeRecord(
  input: TradeFormInput,
  tradeDate: string,
  screenshots: Pick<TradeRecord, "screenshotBefore" | "screenshotAfter">,
): TradeRecord {
  const { rrRatio, realizedR } = computeRR(
    input.direction,
    input.entryPrice,
    input.stopLoss,
    input.takeProfit,
    input.result,
  );

  return {
    tradeDate,
    symbol: input.symbol,
    timeframe: input.timeframe,
    direction: input.direction,
    entryPrice: input.entryPrice,
    stopLoss: input.stopLoss,
    takeProfit: input.takeProfit,
    riskPercent: input.riskPercent,
    result: input.result,
    status: input.status,
    rrRatio,
    realizedR,
    discipline: {
      followedPlan: input.followedPlan,
      noRevenge: input.noRevenge,
      noFomo: input.noFomo,
      respectedRr: input.respectedRr,
    },
    strategyTag: input.strategyTag,
    marketCondition: input.marketCondition,
    grade: input.grade,
    featured: input.featured,
    notesPublic: input.notesPublic,
    notesPrivate: input.notesPrivate,
    ...screenshots,
  };
}

export class TradeService {
  private readonly store: TradeStore;
  private readonly screenshots: ScreenshotStorage;
  private readonly disciplinePolicy: DisciplinePolicy;
  private readonly today: () => string;

  constructor(options: TradeServiceOptions) {
    this.store = options.store;
    this.screenshots = options.screenshots;
    this.disciplinePolicy = options.disciplinePolicy;
    this.today = options.today ?? utcToday;
  }

  async dashboard(): Promise<DashboardView> {
    const trades = await this.store.list();
    return {
      trades: newestFirst(trades),
      featured: featuredTrades(trades),
      stats: buildDashboardStats(trades),
      uniqueStrategies: uniqueStrategies(trades),
      strategyInfo: STRATEGY_INFO,
      counts: countByStatus(trades),
    };
  }

  async publicView(filters: TradeFilterQuery): Promise<PublicView> {
    const trades = await this.store.list();
    const filtered = filterTrades(trades, filters);

    return {
      trades: newestFirst(filtered).map(toPublicTrade),
      featured: featuredTrades(trades).map(toPublicTrade),
      stats: buildDashboardStats(trades),
      uniqueStrategies: uniqueStrategies(trades),
      playbook: buildPlaybook(trades),
      filters,
      counts: countByStatus(trades),
    };
  }

  async exportClosedCsv(): Promise<string> {
    const trades = await this.store.list();
    return toCsv(closedTrades(trades));
  }

  async getTrade(id: TradeId, options: { includePrivate: boolean }): Promise<TradeDetail> {
    const trade = await this.store.get(id);
    if (!trade) {
      throw new NotFoundError(`Trade ${id} not found`);
    }

    return {
      trade: options.includePrivate ? trade : toPublicTrade(trade),
      disciplineScore: scoreDiscipline(trade.discipline, this.disciplinePolicy),
    };
  }

  async createTrade(input: TradeFormInput, uploads: ScreenshotUploads = {}): Promise<Trade> {
    const stored = await this.storeUploads(uploads);
    const record = buildTradeRecord(input, input.tradeDate || this.today(), {
      screenshotBefore: stored.before ?? null,
      screenshotAfter: stored.after ?? null,
    });

    const trade = await this.writeOrRelease(stored, () => this.store.insert(record));
    logger.info({ tradeId: trade.id, symbol: trade.symbol }, "Trade created");
    return trade;
  }

  /**
   * Full overwrite. Screenshots not re-uploaded are kept; replaced ones are released.
   */
  async updateTrade(id: TradeId, input: TradeFormInput, uploads: ScreenshotUploads = {}): Promise<Trade> {
    const existing = await this.store.get(id);
    if (!existing) {
      throw new NotFoundError(`Trade ${id} not found`);
    }

    const stored = await this.storeUploads(uploads);
    const record = buildTradeRecord(input, input.tradeDate || existing.tradeDate, {
      screenshotBefore: stored.before ?? existing.screenshotBefore,
      screenshotAfter: stored.after ?? existing.screenshotAfter,
    });

    const trade = await this.writeOrRelease(stored, async () => {
      const updated = await this.store.update(id, record);
      if (!updated) {
        throw new NotFoundError(`Trade ${id} not found`);
      }
      return updated;
    });

    const replaced = [
      stored.before ? existing.screenshotBefore : null,
      stored.after ? existing.screenshotAfter : null,
    ];
    await this.releaseScreenshots(replaced);

    logger.info({ tradeId: id }, "Trade updated");
    return trade;
  }

  async deleteTrade(id: TradeId): Promise<void> {
    const removed = await this.store.remove(id);
    if (!removed) {
      throw new NotFoundError(`Trade ${id} not found`);
    }

    await this.releaseScreenshots([removed.screenshotBefore, removed.screenshotAfter]);
    logger.info({ tradeId: id }, "Trade deleted");
  }

  private async storeUploads(uploads: ScreenshotUploads): Promise<Partial<Record<ScreenshotKind, string>>> {
    const stored: Partial<Record<ScreenshotKind, string>> = {};
    try {
      if (uploads.before) stored.before = await this.screenshots.save("before", uploads.before);
      if (uploads.after) stored.after = await this.screenshots.save("after", uploads.after);
    } catch (error) {
      await this.releaseScreenshots([stored.before ?? null]);
      throw error;
    }
    return stored;
  }

  // New uploads belong to no trade until the write succeeds
  private async writeOrRelease(stored: Partial<Record<ScreenshotKind, string>>, write: () => Promise<Trade>): Promise<Trade> {
    try {
      return await write();
    } catch (error) {
      await this.releaseScreenshots([stored.before ?? null, stored.after ?? null]);
      throw error;
    }
  }

  // Failures are logged only; the store write has already happened
  private async releaseScreenshots(names: Array<string | null>): Promise<void> {
    for (const name of names) {
      if (!name) continue;
      try {
        await this.screenshots.remove(name);
      } catch (error) {
        logger.warn({ err: error, name }, "Failed to remove screenshot");
      }
    }
  }
}

import { describe, it, expect, beforeEach, vi } from "vitest";
import { tradeFormSchema } from "@shared/schemas";

import { NotFoundError } from "../../middleware/error";
import { InMemoryTradeStore } from "../memoryStore";
import { TradeService } from "../service";
import { MemoryScreenshotStorage, png } from "./fakes";

function form(overrides: Record<string, unknown> = {}) {
  return tradeFormSchema.parse({
    tradeDate: "2024-06-03",
    symbol: "EURUSD",
    timeframe: "H1",
    direction: "BUY",
    entryPrice: "100",
    stopLoss: "95",
    takeProfit: "110",
    ...overrides,
  });
}

describe("TradeService", () => {
  let store: InMemoryTradeStore;
  let screenshots: MemoryScreenshotStorage;
  let service: TradeService;

  beforeEach(() => {
    store = new InMemoryTradeStore(() => new Date("2024-06-10T12:00:00.000Z"));
    screenshots = new MemoryScreenshotStorage();
    service = new TradeService({
      store,
      screenshots,
      disciplinePolicy: "any-flag",
      today: () => "2024-06-10",
    });
  });

  describe("createTrade", () => {
    it("derives risk/reward on write", async () => {
      const trade = await service.createTrade(form({ result: "WIN", status: "CLOSED" }));

      expect(trade.id).toBe(1);
      expect(trade.rrRatio).toBe(2);
      expect(trade.realizedR).toBe(2);
      expect(trade.status).toBe("CLOSED");
      expect(trade.createdAt).toBe("2024-06-10T12:00:00.000Z");
    });

    it("defaults a blank trade date to today and status to PLANNED", async () => {
      const trade = await service.createTrade(form({ tradeDate: "", status: "" }));
      expect(trade.tradeDate).toBe("2024-06-10");
      expect(trade.status).toBe("PLANNED");
      expect(trade.result).toBeNull();
      expect(trade.realizedR).toBeNull();
    });

    it("stores uploaded screenshots", async () => {
      const trade = await service.createTrade(form(), { before: png("setup.png") });
      expect(trade.screenshotBefore).toBe("1_before_setup.png");
      expect(trade.screenshotAfter).toBeNull();
      expect(screenshots.files.has("1_before_setup.png")).toBe(true);
    });

    it("leaves derived fields empty for an invalid plan", async () => {
      const trade = await service.createTrade(form({ stopLoss: "105", result: "WIN" }));
      expect(trade.rrRatio).toBeNull();
      expect(trade.realizedR).toBeNull();
    });
  });

  describe("updateTrade", () => {
    it("overwrites every field and recomputes derived values", async () => {
      const created = await service.createTrade(form({ result: "WIN", notesPrivate: "first" }));
      const updated = await service.updateTrade(
        created.id,
        form({ tradeDate: "", result: "LOSE", takeProfit: "115", notesPrivate: "" }),
      );

      expect(updated.tradeDate).toBe("2024-06-03");
      expect(updated.rrRatio).toBe(3);
      expect(updated.realizedR).toBe(-1);
      expect(updated.notesPrivate).toBe("");
      expect(updated.createdAt).toBe(created.createdAt);
    });

    it("keeps screenshots that were not re-uploaded and releases replaced ones", async () => {
      const created = await service.createTrade(form(), {
        before: png("before.png"),
        after: png("after.png"),
      });

      const updated = await service.updateTrade(created.id, form(), { after: png("after-v2.png") });

      expect(updated.screenshotBefore).toBe("1_before_before.png");
      expect(updated.screenshotAfter).toBe("3_after_after-v2.png");
      expect(screenshots.removed).toEqual(["2_after_after.png"]);
    });

    it("rejects an unknown trade", async () => {
      await expect(service.updateTrade(99, form())).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("deleteTrade", () => {
    it("removes the trade and releases its screenshots", async () => {
      const created = await service.createTrade(form(), {
        before: png("before.png"),
        after: png("after.png"),
      });

      await service.deleteTrade(created.id);

      expect(await store.get(created.id)).toBeNull();
      expect(screenshots.removed).toEqual(["1_before_before.png", "2_after_after.png"]);
    });

    it("still deletes when a screenshot cannot be released", async () => {
      const created = await service.createTrade(form(), { before: png("before.png") });
      screenshots.failOnRemove = true;

      await expect(service.deleteTrade(created.id)).resolves.toBeUndefined();
      expect(await store.get(created.id)).toBeNull();
    });

    it("rejects an unknown trade", async () => {
      await expect(service.deleteTrade(5)).rejects.toThrow("Trade 5 not found");
    });
  });

  describe("failed writes", () => {
    it("releases new uploads when the insert fails", async () => {
      vi.spyOn(store, "insert").mockRejectedValueOnce(new Error("db down"));

      await expect(service.createTrade(form(), { before: png("a.png") })).rejects.toThrow("db down");

      expect(screenshots.removed).toEqual(["1_before_a.png"]);
      expect(screenshots.files.size).toBe(0);
    });

    it("releases new uploads when the trade vanishes before the update", async () => {
      const created = await service.createTrade(form(), { before: png("before.png") });
      vi.spyOn(store, "update").mockResolvedValueOnce(null);

      await expect(service.updateTrade(created.id, form(), { after: png("late.png") })).rejects.toBeInstanceOf(
        NotFoundError,
      );

      expect(screenshots.removed).toEqual(["2_after_late.png"]);
      expect([...screenshots.files.keys()]).toEqual(["1_before_before.png"]);
    });

    it("releases the first upload when the second cannot be saved", async () => {
      vi.spyOn(screenshots, "save")
        .mockResolvedValueOnce("x_before_a.png")
        .mockRejectedValueOnce(new Error("disk full"));

      await expect(
        service.createTrade(form(), { before: png("a.png"), after: png("b.png") }),
      ).rejects.toThrow("disk full");

      expect(screenshots.removed).toEqual(["x_before_a.png"]);
      expect(await store.list()).toEqual([]);
    });
  });

  describe("getTrade", () => {
    it("hides private notes from visitors", async () => {
      const created = await service.createTrade(form({ notesPrivate: "revenge trade" }));

      const visitor = await service.getTrade(created.id, { includePrivate: false });
      const owner = await service.getTrade(created.id, { includePrivate: true });

      expect("notesPrivate" in visitor.trade).toBe(false);
      expect(owner.trade).toMatchObject({ notesPrivate: "revenge trade" });
    });

    it("scores discipline with the configured policy", async () => {
      const unticked = await service.createTrade(form());
      const ticked = await service.createTrade(form({ followedPlan: "on", noFomo: "on" }));

      expect((await service.getTrade(unticked.id, { includePrivate: false })).disciplineScore).toBeNull();
      expect((await service.getTrade(ticked.id, { includePrivate: false })).disciplineScore).toBe(50);

      const always = new TradeService({ store, screenshots, disciplinePolicy: "always" });
      expect((await always.getTrade(unticked.id, { includePrivate: false })).disciplineScore).toBe(0);
    });
  });

  describe("views", () => {
    beforeEach(async () => {
      await service.createTrade(
        form({ tradeDate: "2024-06-05", symbol: "XAUUSD", direction: "SELL", entryPrice: "2300", stopLoss: "2310", takeProfit: "2280", result: "LOSE", status: "CLOSED", strategyTag: "bo", notesPrivate: "late entry" }),
      );
      await service.createTrade(
        form({ tradeDate: "2024-06-01", result: "WIN", status: "CLOSED", strategyTag: "snd", featured: "on" }),
      );
      await service.createTrade(form({ tradeDate: "2024-06-07", symbol: "GBPUSD", status: "ACTIVE" }));
    });

    it("builds the dashboard from chronologically ordered trades", async () => {
      const view = await service.dashboard();

      expect(view.trades.map((t) => t.tradeDate)).toEqual(["2024-06-07", "2024-06-05", "2024-06-01"]);
      expect(view.stats.total).toBe(2);
      expect(view.stats.equityPoints).toEqual([2, 1]);
      expect(view.stats.maxDrawdown).toBe(1);
      expect(view.counts).toEqual({ planned: 0, active: 1, closed: 2 });
      expect(view.featured.map((t) => t.symbol)).toEqual(["EURUSD"]);
      expect(view.uniqueStrategies).toEqual(["BO", "SND"]);
    });

    it("filters the public list but keeps stats over everything", async () => {
      const view = await service.publicView({ status: "closed", direction: "ALL", strategy: "ALL", symbol: "" });

      expect(view.trades.map((t) => t.symbol)).toEqual(["XAUUSD", "EURUSD"]);
      expect(view.trades.some((t) => "notesPrivate" in t)).toBe(false);
      expect(view.stats.total).toBe(2);
      expect(view.playbook.map((p) => p.tag)).toEqual(["BO", "SND"]);
      expect(view.filters.status).toBe("closed");
    });

    it("exports closed trades as CSV in chronological order", async () => {
      const lines = (await service.exportClosedCsv()).split("\n");

      expect(lines).toHaveLength(3);
      expect(lines[1]).toBe("2024-06-01,EURUSD,H1,BUY,100,95,110,WIN,,SND,CLOSED,,2,2");
      expect(lines[2]).toBe("2024-06-05,XAUUSD,H1,SELL,2300,2310,2280,LOSE,,BO,CLOSED,,2,-1");
    });
  });
});

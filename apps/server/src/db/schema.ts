import { pgTable, text, serial, doublePrecision, boolean, timestamp, index } from 'drizzle-orm/pg-core';

export const trades = pgTable(
  'trades',
  {
    id: serial('id').primaryKey(),
    tradeDate: text('trade_date').notNull(),
    symbol: text('symbol').notNull(),
    timeframe: text('timeframe').notNull().default(''),
    direction: text('direction'),
    entryPrice: doublePrecision('entry_price'),
    stopLoss: doublePrecision('stop_loss'),
    takeProfit: doublePrecision('take_profit'),
    result: text('result'),
    grade: text('grade').notNull().default(''),
    strategyTag: text('strategy_tag').notNull().default(''),
    marketCondition: text('market_condition').notNull().default(''),
    riskPercent: doublePrecision('risk_percent'),
    rrRatio: doublePrecision('rr_ratio'),
    realizedR: doublePrecision('realized_r'),
    status: text('status'),
    followedPlan: boolean('followed_plan').notNull().default(false),
    noRevenge: boolean('no_revenge').notNull().default(false),
    noFomo: boolean('no_fomo').notNull().default(false),
    respectedRr: boolean('respected_rr').notNull().default(false),
    featured: boolean('featured').notNull().default(false),
    notesPublic: text('notes_public').notNull().default(''),
    notesPrivate: text('notes_private').notNull().default(''),
    screenshotBefore: text('screenshot_before_filename'),
    screenshotAfter: text('screenshot_after_filename'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    dateIdx: index('trades_trade_date_idx').on(table.tradeDate, table.id),
  })
);

export type TradeRow = typeof trades.$inferSelect;
export type NewTradeRow = typeof trades.$inferInsert;

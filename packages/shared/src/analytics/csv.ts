import type { Trade } from "../types/trade";

export const CSV_COLUMNS = [
  "trade_date",
  "symbol",
  "timeframe",
  "direction",
  "entry_price",
  "stop_loss",
  "take_profit",
  "result",
  "grade",
  "strategy_tag",
  "status",
  "risk_percent",
  "rr_ratio",
  "realized_r",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const CSV_CONTENT_TYPE = "text/csv";
export const CSV_FILENAME = "trades_closed.csv";

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * RFC 4180 quoting, applied only where the field would otherwise split.
 */
export function escapeCsvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function cell(trade: Trade, column: CsvColumn): string | number | null {
  switch (column) {
    case "trade_date":
      return trade.tradeDate;
    case "symbol":
      return trade.symbol;
    case "timeframe":
      return trade.timeframe;
    case "direction":
      return trade.direction;
    case "entry_price":
      return trade.entryPrice;
    case "stop_loss":
      return trade.stopLoss;
    case "take_profit":
      return trade.takeProfit;
    case "result":
      return trade.result;
    case "grade":
      return trade.grade;
    case "strategy_tag":
      return trade.strategyTag;
    case "status":
      return trade.status;
    case "risk_percent":
      return trade.riskPercent;
    case "rr_ratio":
      return trade.rrRatio;
    case "realized_r":
      return trade.realizedR;
  }
}

export function toCsvRow(trade: Trade): string {
  return CSV_COLUMNS.map((column) => escapeCsvField(cell(trade, column))).join(",");
}

/**
 * Header plus one row per trade, in input order, newline separated.
 */
export function toCsv(trades: readonly Trade[]): string {
  return [CSV_COLUMNS.join(","), ...trades.map(toCsvRow)].join("\n");
}

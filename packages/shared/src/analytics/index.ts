export { computeRR, toPrice, type PriceInput, type RRComputation } from "./rr";
export {
  scoreDiscipline,
  isFullyDisciplined,
  DISCIPLINE_POLICIES,
  type DisciplinePolicy,
} from "./discipline";
export { filterTrades, ALL, type TradeFilter } from "./filter";
export {
  aggregate,
  closedTrades,
  isClosedForStats,
  type TradeStats,
  type TimeframeStats,
  type StrategyStats,
} from "./aggregate";
export { buildEquityCurve, equityLabel, type EquityCurve } from "./equity";
export {
  toCsv,
  toCsvRow,
  escapeCsvField,
  CSV_COLUMNS,
  CSV_CONTENT_TYPE,
  CSV_FILENAME,
  type CsvColumn,
} from "./csv";
export {
  buildDashboardStats,
  buildPlaybook,
  countByStatus,
  featuredTrades,
  newestFirst,
  uniqueStrategies,
  STRATEGY_INFO,
  UNKNOWN_STRATEGY_DESCRIPTION,
  type DashboardStats,
  type PlaybookEntry,
  type StatusCounts,
} from "./views";

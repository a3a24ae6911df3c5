import { z } from "zod";

import { toPrice } from "./analytics/rr";
import { normalizeStrategyTag, parseDirection, parseResult, parseStatus } from "./types/trade";

const TRADE_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// Form posts send numbers as strings; blank means "not planned yet"
const numberField = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === null) return null;
    if (typeof value === "string" && value.trim() === "") return null;

    const parsed = toPrice(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a number" });
      return z.NEVER;
    }
    return parsed;
  });

// HTML checkboxes post "on" when ticked and nothing otherwise
const checkboxField = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => value === true || value === "on" || value === "true");

const textField = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

export const tradeFormSchema = z.object({
  tradeDate: z
    .string()
    .trim()
    .optional()
    .refine((value) => !value || TRADE_DATE_RE.test(value), "Expected YYYY-MM-DD"),
  symbol: z.string().trim().min(1, "Symbol is required"),
  timeframe: textField.transform((value) => value.trim()),
  direction: z.string().nullish().transform(parseDirection),
  entryPrice: numberField,
  stopLoss: numberField,
  takeProfit: numberField,
  riskPercent: numberField,
  result: z.string().nullish().transform(parseResult),
  status: z
    .string()
    .nullish()
    .transform((value) => parseStatus(value) ?? "PLANNED"),
  grade: textField,
  strategyTag: textField.transform(normalizeStrategyTag),
  marketCondition: textField,
  followedPlan: checkboxField,
  noRevenge: checkboxField,
  noFomo: checkboxField,
  respectedRr: checkboxField,
  featured: checkboxField,
  notesPublic: textField,
  notesPrivate: textField,
});

export type TradeFormInput = z.output<typeof tradeFormSchema>;

export const tradeFilterSchema = z.object({
  status: z.string().trim().default("ALL"),
  direction: z.string().trim().default("ALL"),
  strategy: z.string().trim().default("ALL"),
  symbol: z.string().trim().default(""),
});

export type TradeFilterQuery = z.output<typeof tradeFilterSchema>;

export const tradeIdSchema = z.coerce.number().int().positive();

export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

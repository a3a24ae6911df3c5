export * from "./analytics/index";
export * from "./types/trade";
export * from "./schemas";
export { envSchema, validateEnv, type Env } from "./env";
export { roundTo, mean } from "./utils/round";

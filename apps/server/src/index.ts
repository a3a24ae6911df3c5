import { validateEnv } from "@shared/env";
import { createServer } from "http";

import { createApp } from "./app";
import { createDb } from "./db/index";
import { setServerReady } from "./health";
import { logger } from "./logger";
import { InMemoryTradeStore } from "./trades/memoryStore";
import { DiskScreenshotStorage } from "./trades/screenshots";
import { DrizzleTradeStore, type TradeStore } from "./trades/store";

const env = validateEnv(process.env);

function createStore(): TradeStore {
  if (env.DATABASE_URL) {
    return new DrizzleTradeStore(createDb(env.DATABASE_URL));
  }
  logger.warn("DATABASE_URL not set, trades are kept in memory and lost on restart");
  return new InMemoryTradeStore();
}

setServerReady(false);

const app = createApp({
  env,
  store: createStore(),
  screenshots: new DiskScreenshotStorage(env.UPLOAD_DIR),
});
const server = createServer(app);

server.listen(env.PORT, () => {
  setServerReady(true);
  logger.info({ port: env.PORT, env: env.NODE_ENV }, "Journal server listening");
});

function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down");
  setServerReady(false);
  server.close((err) => {
    if (err) {
      logger.error({ err }, "Error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

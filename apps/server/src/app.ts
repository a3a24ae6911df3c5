import compression from "compression";
import cookieParser from "cookie-parser";
import express, { type Express } from "express";
import type { Env } from "@shared/env";

import { setupSecurity } from "./config/security";
import { createHealthHandlers } from "./health";
import { createHttpLogger } from "./logger";
import { errorHandler, notFound } from "./middleware/error";
import { createAdminAuth } from "./middleware/requireAdmin";
import { createAuthRouter } from "./routes/auth";
import { createJournalRouter } from "./routes/journal";
import { createTradesRouter } from "./routes/trades";
import type { ScreenshotStorage } from "./trades/screenshots";
import { TradeService } from "./trades/service";
import type { TradeStore } from "./trades/store";

export interface AppDeps {
  env: Env;
  store: TradeStore;
  screenshots: ScreenshotStorage;
  today?: () => string;
}

export function createApp({ env, store, screenshots, today }: AppDeps): Express {
  const app = express();
  const production = env.NODE_ENV === "production";

  const auth = createAdminAuth({
    secret: env.AUTH_JWT_SECRET,
    ttlSec: env.SESSION_TTL,
    secureCookie: production,
  });

  const service = new TradeService({
    store,
    screenshots,
    disciplinePolicy: env.DISCIPLINE_SCORE_POLICY,
    today,
  });

  app.use(compression());
  app.use(createHttpLogger({ quietPaths: ["/api/livez", "/api/readyz"] }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  setupSecurity(app, { production, allowedOrigins: [env.APP_ORIGIN] });

  const health = createHealthHandlers(store.kind);
  app.get("/api/livez", health.liveness);
  app.get("/api/readyz", health.readiness);

  app.use("/api/auth", createAuthRouter(auth, { username: env.ADMIN_USERNAME, password: env.ADMIN_PASSWORD }));
  app.use("/api", createJournalRouter(service, auth));
  app.use("/api/trades", createTradesRouter(service, auth, env.MAX_UPLOAD_MB));
  app.use("/uploads", express.static(env.UPLOAD_DIR));

  // Error middleware - must be last
  app.use(notFound);
  app.use(errorHandler);

  return app;
}

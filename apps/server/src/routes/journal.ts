import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { CSV_CONTENT_TYPE, CSV_FILENAME } from "@shared/analytics";
import { tradeFilterSchema } from "@shared/schemas";

import type { AdminAuth } from "../middleware/requireAdmin";
import type { TradeService } from "../trades/service";

/**
 * Owner dashboard, public journal and the closed-trade export.
 */
export function createJournalRouter(service: TradeService, auth: AdminAuth): Router {
  const router: Router = Router();

  router.get("/dashboard", auth.requireAdmin, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await service.dashboard());
    } catch (error) {
      next(error);
    }
  });

  router.get("/public", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = tradeFilterSchema.parse(req.query);
      res.json(await service.publicView(filters));
    } catch (error) {
      next(error);
    }
  });

  router.get("/public/export/csv", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const csv = await service.exportClosedCsv();
      res.setHeader("Content-Type", CSV_CONTENT_TYPE);
      res.setHeader("Content-Disposition", `attachment; filename=${CSV_FILENAME}`);
      res.send(csv);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import multer, { type FileFilterCallback } from "multer";
import { tradeFormSchema, tradeIdSchema } from "@shared/schemas";

import { HttpError } from "../middleware/error";
import type { AdminAuth } from "../middleware/requireAdmin";
import type { ScreenshotUploads, TradeService } from "../trades/service";

function createUpload(maxUploadMb: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadMb * 1024 * 1024,
    },
    fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
      if (file.mimetype.startsWith("image/")) {
        cb(null, true);
      } else {
        cb(new HttpError(400, "INVALID_FILE", "Only image screenshots are allowed"));
      }
    },
  }).fields([
    { name: "screenshotBefore", maxCount: 1 },
    { name: "screenshotAfter", maxCount: 1 },
  ]);
}

function uploadsFrom(req: Request): ScreenshotUploads {
  const files = req.files;
  if (!files || Array.isArray(files)) return {};
  return {
    before: files["screenshotBefore"]?.[0],
    after: files["screenshotAfter"]?.[0],
  };
}

export function createTradesRouter(service: TradeService, auth: AdminAuth, maxUploadMb: number): Router {
  const router: Router = Router();
  const upload = createUpload(maxUploadMb);

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = tradeIdSchema.parse(req.params.id);
      const detail = await service.getTrade(id, { includePrivate: auth.readAdmin(req) !== null });
      res.json(detail);
    } catch (error) {
      next(error);
    }
  });

  router.post("/", auth.requireAdmin, upload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = tradeFormSchema.parse(req.body);
      const trade = await service.createTrade(input, uploadsFrom(req));
      res.status(201).json({ trade });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id", auth.requireAdmin, upload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = tradeIdSchema.parse(req.params.id);
      const input = tradeFormSchema.parse(req.body);
      const trade = await service.updateTrade(id, input, uploadsFrom(req));
      res.json({ trade });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:id", auth.requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = tradeIdSchema.parse(req.params.id);
      await service.deleteTrade(id);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

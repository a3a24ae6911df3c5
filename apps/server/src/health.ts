import type { Request, Response } from "express";

import type { StorageKind } from "./trades/store";

let serverReady = true;

export function setServerReady(ready: boolean) {
  serverReady = ready;
}

export function createHealthHandlers(storage: StorageKind) {
  return {
    liveness(_req: Request, res: Response) {
      res.json({ ok: true, status: "live" });
    },

    readiness(_req: Request, res: Response) {
      res.status(serverReady ? 200 : 503).json({
        ok: serverReady,
        status: serverReady ? "ready" : "starting",
        storage,
        uptimeSec: Math.round(process.uptime()),
      });
    },
  };
}

import { createHash, timingSafeEqual } from "crypto";
import { Router } from "express";
import { loginSchema } from "@shared/schemas";

import type { AdminAuth } from "../middleware/requireAdmin";
import { logger } from "../logger";

export interface AdminCredentials {
  username: string;
  password: string;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Constant-time check; both fields are always compared.
 */
export function credentialsMatch(given: AdminCredentials, expected: AdminCredentials): boolean {
  const userOk = timingSafeEqual(digest(given.username), digest(expected.username));
  const passOk = timingSafeEqual(digest(given.password), digest(expected.password));
  return userOk && passOk;
}

export function createAuthRouter(auth: AdminAuth, credentials: AdminCredentials): Router {
  const router: Router = Router();

  router.post("/login", (req, res) => {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: "Username and password are required" });
    }

    const { username } = parsed.data;
    if (!credentialsMatch(parsed.data, credentials)) {
      logger.warn({ username }, "Failed admin login");
      return res.status(401).json({ ok: false, error: "Invalid username or password" });
    }

    auth.setAuthCookie(res, auth.signToken(username));
    res.json({ ok: true });
  });

  router.get("/status", (req, res) => {
    const admin = auth.readAdmin(req);
    if (!admin) {
      return res.status(401).json({ ok: false });
    }
    res.json({ ok: true, user: { username: admin.sub } });
  });

  router.post("/logout", (_req, res) => {
    auth.clearAuthCookie(res);
    res.json({ ok: true });
  });

  return router;
}

import type { Request, Response, NextFunction, CookieOptions } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";

export const COOKIE_NAME = "tb_auth";

const adminTokenSchema = z.object({
  sub: z.string(),
  typ: z.literal("admin"),
});

export type AdminTokenPayload = z.infer<typeof adminTokenSchema>;

export interface AuthConfig {
  secret: string;
  ttlSec: number;
  secureCookie: boolean;
}

export interface AdminAuth {
  signToken(username: string): string;
  readAdmin(req: Request): AdminTokenPayload | null;
  requireAdmin(req: Request, res: Response, next: NextFunction): void;
  setAuthCookie(res: Response, token: string): void;
  clearAuthCookie(res: Response): void;
}

export function createAdminAuth(config: AuthConfig): AdminAuth {
  const cookieOptions: CookieOptions = {
    httpOnly: true,
    sameSite: "lax",
    secure: config.secureCookie,
    path: "/",
  };

  function signToken(username: string): string {
    const payload: AdminTokenPayload = { sub: username, typ: "admin" };
    return jwt.sign(payload, config.secret, { expiresIn: config.ttlSec });
  }

  function readAdmin(req: Request): AdminTokenPayload | null {
    const raw: unknown = req.cookies?.[COOKIE_NAME];
    if (typeof raw !== "string" || raw === "") return null;

    try {
      const parsed = adminTokenSchema.safeParse(jwt.verify(raw, config.secret));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      if (err instanceof jwt.JsonWebTokenError) return null;
      throw err;
    }
  }

  function requireAdmin(req: Request, res: Response, next: NextFunction) {
    if (!readAdmin(req)) {
      res.status(401).json({ ok: false, error: { code: "UNAUTHORIZED", message: "Not authenticated" } });
      return;
    }
    next();
  }

  function setAuthCookie(res: Response, token: string) {
    res.cookie(COOKIE_NAME, token, { ...cookieOptions, maxAge: config.ttlSec * 1000 });
  }

  function clearAuthCookie(res: Response) {
    res.clearCookie(COOKIE_NAME, cookieOptions);
  }

  return { signToken, readAdmin, requireAdmin, setAuthCookie, clearAuthCookie };
}

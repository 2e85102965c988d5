import type { Request, Response, NextFunction } from "express";

import type { Role } from "../domain/enums.js";
import { verifyAccess } from "../modules/auth/tokens.js";

export type AuthContext = { userId: string; role: Role; jti: string };

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const hdr = req.get("authorization");
  if (!hdr || !hdr.startsWith("Bearer ")) {
    return res
      .status(401)
      .json({ error: { code: "UNAUTHORIZED", message: "Missing Bearer token" } });
  }
  const token = hdr.slice("Bearer ".length).trim();

  try {
    // verifyAccess enforces iss/aud/alg/exp and type === 'access'
    const claims = verifyAccess(token);
    req.auth = { userId: claims.sub, role: claims.role, jti: claims.jti };
  } catch (err) {
    return res.status(401).json({
      error: { code: "UNAUTHORIZED", message: err instanceof Error ? err.message : "Invalid token" },
    });
  }
  next();
}

export function requireRole(...roles: Role[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const auth = getAuth(req);
    if (!roles.includes(auth.role)) {
      return res.status(403).json({ error: { code: "FORBIDDEN", message: "Insufficient role" } });
    }
    next();
  };
}

export function getAuth(req: Request): AuthContext {
  const ctx = req.auth;
  if (!ctx) throw new Error("Auth context missing (requireAuth not applied)");
  return ctx;
}

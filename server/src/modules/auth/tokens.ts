/** JWT helpers: access tokens are minted by the identity service; this API verifies them. */
import { randomUUID } from "crypto";

import jwt from "jsonwebtoken";
import { z } from "zod";

import { env } from "../../config/env.js";
import { ROLES, type Role } from "../../domain/enums.js";

const AccessClaimsSchema = z.object({
  sub: z.string().min(1), // user id
  role: z.enum(ROLES),
  type: z.literal("access"),
  jti: z.string().min(1),
  exp: z.number().optional(),
});

export type AccessClaims = z.infer<typeof AccessClaimsSchema>;

export class InvalidTokenError extends Error {
  readonly code = "INVALID_TOKEN";
}

export function newJti(): string {
  return randomUUID();
}

/** Used by tests and the dev-token script. */
export function signAccessToken(input: { sub: string; role: Role; jti?: string; ttlSecs?: number }): string {
  return jwt.sign({ role: input.role, type: "access" }, env.JWT_SECRET, {
    algorithm: "HS256",
    subject: input.sub,
    expiresIn: input.ttlSecs ?? env.JWT_ACCESS_TTL_SECS,
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: input.jti ?? newJti(),
  });
}

export function verifyAccess(token: string): AccessClaims {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ["HS256"],
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
  });
  const claims = AccessClaimsSchema.safeParse(decoded);
  if (!claims.success) throw new InvalidTokenError("Invalid token claims");
  return claims.data;
}

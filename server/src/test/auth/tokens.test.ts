import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";

import { env } from "../../config/env.js";
import { InvalidTokenError, signAccessToken, verifyAccess } from "../../modules/auth/tokens.js";

describe("access tokens", () => {
  it("round-trips subject, role and jti", () => {
    const token = signAccessToken({ sub: "64c000000000000000000001", role: "host", jti: "jti-1" });
    expect(verifyAccess(token)).toMatchObject({ sub: "64c000000000000000000001", role: "host", type: "access", jti: "jti-1" });
  });

  it("rejects tokens that are not access tokens", () => {
    const token = jwt.sign({ type: "refresh", role: "guest" }, env.JWT_SECRET, {
      algorithm: "HS256",
      subject: "64c000000000000000000001",
      issuer: env.JWT_ISS,
      audience: env.JWT_AUD,
      jwtid: "jti-2",
    });
    expect(() => verifyAccess(token)).toThrow(InvalidTokenError);
  });

  it("rejects unknown roles", () => {
    const token = jwt.sign({ type: "access", role: "superuser" }, env.JWT_SECRET, {
      algorithm: "HS256",
      subject: "64c000000000000000000001",
      issuer: env.JWT_ISS,
      audience: env.JWT_AUD,
      jwtid: "jti-3",
    });
    expect(() => verifyAccess(token)).toThrow("Invalid token claims");
  });

  it("rejects another audience", () => {
    const token = jwt.sign({ type: "access", role: "guest" }, env.JWT_SECRET, {
      algorithm: "HS256",
      subject: "64c000000000000000000001",
      issuer: env.JWT_ISS,
      audience: "someone-else",
      jwtid: "jti-4",
    });
    expect(() => verifyAccess(token)).toThrow(jwt.JsonWebTokenError);
  });
});

// server/scripts/dev-token.ts
/**
 * Mints an access token against the local JWT_SECRET for manual API calls.
 *
 *   npm run dev-token -- --sub 64c000000000000000000001 --role guest
 */
import "dotenv/config";
import { parseArgs } from "node:util";

import { z } from "zod";

import { ROLES } from "../src/domain/enums.js";
import { signAccessToken } from "../src/modules/auth/tokens.js";

const { values } = parseArgs({
  options: {
    sub: { type: "string" },
    role: { type: "string", default: "guest" },
    ttl: { type: "string", default: "3600" },
  },
});

const args = z
  .object({
    sub: z.string().regex(/^[0-9a-f]{24}$/i, "--sub must be a 24-char hex id"),
    role: z.enum(ROLES),
    ttl: z.coerce.number().int().positive(),
  })
  .parse(values);

process.stdout.write(`${signAccessToken({ sub: args.sub, role: args.role, ttlSecs: args.ttl })}\n`);

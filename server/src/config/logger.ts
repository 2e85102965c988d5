// server/src/config/logger.ts
/** Winston logger: JSON lines tagged with the service, secrets and contact details redacted. morgan writes into it. */
import { createLogger, format, transports } from "winston";

import { env } from "./env.js";

const SECRET_KEYS = /authorization|password|token|secret|signature/i;
const CONTACT_KEYS = /^(email|phone)$/i;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/** guest@example.com -> g***@example.com; phones keep their last two digits. */
function maskContact(value: unknown): unknown {
  if (typeof value !== "string" || !value) return value;
  const at = value.indexOf("@");
  if (at > 0) return `${value[0]}***${value.slice(at)}`;
  return value.length > 2 ? `***${value.slice(-2)}` : "***";
}

export const redact = (obj: Record<string, unknown>, depth = 0): Record<string, unknown> => {
  const clone: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_KEYS.test(key)) clone[key] = "[redacted]";
    else if (CONTACT_KEYS.test(key)) clone[key] = maskContact(value);
    else if (isPlainObject(value) && depth < 4) clone[key] = redact(value, depth + 1);
    else clone[key] = value;
  }
  return clone;
};

export const logger = createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: "stayhold-server" },
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.printf((info) => {
      const { timestamp, level, message, ...rest } = info;
      return JSON.stringify({ timestamp, level, message, ...redact(rest) });
    })
  ),
  transports: [new transports.Console()],
});

// morgan stream
export const httpLogStream = {
  write: (line: string) => logger.info(line.trim(), { source: "http" }),
};

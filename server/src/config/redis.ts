/** Redis client singleton + ping + namespaced key builder */
import { createClient } from "redis";

import type { PingResult } from "./db.js";
import { env } from "./env.js";
import { logger } from "./logger.js";

type Client = ReturnType<typeof createClient>;

let client: Client | null = null;

function getClient(): Client {
  if (!client) {
    // rediss:// urls switch the socket to TLS
    client = createClient({
      url: env.REDIS_URL,
      socket: {
        connectTimeout: 3000,
        keepAlive: 5000,
        reconnectStrategy: (retries) => {
          // wait up to 3s between retries
          const delay = Math.min(retries * 200, 3000);
          logger.warn("redis reconnecting", { delay });
          return delay;
        },
      },
    });

    client.on("error", (e: unknown) => {
      logger.warn("redis client error", { message: e instanceof Error ? e.message : String(e) });
    });

    client.on("ready", () => {
      logger.info("redis connected");
    });
  }

  return client;
}

export async function redisClient(): Promise<Client> {
  const c = getClient();
  if (!c.isOpen) await c.connect();
  return c;
}

export function key(...parts: Array<string | number>): string {
  return `${env.REDIS_NAMESPACE}:${parts.join(":")}`;
}

export async function pingRedis(): Promise<PingResult> {
  try {
    const c = await redisClient();
    await c.ping();
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

export async function closeRedis() {
  if (client?.isOpen) await client.quit();
}

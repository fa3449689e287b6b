import { createClient } from "redis";

import { errorMessage } from "../../shared/errors.js";
import type { Logger } from "../../shared/logger.js";

export type AppRedisClient = ReturnType<typeof createClient>;

const RECONNECT_STEP_MS = 100;
const RECONNECT_MAX_DELAY_MS = 2_000;

/** Linear backoff between reconnect attempts, capped. */
export function reconnectDelayMs(retries: number): number {
  return Math.min(retries * RECONNECT_STEP_MS, RECONNECT_MAX_DELAY_MS);
}

export async function connectRedis(
  url: string,
  clientName: string,
  logger: Logger
): Promise<AppRedisClient> {
  const client = createClient({
    url,
    name: clientName,
    socket: { reconnectStrategy: reconnectDelayMs }
  });
  client.on("error", (error: unknown) => {
    logger.error("redis client error", { client: clientName, error: errorMessage(error) });
  });

  await client.connect();
  return client;
}

/** Quits cleanly, or drops the connection if QUIT itself fails. */
export async function closeRedis(
  client: Pick<AppRedisClient, "quit" | "disconnect">,
  logger: Logger
): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    logger.warn("redis quit failed, disconnecting", { error: errorMessage(error) });
    await client.disconnect();
  }
}

/**
 * Runs `onSignal` once, on the first SIGINT or SIGTERM. Returns a function
 * that removes the listeners.
 */
export function onShutdownSignal(
  logger: Logger,
  onSignal: (signal: NodeJS.Signals) => void
): () => void {
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  const listener = (signal: NodeJS.Signals) => {
    removeListeners();
    logger.info("shutdown signal received", { signal });
    onSignal(signal);
  };
  const removeListeners = () => {
    for (const signal of signals) {
      process.off(signal, listener);
    }
  };

  for (const signal of signals) {
    process.once(signal, listener);
  }
  return removeListeners;
}

/**
 * @stakewell/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; running in unsecured mode");
  }

  const { app, service } = createApp({
    serviceConfig: {
      administrator: config.ADMIN_ADDRESS,
      custody: config.LEDGER_ADDRESS,
      baseAssetSymbol: config.BASE_ASSET_SYMBOL,
      rewardAssetSymbol: config.REWARD_ASSET_SYMBOL,
      onSubscriberError: (err, event) => {
        logger.error({ err, type: event.type, account: event.account }, "Event subscriber failed");
      },
    },
    logFn: ({ level, ...entry }) => {
      logger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    auth: authConfig,
  });

  const eventLog = service.eventStore.subscribeAll((stored) => {
    logger.info(
      {
        type: stored.event.type,
        streamId: stored.streamId,
        globalPosition: stored.globalPosition,
        correlationId: stored.event.metadata.correlationId,
      },
      "Event appended",
    );
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      administrator: config.ADMIN_ADDRESS,
      custody: config.LEDGER_ADDRESS,
    },
    "Stakewell node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    eventLog.unsubscribe();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

/**
 * @collegium/node - Entry point.
 *
 * Loads config, starts the HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys, parseBoardMembers } from "./config.js";
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
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured: X-Account header names the caller");
  }

  const initialBoard = parseBoardMembers(config.BOARD_MEMBERS);
  if (initialBoard.length === 0) {
    logger.warn("BOARD_MEMBERS is empty: nobody can vote on teacher admissions");
  }
  if (config.DEV_FAUCET) {
    logger.warn("DEV_FAUCET enabled: anyone with a caller identity can mint");
  }

  const { app, service } = createApp({
    serviceConfig: {
      owner: config.ORG_OWNER,
      treasuryAccount: config.ORG_TREASURY,
      initialBoard,
      proposalDurationSeconds: config.PROPOSAL_DURATION_SECONDS,
      paymentAsset: config.PAYMENT_ASSET,
      paymentDecimals: config.PAYMENT_DECIMALS,
    },
    serviceOptions: { logger: logger.child({ component: "academy" }) },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth: authConfig,
    devFaucet: config.DEV_FAUCET,
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
      owner: config.ORG_OWNER,
      treasury: config.ORG_TREASURY,
      board: initialBoard.length,
    },
    "Collegium node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
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

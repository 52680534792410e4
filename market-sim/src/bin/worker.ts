#!/usr/bin/env node

import { createBus, createLogger } from "@housing-sim/shared-utils";
import { Pool } from "pg";
import { BusAdapter } from "../adapters/bus.adapter";
import { SqlMarketRowsRepo } from "../adapters/rows.sql";
import {
  busCfg,
  dbCfg,
  loadSimulationDefaults,
  redisUrl,
  SERVICE_NAME,
} from "../config/env";
import { createHandlers } from "../core/handlers";

const logger = createLogger(SERVICE_NAME);

let isShuttingDown = false;
const shutdownHandlers: Array<() => Promise<void>> = [];

/**
 * Main worker process
 */
async function main(): Promise<void> {
  logger.info("🚀 Starting Market Simulation Worker...");
  logger.info(`Environment: ${process.env.NODE_ENV || "development"}`);

  const defaults = loadSimulationDefaults();
  logger.info(`Simulation defaults: ${JSON.stringify(defaults)}`);

  logger.info("📊 Connecting to database...");
  const dbPool = new Pool({
    host: dbCfg.host,
    port: dbCfg.port,
    user: dbCfg.user,
    password: dbCfg.password,
    database: dbCfg.name,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  const dbClient = await dbPool.connect();
  logger.info("✅ Database connected successfully");
  dbClient.release();

  shutdownHandlers.push(async () => {
    logger.info("🔌 Closing database connections...");
    await dbPool.end();
  });

  logger.info(`🔄 Connecting to ${busCfg.type} bus...`);
  const sharedBus = createBus(
    { type: busCfg.type, serviceName: SERVICE_NAME, redisUrl },
    logger
  );
  const busPort = new BusAdapter(sharedBus);

  shutdownHandlers.push(async () => {
    logger.info("🔌 Closing bus connections...");
    await busPort.close();
  });

  const handlers = createHandlers(
    new SqlMarketRowsRepo(dbPool),
    busPort,
    defaults,
    logger
  );
  await handlers.subscribeToEvents();

  logger.info("✅ Market Simulation Worker is ready!");
  logger.info("📊 Listening for simulation_requested events...");

  await waitForShutdown();
}

/**
 * Wait for a shutdown signal, then run every shutdown handler
 */
async function waitForShutdown(): Promise<void> {
  return new Promise((resolve) => {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGUSR2"];

    signals.forEach((signal) => {
      process.on(signal, () => {
        if (isShuttingDown) return;

        logger.info(`🛑 Received ${signal}, starting graceful shutdown...`);
        isShuttingDown = true;

        Promise.all(shutdownHandlers.map((handler) => handler()))
          .then(() => logger.info("✅ Graceful shutdown completed"))
          .catch((error) => logger.error("❌ Error during shutdown:", error))
          .finally(resolve);
      });
    });
  });
}

process.on("unhandledRejection", (reason) => {
  logger.error("💥 Unhandled Rejection:", reason);
  process.exit(1);
});

if (require.main === module) {
  main().catch((error) => {
    logger.error("💥 Worker crashed:", error);
    process.exit(1);
  });
}

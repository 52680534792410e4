#!/usr/bin/env node

import { createBus, createLogger } from "@housing-sim/shared-utils";
import { Pool } from "pg";
import { BusAdapter } from "../adapters/bus.adapter";
import { SqlMarketRowsRepo } from "../adapters/rows.sql";
import {
  apiCfg,
  dbCfg,
  loadSimulationDefaults,
  SERVICE_NAME,
} from "../config/env";
import { createHandlers } from "../core/handlers";
import { createApp } from "../http/server";

const logger = createLogger(`${SERVICE_NAME}-api`);

async function main(): Promise<void> {
  const defaults = loadSimulationDefaults();

  const dbPool = new Pool({
    host: dbCfg.host,
    port: dbCfg.port,
    user: dbCfg.user,
    password: dbCfg.password,
    database: dbCfg.name,
    max: 5,
  });

  // Runs over HTTP publish nothing; the in-memory bus only satisfies the port
  const busPort = new BusAdapter(
    createBus({ type: "memory", serviceName: `${SERVICE_NAME}-api` }, logger)
  );

  const handlers = createHandlers(
    new SqlMarketRowsRepo(dbPool),
    busPort,
    defaults,
    logger
  );

  const app = createApp({
    handlers,
    defaults,
    logger,
    maxRowsPerRequest: apiCfg.maxRowsPerRequest,
  });

  const server = app.listen(apiCfg.port, () => {
    logger.info(`🚀 Market simulation API listening on port ${apiCfg.port}`);
  });

  const shutdown = () => {
    logger.info("🛑 Shutting down API...");
    server.close(() => {
      dbPool
        .end()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error("Error closing database pool:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

if (require.main === module) {
  main().catch((error) => {
    logger.error("💥 API failed to start:", error);
    process.exit(1);
  });
}

/**
 * Environment configuration for the market simulation service
 */

import {
  createDatabaseConfig,
  createRedisConfig,
  createServiceConfig,
  DatabaseConfig,
} from "@housing-sim/shared-utils";
import * as dotenv from "dotenv";
import { SimulationConfig } from "../core/dto";
import { simulationConfigSchema } from "../core/validation";

dotenv.config();

export const SERVICE_NAME = "market-sim";

export const dbCfg: DatabaseConfig = createDatabaseConfig(SERVICE_NAME, 5438);

export const redisUrl = createRedisConfig().url;

export const serviceCfg = createServiceConfig(3010);

export const busCfg = {
  type: process.env.BUS_TYPE === "memory" ? ("memory" as const) : ("redis" as const),
};

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  return raw === undefined || raw === "" ? fallback : Number(raw);
}

/**
 * Read simulation defaults from SIM_* variables
 * @throws ZodError when a variable holds an invalid value
 */
export function loadSimulationDefaults(
  env: NodeJS.ProcessEnv = process.env
): SimulationConfig {
  const read = (name: string, fallback: number) =>
    readNumber(env, name, fallback);

  return simulationConfigSchema.parse({
    populationSize: read("SIM_POPULATION_SIZE", 1000),
    years: read("SIM_YEARS", 20),
    income: {
      minimum: read("SIM_INCOME_MIN", 20000),
      average: read("SIM_INCOME_AVG", 60000),
      standardDeviation: read("SIM_INCOME_STDDEV", 20000),
      maximum: read("SIM_INCOME_MAX", 200000),
    },
    dependents: {
      minimum: read("SIM_DEPENDENTS_MIN", 0),
      maximum: read("SIM_DEPENDENTS_MAX", 5),
    },
    downPaymentPercentage: read("SIM_DOWN_PAYMENT_PCT", 0.2),
    savingRate: read("SIM_SAVING_RATE", 0.3),
    interestRate: read("SIM_INTEREST_RATE", 0.05),
    clearingPolicy: env.SIM_CLEARING_POLICY ?? "INCOME_DESCENDING",
    referenceYear: read("SIM_REFERENCE_YEAR", 2024),
    deriveQualityScores: env.SIM_DERIVE_QUALITY_SCORES === "true",
    seed: env.SIM_SEED ?? "housing-sim",
    maxIncomeDraws: read("SIM_MAX_INCOME_DRAWS", 10000),
  });
}

export const apiCfg = {
  port: serviceCfg.port ?? 3010,
  maxRowsPerRequest: readNumber(process.env, "API_MAX_ROWS", 50000),
};

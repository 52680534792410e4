import { Logger, silentLogger } from "@housing-sim/shared-utils";
import { randomUUID } from "crypto";
import { Agent } from "./agent";
import { clearMarket } from "./clearing";
import {
  ClearingPolicy,
  ClearingResult,
  DependentsRange,
  IncomeDistribution,
  PropertyRow,
  SimulationConfig,
  SimulationReport,
} from "./dto";
import { MarketError } from "./errors";
import { Inventory } from "./inventory";
import * as metrics from "./metrics";
import { generateAgents } from "./population";
import { SeededRNG } from "./random";

export enum SimulationStage {
  Uninitialized = "UNINITIALIZED",
  MarketBuilt = "MARKET_BUILT",
  PopulationBuilt = "POPULATION_BUILT",
  SavingsProjected = "SAVINGS_PROJECTED",
  Cleared = "CLEARED",
}

export interface SimulationOptions {
  runId?: string;
  logger?: Logger;
}

/**
 * Owns one run. Stages advance strictly in order:
 * buildMarket -> generatePopulation -> projectAllSavings -> clearMarket,
 * and each may run only once.
 */
export class Simulation {
  readonly runId: string;
  private stage = SimulationStage.Uninitialized;
  private rng: SeededRNG;
  private logger: Logger;
  private inventory: Inventory | null = null;
  private agents: Agent[] = [];
  private clearing: ClearingResult | null = null;

  constructor(
    private readonly config: SimulationConfig,
    options: SimulationOptions = {}
  ) {
    this.runId = options.runId ?? randomUUID();
    this.logger = options.logger ?? silentLogger;
    this.rng = new SeededRNG(config.seed);
  }

  getStage(): SimulationStage {
    return this.stage;
  }

  getAgents(): readonly Agent[] {
    return this.agents;
  }

  getInventory(): Inventory {
    if (this.inventory === null) {
      throw MarketError.invalidState("Market has not been built yet");
    }
    return this.inventory;
  }

  getClearingResult(): ClearingResult {
    if (this.clearing === null) {
      throw MarketError.invalidState("Market has not been cleared yet");
    }
    return this.clearing;
  }

  buildMarket(rows: PropertyRow[]): Inventory {
    this.expectStage(SimulationStage.Uninitialized, "buildMarket");

    const inventory = Inventory.fromRows(rows);
    if (this.config.deriveQualityScores) {
      inventory.assignQualityScores(this.config.referenceYear);
    }

    this.inventory = inventory;
    this.stage = SimulationStage.MarketBuilt;
    this.logger.debug(`Run ${this.runId}: market built with ${inventory.size} properties`);
    return inventory;
  }

  generatePopulation(
    count: number = this.config.populationSize,
    income: IncomeDistribution = this.config.income,
    dependents: DependentsRange = this.config.dependents
  ): readonly Agent[] {
    this.expectStage(SimulationStage.MarketBuilt, "generatePopulation");

    this.agents = generateAgents(this.rng, {
      count,
      income,
      dependents,
      savingRate: this.config.savingRate,
      interestRate: this.config.interestRate,
      referenceYear: this.config.referenceYear,
      maxIncomeDraws: this.config.maxIncomeDraws,
    });

    this.stage = SimulationStage.PopulationBuilt;
    this.logger.debug(`Run ${this.runId}: generated ${this.agents.length} agents`);
    return this.agents;
  }

  projectAllSavings(years: number = this.config.years): void {
    this.expectStage(SimulationStage.PopulationBuilt, "projectAllSavings");

    for (const agent of this.agents) {
      agent.projectSavings(years);
    }

    this.stage = SimulationStage.SavingsProjected;
  }

  clearMarket(policy: ClearingPolicy = this.config.clearingPolicy): ClearingResult {
    this.expectStage(SimulationStage.SavingsProjected, "clearMarket");

    const result = clearMarket(
      this.agents,
      this.getInventory(),
      policy,
      this.rng,
      this.logger
    );

    this.clearing = result;
    this.stage = SimulationStage.Cleared;
    this.logger.info(
      `Run ${this.runId}: ${result.purchases.length} purchases, ${result.unhoused.length} agents unhoused (${policy})`
    );
    return result;
  }

  ownershipRate(): number {
    this.expectStage(SimulationStage.Cleared, "ownershipRate");
    return metrics.ownershipRate(this.agents);
  }

  availabilityRate(): number {
    this.expectStage(SimulationStage.Cleared, "availabilityRate");
    return metrics.availabilityRate(this.getInventory());
  }

  /**
   * Final state of the run for downstream reporting
   */
  snapshot(): SimulationReport {
    this.expectStage(SimulationStage.Cleared, "snapshot");

    return {
      runId: this.runId,
      config: this.config,
      ownershipRate: this.ownershipRate(),
      availabilityRate: this.availabilityRate(),
      clearing: this.getClearingResult(),
      properties: this.getInventory()
        .all()
        .map((property) => property.toSnapshot()),
      agents: this.agents.map((agent) => agent.toSnapshot()),
      completedAt: new Date().toISOString(),
    };
  }

  private expectStage(expected: SimulationStage, operation: string): void {
    if (this.stage !== expected) {
      throw MarketError.invalidState(
        `${operation} requires stage ${expected}, but the run is at ${this.stage}`
      );
    }
  }
}

/**
 * Drive a whole run over the given market rows
 */
export function runSimulation(
  rows: PropertyRow[],
  config: SimulationConfig,
  options: SimulationOptions = {}
): SimulationReport {
  const simulation = new Simulation(config, options);
  simulation.buildMarket(rows);
  simulation.generatePopulation();
  simulation.projectAllSavings();
  simulation.clearMarket();
  return simulation.snapshot();
}

import { Logger } from "@housing-sim/shared-utils";
import { ZodError } from "zod";
import {
  SimulationConfig,
  SimulationFailedEvt,
  SimulationReport,
  SimulationRequestedEvt,
} from "./dto";
import { isMarketError, MarketError } from "./errors";
import { BusPort, MarketRowsReadPort } from "./ports";
import { runSimulation } from "./simulation";
import { resolveSimulationConfig } from "./validation";

export class SimulationHandlers {
  private processed = 0;
  private failed = 0;

  constructor(
    private rowsRepo: MarketRowsReadPort,
    private busPort: BusPort,
    private defaults: SimulationConfig,
    private logger: Logger
  ) {}

  /**
   * Load the market, run a full simulation and return its report
   * @throws MarketError NotFound when the market has no rows
   * @throws ZodError when the overrides are invalid
   */
  async simulate(
    runId: string,
    marketId: string,
    overrides?: Record<string, unknown>
  ): Promise<SimulationReport> {
    const config = resolveSimulationConfig(this.defaults, overrides);

    const rows = await this.rowsRepo.loadMarketRows(marketId);
    if (!rows) {
      throw MarketError.notFound(`Market ${marketId} not found`);
    }

    this.logger.info(
      `Running simulation ${runId} on market ${marketId} (${rows.length} properties, ${config.populationSize} agents)`
    );

    return runSimulation(rows, config, { runId, logger: this.logger });
  }

  /**
   * Handle simulation_requested event. Domain and validation failures are
   * published as simulation_failed; anything else is rethrown.
   */
  async handleSimulationRequested(evt: SimulationRequestedEvt): Promise<void> {
    try {
      const report = await this.simulate(evt.id, evt.marketId, evt.overrides);

      await this.busPort.publish({
        type: "simulation_completed",
        id: evt.id,
        marketId: evt.marketId,
        ownershipRate: report.ownershipRate,
        availabilityRate: report.availabilityRate,
        purchases: report.clearing.purchases.length,
        agents: report.agents.length,
        properties: report.properties.length,
      });

      this.processed++;
      this.logger.info(`Published simulation_completed for ${evt.id}`);
    } catch (error) {
      const failure = this.toFailure(evt, error);
      if (!failure) {
        this.logger.error(`Simulation ${evt.id} crashed:`, error);
        throw error;
      }

      this.failed++;
      this.logger.warn(
        `Simulation ${evt.id} failed (${failure.kind}): ${failure.message}`
      );
      await this.busPort.publish(failure);
    }
  }

  async subscribeToEvents(): Promise<void> {
    await this.busPort.subscribe("simulation_requested", (evt) =>
      this.handleSimulationRequested(evt)
    );
    this.logger.info("Subscribed to simulation_requested events");
  }

  getMetrics() {
    return { processed: this.processed, failed: this.failed };
  }

  private toFailure(
    evt: SimulationRequestedEvt,
    error: unknown
  ): SimulationFailedEvt | null {
    if (isMarketError(error)) {
      return {
        type: "simulation_failed",
        id: evt.id,
        marketId: evt.marketId,
        kind: error.kind,
        message: error.message,
      };
    }
    if (error instanceof ZodError) {
      return {
        type: "simulation_failed",
        id: evt.id,
        marketId: evt.marketId,
        kind: "InvalidConfig",
        message: error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      };
    }
    return null;
  }
}

export function createHandlers(
  rowsRepo: MarketRowsReadPort,
  busPort: BusPort,
  defaults: SimulationConfig,
  logger: Logger
): SimulationHandlers {
  return new SimulationHandlers(rowsRepo, busPort, defaults, logger);
}

export * from "./core/dto";
export { Agent, annuityFutureValue } from "./core/agent";
export { clearMarket, orderAgents } from "./core/clearing";
export { isMarketError, MarketError } from "./core/errors";
export type { MarketErrorKind } from "./core/errors";
export { createHandlers, SimulationHandlers } from "./core/handlers";
export { Inventory } from "./core/inventory";
export { availabilityRate, ownershipRate } from "./core/metrics";
export { generateAgents, sampleIncome } from "./core/population";
export type { BusPort, MarketRowsReadPort } from "./core/ports";
export { ageBandScore, Property } from "./core/property";
export { SeededRNG } from "./core/random";
export { isSegment, parseSegment } from "./core/segments";
export { runSimulation, Simulation, SimulationStage } from "./core/simulation";
export {
  parsePropertyRows,
  resolveSimulationConfig,
  simulationConfigSchema,
} from "./core/validation";

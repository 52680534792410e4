import {
  PropertyRow,
  SimulationCompletedEvt,
  SimulationFailedEvt,
  SimulationRequestedEvt,
} from "./dto";

// Market seed rows, as produced by the external loader
export interface MarketRowsReadPort {
  loadMarketRows(marketId: string): Promise<PropertyRow[] | null>;
}

// Bus
export interface BusPort {
  subscribe(
    topic: "simulation_requested",
    handler: (evt: SimulationRequestedEvt) => Promise<void>
  ): Promise<void>;
  publish(evt: SimulationCompletedEvt | SimulationFailedEvt): Promise<void>;
  close?(): Promise<void>;
}

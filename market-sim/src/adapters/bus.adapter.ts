import {
  BusPort as SharedBusPort,
  SimulationRequestedEvent,
} from "@housing-sim/shared-utils";
import {
  SimulationCompletedEvt,
  SimulationFailedEvt,
  SimulationRequestedEvt,
} from "../core/dto";
import { BusPort as LocalBusPort } from "../core/ports";

const EVENT_VERSION = "1.0.0";

export function fromSharedRequest(
  event: SimulationRequestedEvent
): SimulationRequestedEvt {
  return {
    type: "simulation_requested",
    id: event.id,
    marketId: event.data.marketId,
    overrides: event.data.overrides,
  };
}

/**
 * Bridges the shared bus interface with the simulator's bus port
 */
export class BusAdapter implements LocalBusPort {
  constructor(private sharedBus: SharedBusPort) {}

  async subscribe(
    topic: "simulation_requested",
    handler: (evt: SimulationRequestedEvt) => Promise<void>
  ): Promise<void> {
    return this.sharedBus.subscribe(topic, (event) =>
      handler(fromSharedRequest(event))
    );
  }

  async publish(evt: SimulationCompletedEvt | SimulationFailedEvt): Promise<void> {
    const timestamp = new Date().toISOString();

    if (evt.type === "simulation_completed") {
      const { type, id, ...data } = evt;
      return this.sharedBus.publish({
        type,
        id,
        timestamp,
        version: EVENT_VERSION,
        data,
      });
    }

    const { type, id, ...data } = evt;
    return this.sharedBus.publish({
      type,
      id,
      timestamp,
      version: EVENT_VERSION,
      data,
    });
  }

  async close(): Promise<void> {
    if (this.sharedBus.close) {
      return this.sharedBus.close();
    }
  }
}

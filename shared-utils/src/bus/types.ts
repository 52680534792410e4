/**
 * Standard event types used across the housing simulator
 */
export const EVENT_TYPES = [
  "simulation_requested",
  "simulation_completed",
  "simulation_failed",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

/**
 * Specific event interfaces
 */
export interface SimulationRequestedEvent extends BaseEvent {
  type: "simulation_requested";
  data: {
    marketId: string;
    overrides?: Record<string, unknown>;
  };
}

export interface SimulationCompletedEvent extends BaseEvent {
  type: "simulation_completed";
  data: {
    marketId: string;
    ownershipRate: number;
    availabilityRate: number;
    purchases: number;
    agents: number;
    properties: number;
  };
}

export interface SimulationFailedEvent extends BaseEvent {
  type: "simulation_failed";
  data: {
    marketId: string;
    kind: string;
    message: string;
  };
}

export type BusEvent =
  | SimulationRequestedEvent
  | SimulationCompletedEvent
  | SimulationFailedEvent;

export type EventOf<K extends EventType> = Extract<BusEvent, { type: K }>;

/**
 * Event handler function type
 */
export type EventHandler<T extends BusEvent = BusEvent> = (
  event: T
) => Promise<void>;

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

export function isEventOf<K extends EventType>(
  event: BusEvent,
  topic: K
): event is EventOf<K> {
  return event.type === topic;
}

/**
 * Shape check for events arriving over the wire
 */
export function isBusEvent(value: unknown): value is BusEvent {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !isEventType(value.type)) return false;
  if (!("id" in value) || typeof value.id !== "string") return false;
  if (!("timestamp" in value) || typeof value.timestamp !== "string") {
    return false;
  }
  if (!("data" in value)) return false;

  // Every topic's payload is keyed by market
  const data = value.data;
  return (
    typeof data === "object" &&
    data !== null &&
    "marketId" in data &&
    typeof data.marketId === "string"
  );
}

/**
 * Standard bus port interface
 */
export interface BusPort {
  /**
   * Subscribe to events of a specific type
   */
  subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventOf<K>>
  ): Promise<void>;

  /**
   * Publish an event to a topic
   */
  publish(event: BusEvent): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
  retryDelayMs?: number;
}

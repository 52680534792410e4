import { Agent } from "./agent";
import { Inventory } from "./inventory";

/**
 * Share of agents holding a property; 0 for an empty population
 */
export function ownershipRate(agents: readonly Agent[]): number {
  if (agents.length === 0) return 0;
  const owners = agents.filter((agent) => agent.property !== null).length;
  return owners / agents.length;
}

/**
 * Share of properties still on the market; 0 for an empty inventory
 */
export function availabilityRate(inventory: Inventory): number {
  if (inventory.size === 0) return 0;
  return inventory.availableCount() / inventory.size;
}

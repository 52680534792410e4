import { Logger, silentLogger } from "@housing-sim/shared-utils";
import { Agent } from "./agent";
import { ClearingPolicy, ClearingResult, Purchase } from "./dto";
import { Inventory } from "./inventory";
import { SeededRNG } from "./random";

/**
 * Order agents for a clearing pass. Income sorts are stable, so agents with
 * equal income keep their population order.
 */
export function orderAgents(
  agents: readonly Agent[],
  policy: ClearingPolicy,
  rng: SeededRNG
): Agent[] {
  switch (policy) {
    case "INCOME_DESCENDING":
      return [...agents].sort((a, b) => b.annualIncome - a.annualIncome);
    case "INCOME_ASCENDING":
      return [...agents].sort((a, b) => a.annualIncome - b.annualIncome);
    case "RANDOM":
      return rng.shuffle(agents);
  }
}

interface ClearingState {
  readonly inventory: Inventory;
  readonly purchases: Purchase[];
  readonly unhoused: number[];
}

/**
 * Single sequential allocation pass. Each agent sees every purchase made by
 * the agents before it; the inventory only ever travels inside the fold
 * state.
 */
export function clearMarket(
  agents: readonly Agent[],
  inventory: Inventory,
  policy: ClearingPolicy,
  rng: SeededRNG,
  logger: Logger = silentLogger
): ClearingResult {
  const ordered = orderAgents(agents, policy, rng);

  const initial: ClearingState = { inventory, purchases: [], unhoused: [] };
  const final = ordered.reduce<ClearingState>((state, agent) => {
    const purchase = agent.attemptPurchase(state.inventory);
    if (purchase) {
      state.purchases.push(purchase);
      logger.debug(
        `Agent ${agent.id} bought property ${purchase.propertyId} for $${purchase.price}`
      );
    } else if (agent.property === null) {
      state.unhoused.push(agent.id);
      logger.debug(`Agent ${agent.id} could not find a suitable property`);
    }
    return state;
  }, initial);

  return {
    policy,
    order: ordered.map((agent) => agent.id),
    purchases: final.purchases,
    unhoused: final.unhoused,
  };
}

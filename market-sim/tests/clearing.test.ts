import { Logger } from "@housing-sim/shared-utils";
import { describe, expect, it, vi } from "vitest";
import { Agent, AgentInit } from "../src/core/agent";
import { clearMarket, orderAgents } from "../src/core/clearing";
import { Inventory } from "../src/core/inventory";
import { availabilityRate, ownershipRate } from "../src/core/metrics";
import { generateAgents } from "../src/core/population";
import { SeededRNG } from "../src/core/random";
import { marketRows, testConfig } from "./fixtures";

const agent = (init: Partial<AgentInit> & Pick<AgentInit, "id">): Agent =>
  new Agent({
    annualIncome: 50000,
    dependents: 0,
    segment: "AVERAGE",
    savingRate: 0.3,
    interestRate: 0.05,
    referenceYear: 2024,
    ...init,
  });

describe("clearMarket", () => {
  it("should let the richer agent buy the single property under descending income", () => {
    const inventory = Inventory.fromRows([
      { id: 1, price: 100000, area: 1000, bedrooms: 2, year_built: 2020 },
    ]);
    const a = agent({ id: 1, annualIncome: 500000, savings: 150000 });
    const b = agent({ id: 2, annualIncome: 40000, savings: 10000 });

    const result = clearMarket([b, a], inventory, "INCOME_DESCENDING", new SeededRNG("s"));

    expect(result.order).toEqual([1, 2]);
    expect(result.purchases).toEqual([{ agentId: 1, propertyId: 1, price: 100000 }]);
    expect(result.unhoused).toEqual([2]);
    expect(a.property?.id).toBe(1);
    expect(b.property).toBeNull();
    expect(availabilityRate(inventory)).toBe(0);
    expect(ownershipRate([a, b])).toBe(0.5);
  });

  it("should log the outcome for every agent", () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const inventory = Inventory.fromRows([
      { id: 1, price: 100000, area: 1000, bedrooms: 2, year_built: 2020 },
    ]);
    const a = agent({ id: 1, annualIncome: 500000, savings: 150000 });
    const b = agent({ id: 2, annualIncome: 40000, savings: 10000 });

    clearMarket([a, b], inventory, "INCOME_DESCENDING", new SeededRNG("s"), logger);

    expect(vi.mocked(logger.debug).mock.calls).toEqual([
      ["Agent 1 bought property 1 for $100000"],
      ["Agent 2 could not find a suitable property"],
    ]);
  });

  it("should hand scarce inventory to whoever goes first", () => {
    const rows = [{ id: 1, price: 150000, area: 1000, bedrooms: 2, year_built: 2000 }];
    const make = () => [
      agent({ id: 1, annualIncome: 100000, savings: 200000 }),
      agent({ id: 2, annualIncome: 50000, savings: 200000 }),
    ];

    const descending = clearMarket(make(), Inventory.fromRows(rows), "INCOME_DESCENDING", new SeededRNG("s"));
    const ascending = clearMarket(make(), Inventory.fromRows(rows), "INCOME_ASCENDING", new SeededRNG("s"));

    expect(descending.purchases.map((p) => p.agentId)).toEqual([1]);
    expect(ascending.purchases.map((p) => p.agentId)).toEqual([2]);
  });

  it("should leave availability untouched when a FANCY agent cannot afford anything", () => {
    const inventory = Inventory.fromRows([
      { id: 1, price: 500000, area: 2500, bedrooms: 4, year_built: 2022, quality_score: 5 },
    ]);
    const fancy = agent({ id: 1, segment: "FANCY", savings: 100000 });

    const result = clearMarket([fancy], inventory, "RANDOM", new SeededRNG("s"));

    expect(result.purchases).toEqual([]);
    expect(result.unhoused).toEqual([1]);
    expect(availabilityRate(inventory)).toBe(1);
  });

  it("should never assign one property to two agents", () => {
    const rng = new SeededRNG("uniqueness");
    const agents = generateAgents(rng, {
      count: 200,
      income: testConfig.income,
      dependents: testConfig.dependents,
      savingRate: 0.3,
      interestRate: 0.05,
      referenceYear: 2024,
      maxIncomeDraws: 10000,
    });
    agents.forEach((a) => a.projectSavings(20));
    const inventory = Inventory.fromRows(marketRows(60));

    const result = clearMarket(agents, inventory, "RANDOM", rng);

    const owned = agents.flatMap((a) => (a.property ? [a.property.id] : []));
    expect(new Set(owned).size).toBe(owned.length);
    expect(owned.length).toBe(result.purchases.length);
    for (const id of owned) {
      expect(inventory.findById(id).available).toBe(false);
    }
    for (const a of agents) {
      expect(a.savings).toBeGreaterThanOrEqual(0);
    }
    expect(result.purchases.length + result.unhoused.length).toBe(200);
  });

  it("should keep population order for equal incomes", () => {
    const agents = [
      agent({ id: 1, annualIncome: 60000 }),
      agent({ id: 2, annualIncome: 90000 }),
      agent({ id: 3, annualIncome: 60000 }),
    ];

    expect(orderAgents(agents, "INCOME_DESCENDING", new SeededRNG("s")).map((a) => a.id)).toEqual([2, 1, 3]);
    expect(orderAgents(agents, "INCOME_ASCENDING", new SeededRNG("s")).map((a) => a.id)).toEqual([1, 3, 2]);
  });

  it("should shuffle reproducibly for a fixed seed", () => {
    const agents = Array.from({ length: 20 }, (_, i) => agent({ id: i + 1 }));

    const first = orderAgents(agents, "RANDOM", new SeededRNG("shuffle")).map((a) => a.id);
    const second = orderAgents(agents, "RANDOM", new SeededRNG("shuffle")).map((a) => a.id);

    expect(second).toEqual(first);
    expect([...first].sort((x, y) => x - y)).toEqual(agents.map((a) => a.id));
  });

  it("should not reorder the caller's array", () => {
    const agents = [agent({ id: 1, annualIncome: 1 }), agent({ id: 2, annualIncome: 2 })];
    orderAgents(agents, "INCOME_DESCENDING", new SeededRNG("s"));
    expect(agents.map((a) => a.id)).toEqual([1, 2]);
  });
});

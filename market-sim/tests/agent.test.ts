import { describe, expect, it } from "vitest";
import { Agent, AgentInit, annuityFutureValue } from "../src/core/agent";
import { MarketError } from "../src/core/errors";
import { Inventory } from "../src/core/inventory";

const agent = (overrides: Partial<AgentInit> = {}): Agent =>
  new Agent({
    id: 1,
    annualIncome: 50000,
    dependents: 0,
    segment: "AVERAGE",
    savingRate: 0.3,
    interestRate: 0.05,
    referenceYear: 2024,
    ...overrides,
  });

describe("Agent", () => {
  describe("projectSavings", () => {
    it("should compound annual savings", () => {
      const a = agent();
      // 15000 * (1.05^10 - 1) / 0.05
      expect(a.projectSavings(10)).toBeCloseTo(188668.388, 2);
      expect(a.savings).toBeCloseTo(188668.388, 2);
    });

    it("should fall back to a simple sum at a zero interest rate", () => {
      const a = agent({ interestRate: 0 });
      expect(a.projectSavings(10)).toBeCloseTo(150000, 6);
    });

    it("should be zero for a zero horizon", () => {
      expect(agent().projectSavings(0)).toBe(0);
    });

    it("should be non-decreasing in years", () => {
      const a = agent();
      let previous = -1;
      for (let years = 0; years <= 30; years++) {
        const value = a.projectSavings(years);
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    });

    it("should reject a negative horizon", () => {
      expect(() => agent().projectSavings(-1)).toThrow(MarketError);
    });

    it("should match the closed-form annuity helper", () => {
      expect(annuityFutureValue(1000, 0.1, 2)).toBeCloseTo(2100, 6);
      expect(annuityFutureValue(1000, 0, 3)).toBe(3000);
    });
  });

  it("should reject negative starting savings", () => {
    expect(() => agent({ savings: -1 })).toThrow(MarketError);
  });

  describe("attemptPurchase", () => {
    it("should buy the only property when it is at or below the average", () => {
      const inventory = Inventory.fromRows([
        { id: 1, price: 100000, area: 1000, bedrooms: 2, year_built: 2020 },
      ]);
      const buyer = agent({ annualIncome: 500000, savings: 150000 });

      const purchase = buyer.attemptPurchase(inventory);

      expect(purchase).toEqual({ agentId: 1, propertyId: 1, price: 100000 });
      expect(buyer.property?.id).toBe(1);
      expect(buyer.savings).toBe(50000);
      expect(inventory.findById(1).available).toBe(false);
    });

    it("should take the first affordable candidate rather than the cheapest", () => {
      const rows = [
        { id: 1, price: 150000, area: 1000, bedrooms: 2, year_built: 2000 },
        { id: 2, price: 50000, area: 1000, bedrooms: 2, year_built: 2000 },
        { id: 3, price: 250000, area: 1000, bedrooms: 2, year_built: 2000 },
      ];

      const rich = agent({ savings: 160000 });
      expect(rich.attemptPurchase(Inventory.fromRows(rows))?.propertyId).toBe(1);

      const modest = agent({ savings: 100000 });
      expect(modest.attemptPurchase(Inventory.fromRows(rows))?.propertyId).toBe(2);
    });

    it("should leave a FANCY agent unhoused when nothing new and top quality is affordable", () => {
      const inventory = Inventory.fromRows([
        { id: 1, price: 500000, area: 2500, bedrooms: 4, year_built: 2022, quality_score: 5 },
      ]);
      const buyer = agent({ segment: "FANCY", savings: 100000 });

      expect(buyer.attemptPurchase(inventory)).toBeNull();
      expect(buyer.property).toBeNull();
      expect(buyer.savings).toBe(100000);
      expect(inventory.availableCount()).toBe(1);
    });

    it("should let a FANCY agent buy new construction with the top score only", () => {
      const inventory = Inventory.fromRows([
        { id: 1, price: 300000, area: 2500, bedrooms: 4, year_built: 2022, quality_score: 4 },
        { id: 2, price: 400000, area: 2500, bedrooms: 4, year_built: 2010, quality_score: 5 },
        { id: 3, price: 450000, area: 2500, bedrooms: 4, year_built: 2021, quality_score: 5 },
      ]);
      const buyer = agent({ segment: "FANCY", savings: 1000000 });

      expect(buyer.attemptPurchase(inventory)?.propertyId).toBe(3);
    });

    it("should compare price per area with monthly income for OPTIMIZER", () => {
      const inventory = Inventory.fromRows([
        { id: 2, price: 300000, area: 20, bedrooms: 1, year_built: 2000 },
        { id: 3, price: 200000, area: 1000, bedrooms: 3, year_built: 2000 },
      ]);
      const buyer = agent({ segment: "OPTIMIZER", annualIncome: 120000, savings: 250000 });

      expect(buyer.monthlyIncome).toBe(10000);
      expect(buyer.attemptPurchase(inventory)?.propertyId).toBe(3);
    });

    it("should raise DivisionByZero when an OPTIMIZER meets a zero-area property", () => {
      const inventory = Inventory.fromRows([
        { id: 1, price: 1000, area: 0, bedrooms: 1, year_built: 2000 },
      ]);
      const buyer = agent({ segment: "OPTIMIZER", annualIncome: 120000, savings: 5000 });

      expect(() => buyer.attemptPurchase(inventory)).toThrow(MarketError);
      try {
        buyer.attemptPurchase(inventory);
      } catch (error) {
        expect(error).toMatchObject({ kind: "DivisionByZero" });
      }
      expect(buyer.property).toBeNull();
      expect(inventory.findById(1).available).toBe(true);
    });

    it("should not search again once it owns a property", () => {
      const inventory = Inventory.fromRows([
        { id: 1, price: 100000, area: 1000, bedrooms: 2, year_built: 2020 },
        { id: 2, price: 100000, area: 1000, bedrooms: 2, year_built: 2020 },
      ]);
      const buyer = agent({ savings: 500000 });

      expect(buyer.attemptPurchase(inventory)?.propertyId).toBe(1);
      expect(buyer.attemptPurchase(inventory)).toBeNull();
      expect(inventory.findById(2).available).toBe(true);
      expect(buyer.savings).toBe(400000);
    });

    it("should report its final state", () => {
      const buyer = agent({ id: 7, dependents: 2, savings: 1000 });
      expect(buyer.toSnapshot()).toEqual({
        id: 7,
        annualIncome: 50000,
        dependents: 2,
        segment: "AVERAGE",
        savings: 1000,
        propertyId: null,
      });
    });
  });
});

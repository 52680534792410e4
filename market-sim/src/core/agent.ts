import { AgentSnapshot, Money, Purchase, Segment } from "./dto";
import { MarketError } from "./errors";
import { Inventory } from "./inventory";
import { Property } from "./property";
import { isPurchaseCandidate } from "./segments";

export interface AgentInit {
  id: number;
  annualIncome: Money;
  dependents: number;
  segment: Segment;
  savings?: Money;
  savingRate: number;
  interestRate: number;
  referenceYear: number;
}

/**
 * Future value of a constant annual contribution compounded annually.
 * Falls back to the simple sum when the rate is 0.
 */
export function annuityFutureValue(
  annualContribution: Money,
  interestRate: number,
  years: number
): Money {
  if (interestRate === 0) {
    return annualContribution * years;
  }
  return (
    (annualContribution * (Math.pow(1 + interestRate, years) - 1)) /
    interestRate
  );
}

/**
 * A prospective buyer. Owns at most one property per run and only ever
 * mutates its own savings and ownership.
 */
export class Agent {
  readonly id: number;
  readonly annualIncome: Money;
  readonly dependents: number;
  readonly segment: Segment;
  readonly savingRate: number;
  readonly interestRate: number;
  readonly referenceYear: number;
  private balance: Money;
  private owned: Property | null = null;

  constructor(init: AgentInit) {
    if (init.savings !== undefined && init.savings < 0) {
      throw MarketError.invalidState(
        `Agent ${init.id} cannot start with negative savings`
      );
    }

    this.id = init.id;
    this.annualIncome = init.annualIncome;
    this.dependents = init.dependents;
    this.segment = init.segment;
    this.savingRate = init.savingRate;
    this.interestRate = init.interestRate;
    this.referenceYear = init.referenceYear;
    this.balance = init.savings ?? 0;
  }

  get savings(): Money {
    return this.balance;
  }

  get property(): Property | null {
    return this.owned;
  }

  get monthlyIncome(): Money {
    return this.annualIncome / 12;
  }

  /**
   * Replace savings with the accumulated value of saving a fixed share of
   * income every year for `years` years
   */
  projectSavings(years: number): Money {
    if (years < 0) {
      throw MarketError.invalidState(
        `Savings horizon must be non-negative, got ${years}`
      );
    }

    const annualSavings = this.annualIncome * this.savingRate;
    this.balance = Math.max(
      0,
      annuityFutureValue(annualSavings, this.interestRate, years)
    );
    return this.balance;
  }

  /**
   * Buy the first affordable candidate in inventory order.
   * Returns null when nothing is affordable or the agent already owns.
   */
  attemptPurchase(inventory: Inventory): Purchase | null {
    if (this.owned !== null) {
      return null;
    }

    const averagePrice =
      this.segment === "AVERAGE" ? inventory.averagePrice() : 0;
    const buyer = {
      annualIncome: this.annualIncome,
      referenceYear: this.referenceYear,
      averagePrice,
    };

    const target = inventory
      .available()
      .filter((property) => isPurchaseCandidate(property, this.segment, buyer))
      .find((property) => this.balance >= property.price);

    if (!target) {
      return null;
    }

    this.owned = target;
    target.markSold();
    this.balance -= target.price;

    return { agentId: this.id, propertyId: target.id, price: target.price };
  }

  toSnapshot(): AgentSnapshot {
    return {
      id: this.id,
      annualIncome: this.annualIncome,
      dependents: this.dependents,
      segment: this.segment,
      savings: this.balance,
      propertyId: this.owned?.id ?? null,
    };
  }
}

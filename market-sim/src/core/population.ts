import { Agent } from "./agent";
import { DependentsRange, IncomeDistribution, Money, SEGMENTS } from "./dto";
import { MarketError } from "./errors";
import { SeededRNG } from "./random";

export interface PopulationOptions {
  count: number;
  income: IncomeDistribution;
  dependents: DependentsRange;
  savingRate: number;
  interestRate: number;
  referenceYear: number;
  maxIncomeDraws: number;
}

/**
 * Draw an income from the normal distribution, rejecting draws outside
 * [minimum, maximum]
 * @throws MarketError InvalidState when the draw budget runs out
 */
export function sampleIncome(
  rng: SeededRNG,
  income: IncomeDistribution,
  maxDraws: number
): Money {
  if (income.minimum > income.maximum) {
    throw MarketError.invalidState(
      `Income minimum ${income.minimum} exceeds maximum ${income.maximum}`
    );
  }

  for (let draw = 0; draw < maxDraws; draw++) {
    const value = rng.nextGaussian(income.average, income.standardDeviation);
    if (value >= income.minimum && value <= income.maximum) {
      return value;
    }
  }

  throw MarketError.invalidState(
    `No income within [${income.minimum}, ${income.maximum}] after ${maxDraws} draws ` +
      `(average ${income.average}, standard deviation ${income.standardDeviation}); check the income configuration`
  );
}

/**
 * Build `count` agents with ids 1..count
 */
export function generateAgents(
  rng: SeededRNG,
  options: PopulationOptions
): Agent[] {
  const { dependents } = options;
  if (dependents.minimum > dependents.maximum) {
    throw MarketError.invalidState(
      `Dependents minimum ${dependents.minimum} exceeds maximum ${dependents.maximum}`
    );
  }

  const agents: Agent[] = [];
  for (let i = 0; i < options.count; i++) {
    const annualIncome = sampleIncome(
      rng,
      options.income,
      options.maxIncomeDraws
    );
    agents.push(
      new Agent({
        id: i + 1,
        annualIncome,
        dependents: rng.nextInt(dependents.minimum, dependents.maximum),
        segment: rng.pick(SEGMENTS),
        savingRate: options.savingRate,
        interestRate: options.interestRate,
        referenceYear: options.referenceYear,
      })
    );
  }
  return agents;
}

import { PropertyRow, SimulationConfig } from "../src/core/dto";

export const testConfig: SimulationConfig = {
  populationSize: 40,
  years: 15,
  income: {
    minimum: 20000,
    average: 70000,
    standardDeviation: 25000,
    maximum: 200000,
  },
  dependents: { minimum: 0, maximum: 4 },
  downPaymentPercentage: 0.2,
  savingRate: 0.3,
  interestRate: 0.05,
  clearingPolicy: "INCOME_DESCENDING",
  referenceYear: 2024,
  deriveQualityScores: false,
  seed: "test-seed",
  maxIncomeDraws: 10000,
};

export function marketRows(count: number): PropertyRow[] {
  const rows: PropertyRow[] = [];
  for (let i = 1; i <= count; i++) {
    rows.push({
      id: i,
      price: 80000 + (i % 10) * 25000,
      area: 900 + (i % 7) * 250,
      bedrooms: 1 + (i % 5),
      year_built: 1960 + (i * 3) % 64,
      quality_score: i % 4 === 0 ? 5 : null,
    });
  }
  return rows;
}

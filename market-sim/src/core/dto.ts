export type ISO = string;
export type Money = number;

export const SEGMENTS = ["FANCY", "OPTIMIZER", "AVERAGE"] as const;
export type Segment = (typeof SEGMENTS)[number];

export const QUALITY_SCORES = [1, 2, 3, 4, 5] as const;
export type QualityScore = (typeof QUALITY_SCORES)[number];
export const MAX_QUALITY_SCORE: QualityScore = 5;

export const CLEARING_POLICIES = [
  "INCOME_DESCENDING",
  "INCOME_ASCENDING",
  "RANDOM",
] as const;
export type ClearingPolicy = (typeof CLEARING_POLICIES)[number];

// One market seed row as produced by the external tabular loader
export interface PropertyRow {
  id: number;
  price: Money;
  area: number;                   // square feet
  bedrooms: number;
  year_built: number;
  quality_score?: QualityScore | null;
  available?: boolean;            // default true
}

export interface IncomeDistribution {
  minimum: Money;
  average: Money;
  standardDeviation: Money;
  maximum: Money;
}

export interface DependentsRange {
  minimum: number;
  maximum: number;
}

export interface SimulationConfig {
  populationSize: number;
  years: number;
  income: IncomeDistribution;
  dependents: DependentsRange;
  downPaymentPercentage: number;  // carried for reporting, not used by clearing
  savingRate: number;
  interestRate: number;
  clearingPolicy: ClearingPolicy;
  referenceYear: number;          // "now" for age and new-construction checks
  deriveQualityScores: boolean;   // score unscored properties at market build
  seed: string;
  maxIncomeDraws: number;         // rejection-sampling budget per agent
}

export interface PropertySnapshot {
  id: number;
  price: Money;
  area: number;
  bedrooms: number;
  yearBuilt: number;
  qualityScore: QualityScore | null;
  available: boolean;
}

export interface AgentSnapshot {
  id: number;
  annualIncome: Money;
  dependents: number;
  segment: Segment;
  savings: Money;
  propertyId: number | null;
}

export interface Purchase {
  agentId: number;
  propertyId: number;
  price: Money;
}

export interface ClearingResult {
  policy: ClearingPolicy;
  order: number[];                // agent ids in evaluation order
  purchases: Purchase[];
  unhoused: number[];
}

export interface SimulationReport {
  runId: string;
  config: SimulationConfig;
  ownershipRate: number;
  availabilityRate: number;
  clearing: ClearingResult;
  properties: PropertySnapshot[];
  agents: AgentSnapshot[];
  completedAt: ISO;
}

export type SimulationRequestedEvt = {
  type: "simulation_requested";
  id: string;                     // run id
  marketId: string;
  overrides?: Record<string, unknown>;
};

export type SimulationCompletedEvt = {
  type: "simulation_completed";
  id: string;
  marketId: string;
  ownershipRate: number;
  availabilityRate: number;
  purchases: number;
  agents: number;
  properties: number;
};

export type SimulationFailedEvt = {
  type: "simulation_failed";
  id: string;
  marketId: string;
  kind: string;
  message: string;
};

import { z } from "zod";
import {
  CLEARING_POLICIES,
  PropertyRow,
  QUALITY_SCORES,
  SimulationConfig,
} from "./dto";

const qualityScoreSchema = z.union([
  z.literal(QUALITY_SCORES[0]),
  z.literal(QUALITY_SCORES[1]),
  z.literal(QUALITY_SCORES[2]),
  z.literal(QUALITY_SCORES[3]),
  z.literal(QUALITY_SCORES[4]),
]);

export const propertyRowSchema = z.object({
  id: z.number().int(),
  price: z.number().positive(),
  area: z.number().nonnegative(),
  bedrooms: z.number().int().nonnegative(),
  year_built: z.number().int(),
  quality_score: qualityScoreSchema.nullable().optional(),
  available: z.boolean().optional(),
});

export const propertyRowsSchema = z.array(propertyRowSchema);

const incomeSchema = z
  .object({
    minimum: z.number().nonnegative(),
    average: z.number().positive(),
    standardDeviation: z.number().nonnegative(),
    maximum: z.number().positive(),
  })
  .refine((income) => income.minimum <= income.maximum, {
    message: "income.minimum must not exceed income.maximum",
  });

const dependentsSchema = z
  .object({
    minimum: z.number().int().nonnegative(),
    maximum: z.number().int().nonnegative(),
  })
  .refine((range) => range.minimum <= range.maximum, {
    message: "dependents.minimum must not exceed dependents.maximum",
  });

export const simulationConfigSchema = z.object({
  populationSize: z.number().int().nonnegative(),
  years: z.number().int().nonnegative(),
  income: incomeSchema,
  dependents: dependentsSchema,
  downPaymentPercentage: z.number().min(0).max(1),
  savingRate: z.number().min(0).max(1),
  interestRate: z.number().nonnegative(),
  clearingPolicy: z.enum(CLEARING_POLICIES),
  referenceYear: z.number().int(),
  deriveQualityScores: z.boolean(),
  seed: z.string().min(1),
  maxIncomeDraws: z.number().int().positive(),
});

// Partial overrides: nested groups are replaced whole, not merged
export const simulationOverridesSchema = simulationConfigSchema
  .partial()
  .strict();

export type SimulationOverrides = z.infer<typeof simulationOverridesSchema>;

export function parsePropertyRows(input: unknown): PropertyRow[] {
  return propertyRowsSchema.parse(input);
}

/**
 * Apply untrusted overrides on top of a base configuration
 * @throws ZodError when the overrides or the merged result are invalid
 */
export function resolveSimulationConfig(
  base: SimulationConfig,
  overrides: unknown = {}
): SimulationConfig {
  const parsed = simulationOverridesSchema.parse(overrides ?? {});
  return simulationConfigSchema.parse({ ...base, ...parsed });
}

import { MAX_QUALITY_SCORE, Money, Segment, SEGMENTS } from "./dto";
import { MarketError } from "./errors";
import { Property } from "./property";

export function isSegment(value: unknown): value is Segment {
  return SEGMENTS.some((segment) => segment === value);
}

/**
 * Narrow an untrusted segment tag
 * @throws MarketError InvalidSegment for anything outside the three variants
 */
export function parseSegment(value: unknown): Segment {
  if (!isSegment(value)) {
    throw MarketError.invalidSegment(value);
  }
  return value;
}

function assertNever(value: never): never {
  throw MarketError.invalidSegment(value);
}

/**
 * Market-side filter used by requirement queries. The price cap itself is
 * applied by the caller.
 */
export function meetsRequirements(
  property: Property,
  segment: Segment,
  maxPrice: Money
): boolean {
  switch (segment) {
    case "FANCY":
      return property.qualityScore !== null && property.qualityScore >= 4;
    case "OPTIMIZER":
      // Kept distinct from the buyer-side OPTIMIZER rule in isPurchaseCandidate
      return property.area > 0
        ? property.pricePerArea() < maxPrice / property.area
        : false;
    case "AVERAGE":
      return property.price <= maxPrice;
    default:
      return assertNever(segment);
  }
}

export interface BuyerView {
  annualIncome: Money;
  referenceYear: number;
  averagePrice: Money;
}

/**
 * Buyer-side filter used when an agent builds its candidate list
 */
export function isPurchaseCandidate(
  property: Property,
  segment: Segment,
  buyer: BuyerView
): boolean {
  switch (segment) {
    case "FANCY":
      return (
        property.isNewConstruction(buyer.referenceYear) &&
        property.qualityScore === MAX_QUALITY_SCORE
      );
    case "OPTIMIZER":
      // Zero-area rows raise DivisionByZero here
      return property.pricePerArea() <= buyer.annualIncome / 12;
    case "AVERAGE":
      return property.price <= buyer.averagePrice;
    default:
      return assertNever(segment);
  }
}

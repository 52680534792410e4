import { Money, PropertyRow, PropertySnapshot, QualityScore } from "./dto";
import { MarketError } from "./errors";

const NEW_CONSTRUCTION_MAX_AGE = 5;
const LARGE_AREA_THRESHOLD = 2000;
const MANY_BEDROOMS_THRESHOLD = 3;

/**
 * Base quality score from age bands (years since construction)
 */
export function ageBandScore(age: number): QualityScore {
  if (age < 5) return 5;
  if (age < 15) return 4;
  if (age < 30) return 3;
  if (age < 50) return 2;
  return 1;
}

function clampScore(score: number): QualityScore {
  if (score >= 5) return 5;
  if (score <= 1) return 1;
  if (score >= 4) return 4;
  if (score >= 3) return 3;
  return 2;
}

/**
 * Round to `decimals` places, sending exact halves to the even neighbour
 */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  if (diff > 0.5) return (floor + 1) / factor;
  if (diff < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

/**
 * A single property in the market. Shape is fixed at load; only availability
 * and the one-time quality score change during a run.
 */
export class Property {
  readonly id: number;
  readonly price: Money;
  readonly area: number;
  readonly bedrooms: number;
  readonly yearBuilt: number;
  private score: QualityScore | null;
  private isAvailable: boolean;

  constructor(row: PropertyRow) {
    this.id = row.id;
    this.price = row.price;
    this.area = row.area;
    this.bedrooms = row.bedrooms;
    this.yearBuilt = row.year_built;
    this.score = row.quality_score ?? null;
    this.isAvailable = row.available ?? true;
  }

  static fromRow(row: PropertyRow): Property {
    return new Property(row);
  }

  get available(): boolean {
    return this.isAvailable;
  }

  get qualityScore(): QualityScore | null {
    return this.score;
  }

  /**
   * Price per square foot rounded to 2 decimal places
   * @throws MarketError DivisionByZero when area is 0
   */
  pricePerArea(): number {
    if (this.area === 0) {
      throw MarketError.divisionByZero(
        `Property ${this.id} has zero area; price per area is undefined`
      );
    }
    return roundHalfEven(this.price / this.area, 2);
  }

  isNewConstruction(referenceYear: number): boolean {
    return referenceYear - this.yearBuilt < NEW_CONSTRUCTION_MAX_AGE;
  }

  /**
   * Derive the quality score from age, size and bedrooms. Computed once; an
   * assigned score (from the seed row or a previous call) is kept.
   */
  assignQualityScore(referenceYear: number): QualityScore {
    if (this.score !== null) {
      return this.score;
    }

    const base = ageBandScore(referenceYear - this.yearBuilt);
    const sizeBonus = this.area > LARGE_AREA_THRESHOLD ? 1 : 0;
    const bedroomBonus = this.bedrooms > MANY_BEDROOMS_THRESHOLD ? 1 : 0;

    this.score = clampScore(base + sizeBonus + bedroomBonus);
    return this.score;
  }

  markSold(): void {
    this.isAvailable = false;
  }

  toSnapshot(): PropertySnapshot {
    return {
      id: this.id,
      price: this.price,
      area: this.area,
      bedrooms: this.bedrooms,
      yearBuilt: this.yearBuilt,
      qualityScore: this.score,
      available: this.isAvailable,
    };
  }
}

import { Money, PropertyRow } from "./dto";
import { MarketError } from "./errors";
import { Property } from "./property";
import { meetsRequirements, parseSegment } from "./segments";

/**
 * The fixed set of properties for one run. Members never change after
 * construction; only their availability does.
 */
export class Inventory {
  private readonly properties: readonly Property[];
  private readonly byId: ReadonlyMap<number, Property>;

  constructor(properties: Property[]) {
    const byId = new Map<number, Property>();
    for (const property of properties) {
      if (byId.has(property.id)) {
        throw MarketError.invalidState(
          `Duplicate property id ${property.id} in market data`
        );
      }
      byId.set(property.id, property);
    }

    this.properties = [...properties];
    this.byId = byId;
  }

  static fromRows(rows: PropertyRow[]): Inventory {
    return new Inventory(rows.map((row) => Property.fromRow(row)));
  }

  get size(): number {
    return this.properties.length;
  }

  all(): readonly Property[] {
    return this.properties;
  }

  available(): Property[] {
    return this.properties.filter((property) => property.available);
  }

  availableCount(): number {
    return this.available().length;
  }

  /**
   * @throws MarketError NotFound for an unknown id
   */
  findById(id: number): Property {
    const property = this.byId.get(id);
    if (!property) {
      throw MarketError.notFound(`Property with id ${id} not found`);
    }
    return property;
  }

  /**
   * Mean price over available properties, optionally only those with the
   * given bedroom count. An empty candidate set averages to 0.
   */
  averagePrice(bedrooms?: number): Money {
    const candidates = this.available().filter(
      (property) => bedrooms === undefined || property.bedrooms === bedrooms
    );

    if (candidates.length === 0) {
      return 0;
    }

    const total = candidates.reduce((sum, property) => sum + property.price, 0);
    return total / candidates.length;
  }

  /**
   * Available properties priced at or below `maxPrice` that satisfy the
   * segment's market-side filter
   * @throws MarketError InvalidSegment for an unrecognised segment tag
   */
  matchingRequirements(maxPrice: Money, segment: unknown): Property[] {
    const parsed = parseSegment(segment);

    return this.properties.filter(
      (property) =>
        property.available &&
        property.price <= maxPrice &&
        meetsRequirements(property, parsed, maxPrice)
    );
  }

  /**
   * Derive quality scores for every property that has none yet
   */
  assignQualityScores(referenceYear: number): void {
    for (const property of this.properties) {
      property.assignQualityScore(referenceYear);
    }
  }
}

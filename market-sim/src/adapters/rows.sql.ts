import { Pool } from "pg";
import { PropertyRow } from "../core/dto";
import { MarketRowsReadPort } from "../core/ports";
import { propertyRowSchema } from "../core/validation";

type MarketPropertyRecord = {
  property_id: number | string;
  price: number | string;
  area: number | string;
  bedrooms: number | string;
  year_built: number | string;
  quality_score: number | string | null;
  available: boolean | null;
};

/**
 * Map one database record into a seed row; NUMERIC columns arrive as strings
 */
export function toPropertyRow(record: MarketPropertyRecord): PropertyRow {
  return propertyRowSchema.parse({
    id: Number(record.property_id),
    price: parseFloat(String(record.price)),
    area: parseFloat(String(record.area)),
    bedrooms: Number(record.bedrooms),
    year_built: Number(record.year_built),
    quality_score:
      record.quality_score === null ? null : Number(record.quality_score),
    available: record.available ?? true,
  });
}

/**
 * PostgreSQL implementation of the market rows read port
 */
export class SqlMarketRowsRepo implements MarketRowsReadPort {
  constructor(private pool: Pool) {}

  async loadMarketRows(marketId: string): Promise<PropertyRow[] | null> {
    const client = await this.pool.connect();
    try {
      const query = `
        SELECT
          property_id,
          price,
          area,
          bedrooms,
          year_built,
          quality_score,
          available
        FROM market_properties
        WHERE market_id = $1
        ORDER BY position, property_id
      `;

      const result = await client.query<MarketPropertyRecord>(query, [
        marketId,
      ]);

      if (result.rows.length === 0) {
        return null;
      }

      return result.rows.map(toPropertyRow);
    } finally {
      client.release();
    }
  }
}

import { PropertyRow } from "../core/dto";
import { MarketRowsReadPort } from "../core/ports";

/**
 * In-memory market rows for tests and local runs
 */
export class MemoryMarketRowsRepo implements MarketRowsReadPort {
  private markets = new Map<string, PropertyRow[]>();

  async loadMarketRows(marketId: string): Promise<PropertyRow[] | null> {
    const rows = this.markets.get(marketId);
    // Copy so a run never mutates the stored seed
    return rows ? rows.map((row) => ({ ...row })) : null;
  }

  // Test helper methods
  setMarketRows(marketId: string, rows: PropertyRow[]): void {
    this.markets.set(
      marketId,
      rows.map((row) => ({ ...row }))
    );
  }

  clear(): void {
    this.markets.clear();
  }

  size(): number {
    return this.markets.size;
  }
}

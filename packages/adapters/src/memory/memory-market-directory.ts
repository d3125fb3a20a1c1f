/**
 * In-memory market directory
 */

import type { MarketConfig, MarketDirectoryPort } from "../ports/market-directory-port";

export class MemoryMarketDirectory implements MarketDirectoryPort {
  private readonly markets = new Map<string, MarketConfig>();

  constructor(markets: MarketConfig[] = []) {
    for (const market of markets) {
      this.markets.set(market.marketId, market);
    }
  }

  register(market: MarketConfig): void {
    this.markets.set(market.marketId, market);
  }

  setPaused(marketId: string, paused: boolean): void {
    const market = this.markets.get(marketId);
    if (market) this.markets.set(marketId, { ...market, paused });
  }

  getMarket(marketId: string): MarketConfig | undefined {
    return this.markets.get(marketId);
  }

  isActive(marketId: string): boolean {
    const market = this.markets.get(marketId);
    return market !== undefined && !market.paused;
  }

  list(): MarketConfig[] {
    return [...this.markets.values()];
  }
}

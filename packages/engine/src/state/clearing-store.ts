/**
 * Keyed state owned by the single writer
 */

import type { AccountId, MarketId, MarketRiskParams, Position, VammState, X18 } from "@perp-clearing/core";

export interface MarketState {
  marketId: MarketId;
  vamm: VammState;
  riskParams: MarketRiskParams | null;
  /** Losses nobody could cover, cumulative */
  badDebtX18: X18;
}

export function positionKey(account: AccountId, marketId: MarketId): string {
  return `${account}\u0000${marketId}`;
}

export class ClearingStore {
  readonly markets = new Map<MarketId, MarketState>();
  readonly positions = new Map<string, Position>();
  /** Markets where the account holds a nonzero position, in opening order */
  readonly activeMarkets = new Map<AccountId, readonly MarketId[]>();
}

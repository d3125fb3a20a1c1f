/**
 * Price fallback chain
 *
 * Tries each source in order and returns the first positive price.
 * Only fails when every source is unavailable.
 *
 * This module is pure (no I/O, no throw); sources are thunks so later ones are
 * not read once an earlier one succeeds.
 */

import { err, ok, type Result } from "neverthrow";

import type { CoreError, X18 } from "./types";

export type PriceSourceKind = "oracle" | "twap" | "mark";

export interface PriceCandidate {
  source: PriceSourceKind;
  read: () => Result<X18, string>;
}

export interface ResolvedPrice {
  priceX18: X18;
  source: PriceSourceKind;
  /** Sources that failed before this one, with their reasons */
  skipped: { source: PriceSourceKind; reason: string }[];
}

export function resolvePrice(candidates: readonly PriceCandidate[]): Result<ResolvedPrice, CoreError> {
  const skipped: ResolvedPrice["skipped"] = [];

  for (const candidate of candidates) {
    const price = candidate.read();
    if (price.isErr()) {
      skipped.push({ source: candidate.source, reason: price.error });
      continue;
    }
    if (price.value <= 0n) {
      skipped.push({ source: candidate.source, reason: "non-positive price" });
      continue;
    }
    return ok({ priceX18: price.value, source: candidate.source, skipped });
  }

  return err({
    type: "PRICE_UNAVAILABLE",
    message: `no price source available (${skipped.map(s => `${s.source}: ${s.reason}`).join("; ")})`,
  });
}

/**
 * Position Accounting - apply a fill to a position
 *
 * - open: entry = execution price
 * - increase: entry = size-weighted average of old and new notional
 * - reduce: realize PnL on the reduced part, release margin pro rata
 * - close: realize PnL, clear entry and margin
 * - flip: close the old leg, open the remainder at the execution price
 *
 * Margin reservation for the opened part and fee collection belong to the
 * caller; this module only moves size, entry and realized PnL.
 *
 * This module is pure (no I/O, no throw).
 */

import { WAD, abs, mulDiv, signOf } from "./fixed-point";
import type { Position, TradeKind, X18 } from "./types";

export interface TradeApplication {
  kind: TradeKind;
  position: Position;
  /** PnL realized by this fill (floored against the trader) */
  realizedPnlX18: X18;
  /** Base quantity closed out of the previous position */
  closedSizeX18: X18;
  /** Base quantity added in the new direction */
  openedSizeX18: X18;
  /** Margin released back to free collateral */
  releasedMarginX18: X18;
}

export function emptyPosition(fundingIndexX18: X18): Position {
  return {
    size: 0n,
    margin: 0n,
    entryPriceX18: 0n,
    lastFundingIndexX18: fundingIndexX18,
    realizedPnlX18: 0n,
  };
}

/**
 * PnL of closing `closedSize` (unsigned) of a position of the given sign
 */
export function pnlForClose(sign: bigint, entryPriceX18: X18, exitPriceX18: X18, closedSizeX18: X18): X18 {
  return mulDiv((exitPriceX18 - entryPriceX18) * sign, closedSizeX18, WAD);
}

/**
 * Apply a fill of `baseDeltaX18` at `priceX18` to a position.
 */
export function applyFill(position: Position, baseDeltaX18: X18, priceX18: X18): TradeApplication {
  const oldSize = position.size;
  const newSize = oldSize + baseDeltaX18;
  const oldAbs = abs(oldSize);
  const deltaAbs = abs(baseDeltaX18);

  if (baseDeltaX18 === 0n) {
    return {
      kind: oldSize === 0n ? "open" : "increase",
      position,
      realizedPnlX18: 0n,
      closedSizeX18: 0n,
      openedSizeX18: 0n,
      releasedMarginX18: 0n,
    };
  }

  if (oldSize === 0n) {
    return {
      kind: "open",
      position: { ...position, size: newSize, entryPriceX18: priceX18 },
      realizedPnlX18: 0n,
      closedSizeX18: 0n,
      openedSizeX18: deltaAbs,
      releasedMarginX18: 0n,
    };
  }

  if (signOf(oldSize) === signOf(baseDeltaX18)) {
    const weightedEntry = (oldAbs * position.entryPriceX18 + deltaAbs * priceX18) / abs(newSize);
    return {
      kind: "increase",
      position: { ...position, size: newSize, entryPriceX18: weightedEntry },
      realizedPnlX18: 0n,
      closedSizeX18: 0n,
      openedSizeX18: deltaAbs,
      releasedMarginX18: 0n,
    };
  }

  const sign = signOf(oldSize);
  const closedSizeX18 = deltaAbs < oldAbs ? deltaAbs : oldAbs;
  const realizedPnlX18 = pnlForClose(sign, position.entryPriceX18, priceX18, closedSizeX18);

  if (deltaAbs < oldAbs) {
    const releasedMarginX18 = mulDiv(position.margin, closedSizeX18, oldAbs);
    return {
      kind: "reduce",
      position: {
        ...position,
        size: newSize,
        margin: position.margin - releasedMarginX18,
        realizedPnlX18: position.realizedPnlX18 + realizedPnlX18,
      },
      realizedPnlX18,
      closedSizeX18,
      openedSizeX18: 0n,
      releasedMarginX18,
    };
  }

  const flipped = newSize !== 0n;
  return {
    kind: flipped ? "flip" : "close",
    position: {
      ...position,
      size: newSize,
      margin: 0n,
      entryPriceX18: flipped ? priceX18 : 0n,
      realizedPnlX18: position.realizedPnlX18 + realizedPnlX18,
    },
    realizedPnlX18,
    closedSizeX18,
    openedSizeX18: flipped ? abs(newSize) : 0n,
    releasedMarginX18: position.margin,
  };
}

/**
 * Whether a trade adds risk (new exposure or a direction change)
 */
export function addsRisk(kind: TradeKind): boolean {
  return kind === "open" || kind === "increase" || kind === "flip";
}

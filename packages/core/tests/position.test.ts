/**
 * Position Accounting Unit Tests
 */

import { describe, expect, test } from "vitest";

import { WAD } from "../src/fixed-point";
import { addsRisk, applyFill, emptyPosition, pnlForClose } from "../src/position";
import type { Position } from "../src/types";

const createPosition = (overrides: Partial<Position> = {}): Position => ({
  ...emptyPosition(0n),
  ...overrides,
});

describe("applyFill", () => {
  test("opening from zero takes the sign of the trade and its price", () => {
    const long = applyFill(createPosition(), 2n * WAD, 100n * WAD);
    const short = applyFill(createPosition(), -2n * WAD, 100n * WAD);

    expect(long.kind).toBe("open");
    expect(long.position.size).toBe(2n * WAD);
    expect(long.position.entryPriceX18).toBe(100n * WAD);
    expect(long.openedSizeX18).toBe(2n * WAD);
    expect(short.position.size).toBe(-2n * WAD);
  });

  test("increasing averages the entry price by size", () => {
    const position = createPosition({ size: 2n * WAD, entryPriceX18: 100n * WAD });

    const result = applyFill(position, 2n * WAD, 200n * WAD);

    expect(result.kind).toBe("increase");
    expect(result.position.size).toBe(4n * WAD);
    expect(result.position.entryPriceX18).toBe(150n * WAD);
    expect(result.openedSizeX18).toBe(2n * WAD);
  });

  test("reducing realizes PnL and releases margin pro rata", () => {
    const position = createPosition({ size: 4n * WAD, entryPriceX18: 150n * WAD, margin: 60n * WAD });

    const result = applyFill(position, -WAD, 170n * WAD);

    expect(result.kind).toBe("reduce");
    expect(result.realizedPnlX18).toBe(20n * WAD);
    expect(result.releasedMarginX18).toBe(15n * WAD);
    expect(result.position).toEqual({
      size: 3n * WAD,
      margin: 45n * WAD,
      entryPriceX18: 150n * WAD,
      lastFundingIndexX18: 0n,
      realizedPnlX18: 20n * WAD,
    });
  });

  test("closing a short clears entry and margin", () => {
    const position = createPosition({ size: -2n * WAD, entryPriceX18: 100n * WAD, margin: 10n * WAD });

    const result = applyFill(position, 2n * WAD, 90n * WAD);

    expect(result.kind).toBe("close");
    expect(result.realizedPnlX18).toBe(20n * WAD);
    expect(result.releasedMarginX18).toBe(10n * WAD);
    expect(result.position.size).toBe(0n);
    expect(result.position.entryPriceX18).toBe(0n);
    expect(result.position.margin).toBe(0n);
  });

  test("flips only when the trade exceeds the position", () => {
    const position = createPosition({ size: WAD, entryPriceX18: 100n * WAD, margin: 10n * WAD });

    const exact = applyFill(position, -WAD, 80n * WAD);
    const flipped = applyFill(position, -3n * WAD, 80n * WAD);

    expect(exact.kind).toBe("close");
    expect(flipped.kind).toBe("flip");
    expect(flipped.realizedPnlX18).toBe(-20n * WAD);
    expect(flipped.closedSizeX18).toBe(WAD);
    expect(flipped.openedSizeX18).toBe(2n * WAD);
    expect(flipped.position.size).toBe(-2n * WAD);
    expect(flipped.position.entryPriceX18).toBe(80n * WAD);
    expect(flipped.position.margin).toBe(0n);
  });
});

describe("pnlForClose", () => {
  test("floors fractional losses against the trader", () => {
    expect(pnlForClose(1n, 3n, 2n, 1n)).toBe(-1n);
    expect(pnlForClose(1n, 2n, 3n, 1n)).toBe(0n);
  });
});

describe("addsRisk", () => {
  test("open, increase and flip add risk; reduce and close do not", () => {
    expect(addsRisk("open")).toBe(true);
    expect(addsRisk("increase")).toBe(true);
    expect(addsRisk("flip")).toBe(true);
    expect(addsRisk("reduce")).toBe(false);
    expect(addsRisk("close")).toBe(false);
  });
});

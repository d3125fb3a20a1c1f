/**
 * Margin and Liquidation Math Unit Tests
 */

import { describe, expect, test } from "vitest";

import { WAD } from "../src/fixed-point";
import {
  checkPositionBounds,
  isBelowMaintenance,
  liquidationPenalty,
  marginRatio,
  notional,
  pendingFunding,
  requiredMargin,
  splitPenalty,
  unrealizedPnl,
  validateRiskParams,
} from "../src/margin";
import { emptyPosition } from "../src/position";
import type { MarketRiskParams, Position } from "../src/types";

const createParams = (overrides: Partial<MarketRiskParams> = {}): MarketRiskParams => ({
  imrBps: 1000,
  mmrBps: 500,
  liquidationPenaltyBps: 250,
  penaltyCap: 0n,
  maxPositionSize: 0n,
  minPositionSize: 0n,
  liquidatorShareBps: 4000,
  ...overrides,
});

/** 10 long at 100 with 60 of margin */
const createPosition = (overrides: Partial<Position> = {}): Position => ({
  ...emptyPosition(0n),
  size: 10n * WAD,
  entryPriceX18: 100n * WAD,
  margin: 60n * WAD,
  ...overrides,
});

describe("notional and requiredMargin", () => {
  test("use the absolute size", () => {
    expect(notional(-2n * WAD, 100n * WAD)).toBe(200n * WAD);
    expect(requiredMargin(-2n * WAD, 100n * WAD, 500)).toBe(10n * WAD);
  });

  test("round up", () => {
    expect(notional(1n, 1n)).toBe(1n);
    expect(requiredMargin(1n, WAD, 1)).toBe(1n);
  });
});

describe("unrealizedPnl and pendingFunding", () => {
  test("a short loses when the price rises", () => {
    const short = createPosition({ size: -2n * WAD });

    expect(unrealizedPnl(short, 110n * WAD)).toBe(-20n * WAD);
  });

  test("longs pay and shorts receive a positive funding index move", () => {
    expect(pendingFunding(createPosition({ size: 2n * WAD }), WAD)).toBe(-2n * WAD);
    expect(pendingFunding(createPosition({ size: -2n * WAD }), WAD)).toBe(2n * WAD);
    expect(pendingFunding(emptyPosition(0n), WAD)).toBe(0n);
  });
});

describe("isBelowMaintenance", () => {
  test("compares effective margin with maintenance at the given price", () => {
    const position = createPosition();

    // 60 - 50 = 10 < 950 × 5%
    expect(isBelowMaintenance(position, 95n * WAD, 0n, 500)).toBe(true);
    // 60 >= 1000 × 5%
    expect(isBelowMaintenance(position, 100n * WAD, 0n, 500)).toBe(false);
  });

  test("counts pending funding", () => {
    // 60 - 20 of funding = 40 < 50
    expect(isBelowMaintenance(createPosition(), 100n * WAD, 2n * WAD, 500)).toBe(true);
  });

  test("an empty position is never below maintenance", () => {
    expect(isBelowMaintenance(emptyPosition(0n), 100n * WAD, 0n, 500)).toBe(false);
  });
});

describe("marginRatio", () => {
  test("is effective margin over notional", () => {
    expect(marginRatio(createPosition(), 100n * WAD, 0n)).toBe(WAD * 6n / 100n);
    expect(marginRatio(emptyPosition(0n), 100n * WAD, 0n)).toBeNull();
  });
});

describe("liquidationPenalty", () => {
  test("applies the penalty rate and cap", () => {
    expect(liquidationPenalty(10n * WAD, 100n * WAD, createParams())).toBe(25n * WAD);
    expect(liquidationPenalty(-10n * WAD, 100n * WAD, createParams({ penaltyCap: 20n * WAD }))).toBe(20n * WAD);
  });

  test("splits between liquidator and protocol", () => {
    expect(splitPenalty(25n * WAD, 4000)).toEqual({ liquidatorX18: 10n * WAD, protocolX18: 15n * WAD });
    expect(splitPenalty(3n, 5000)).toEqual({ liquidatorX18: 1n, protocolX18: 2n });
  });
});

describe("validateRiskParams", () => {
  test("accepts consistent parameters", () => {
    expect(validateRiskParams(createParams()).isOk()).toBe(true);
  });

  test.each([
    ["imr below mmr", { imrBps: 400 }],
    ["zero mmr", { mmrBps: 0, imrBps: 0 }],
    ["imr above 100%", { imrBps: 10_001 }],
    ["liquidator share above 100%", { liquidatorShareBps: 10_001 }],
    ["min above max", { minPositionSize: 2n * WAD, maxPositionSize: WAD }],
    ["negative cap", { penaltyCap: -1n }],
  ])("rejects %s", (_name, overrides: Partial<MarketRiskParams>) => {
    expect(validateRiskParams(createParams(overrides))._unsafeUnwrapErr().type).toBe("INVALID_RISK_PARAMS");
  });
});

describe("checkPositionBounds", () => {
  const params = createParams({ minPositionSize: WAD, maxPositionSize: 100n * WAD });

  test("always allows zero", () => {
    expect(checkPositionBounds(0n, params).isOk()).toBe(true);
  });

  test("enforces both bounds on the absolute size", () => {
    expect(checkPositionBounds(-WAD / 2n, params)._unsafeUnwrapErr().type).toBe("SIZE_BELOW_MINIMUM");
    expect(checkPositionBounds(101n * WAD, params)._unsafeUnwrapErr().type).toBe("SIZE_ABOVE_MAXIMUM");
    expect(checkPositionBounds(-100n * WAD, params).isOk()).toBe(true);
  });

  test("zero bounds leave sizes unconstrained", () => {
    expect(checkPositionBounds(10n ** 30n, createParams()).isOk()).toBe(true);
  });
});

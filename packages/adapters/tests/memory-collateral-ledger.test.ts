import { describe, expect, test } from "vitest";

import { MemoryCollateralLedger, stableToken } from "../src/memory/memory-collateral-ledger";
import { MemoryInsuranceFund } from "../src/memory/memory-insurance-fund";

const USDC = stableToken("USDC", 6);
const WAD = 10n ** 18n;

describe("MemoryCollateralLedger", () => {
  test("deposit, withdraw and seize move native units", () => {
    const ledger = new MemoryCollateralLedger([USDC]);

    expect(ledger.deposit("alice", "USDC", 5_000_000n)._unsafeUnwrap()).toBe(5_000_000n);
    expect(ledger.withdraw("alice", "USDC", 1_000_000n)._unsafeUnwrap()).toBe(1_000_000n);
    expect(ledger.seize("alice", "fees", "USDC", 500_000n)._unsafeUnwrap()).toBe(500_000n);

    expect(ledger.balanceOf("alice", "USDC")).toBe(3_500_000n);
    expect(ledger.balanceOf("fees", "USDC")).toBe(500_000n);
  });

  test("debits beyond the balance are rejected and leave it untouched", () => {
    const ledger = new MemoryCollateralLedger([USDC]);
    ledger.deposit("alice", "USDC", 10n);

    const result = ledger.withdraw("alice", "USDC", 11n);

    expect(result._unsafeUnwrapErr().type).toBe("INSUFFICIENT_BALANCE");
    expect(ledger.balanceOf("alice", "USDC")).toBe(10n);
  });

  test("unknown and disabled tokens are rejected", () => {
    const ledger = new MemoryCollateralLedger([USDC]);

    expect(ledger.deposit("alice", "DAI", 1n)._unsafeUnwrapErr().type).toBe("UNKNOWN_TOKEN");
    ledger.setTokenEnabled("USDC", false);
    expect(ledger.deposit("alice", "USDC", 1n)._unsafeUnwrapErr().type).toBe("TOKEN_DISABLED");
  });

  test("settlePnL credits and debits by sign", () => {
    const ledger = new MemoryCollateralLedger([USDC]);
    ledger.deposit("alice", "USDC", 100n);

    expect(ledger.settlePnL("alice", "USDC", 25n)._unsafeUnwrap()).toBe(25n);
    expect(ledger.settlePnL("alice", "USDC", -40n)._unsafeUnwrap()).toBe(-40n);
    expect(ledger.balanceOf("alice", "USDC")).toBe(85n);
  });

  test("collateral value applies price and haircut", () => {
    const ledger = new MemoryCollateralLedger([
      USDC,
      { token: "WETH", baseUnit: WAD, enabled: true, priceX18: 2000n * WAD, haircutBps: 1000 },
    ]);
    ledger.deposit("alice", "USDC", 1_500_000n);
    ledger.deposit("alice", "WETH", WAD / 2n);

    // 1.5 USDC + 0.5 WETH * 2000 * 90%
    expect(ledger.accountCollateralValue("alice")._unsafeUnwrap()).toBe(901_500_000_000_000_000_000n);
    expect(ledger.accountCollateralValue("nobody")._unsafeUnwrap()).toBe(0n);
  });
});

describe("MemoryInsuranceFund", () => {
  test("pays out up to its balance", () => {
    const ledger = new MemoryCollateralLedger([USDC]);
    ledger.deposit("insurance", "USDC", 300n);
    const fund = new MemoryInsuranceFund(ledger, "insurance", "USDC");

    expect(fund.payout("alice", 200n)._unsafeUnwrap()).toBe(200n);
    expect(fund.payout("alice", 200n)._unsafeUnwrap()).toBe(100n);
    expect(fund.payout("alice", 200n)._unsafeUnwrap()).toBe(0n);
    expect(ledger.balanceOf("alice", "USDC")).toBe(300n);
    expect(fund.balance()).toBe(0n);
  });
});

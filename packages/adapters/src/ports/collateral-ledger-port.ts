/**
 * Collateral Ledger Port - custody of account balances
 *
 * Amounts are in each token's native units (`baseUnit` = 10^decimals).
 * The clearing engine converts to 1e18 and picks the rounding direction.
 */

import type { Result } from "neverthrow";

export type LedgerError =
  | { type: "UNKNOWN_TOKEN"; message: string }
  | { type: "TOKEN_DISABLED"; message: string }
  | { type: "INSUFFICIENT_BALANCE"; message: string }
  | { type: "INVALID_AMOUNT"; message: string };

export interface TokenConfig {
  token: string;
  /** 10^decimals */
  baseUnit: bigint;
  enabled: boolean;
  /** USD value of one whole token, 1e18 */
  priceX18: bigint;
  /** Discount applied when valuing the token as collateral */
  haircutBps: number;
}

export interface CollateralLedgerPort {
  balanceOf(account: string, token: string): bigint;

  /**
   * Credit an account, returns the amount actually credited
   */
  deposit(account: string, token: string, amount: bigint): Result<bigint, LedgerError>;

  /**
   * Debit an account, returns the amount actually debited
   */
  withdraw(account: string, token: string, amount: bigint): Result<bigint, LedgerError>;

  /**
   * Move `amount` from one account to another
   */
  seize(from: string, to: string, token: string, amount: bigint): Result<bigint, LedgerError>;

  /**
   * Apply a signed PnL amount, returns the signed amount applied
   */
  settlePnL(account: string, token: string, signedAmount: bigint): Result<bigint, LedgerError>;

  /**
   * USD value of every collateral token held, after haircuts (1e18)
   */
  accountCollateralValue(account: string): Result<bigint, LedgerError>;

  tokenConfig(token: string): Result<TokenConfig, LedgerError>;
}

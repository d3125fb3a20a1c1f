/**
 * In-memory collateral ledger
 *
 * Balances are held per (account, token) in native units. Collateral value
 * is floored at each step.
 */

import { err, ok, type Result } from "neverthrow";

import type { CollateralLedgerPort, LedgerError, TokenConfig } from "../ports/collateral-ledger-port";

const WAD = 10n ** 18n;
const BPS = 10_000n;

export class MemoryCollateralLedger implements CollateralLedgerPort {
  private readonly tokens = new Map<string, TokenConfig>();
  private readonly balances = new Map<string, Map<string, bigint>>();

  constructor(tokens: TokenConfig[] = []) {
    for (const token of tokens) {
      this.tokens.set(token.token, { ...token });
    }
  }

  registerToken(config: TokenConfig): void {
    this.tokens.set(config.token, { ...config });
  }

  setTokenEnabled(token: string, enabled: boolean): void {
    const config = this.tokens.get(token);
    if (config) config.enabled = enabled;
  }

  setTokenPrice(token: string, priceX18: bigint): void {
    const config = this.tokens.get(token);
    if (config) config.priceX18 = priceX18;
  }

  tokenConfig(token: string): Result<TokenConfig, LedgerError> {
    const config = this.tokens.get(token);
    if (!config) {
      return err({ type: "UNKNOWN_TOKEN", message: `token ${token} is not registered` });
    }
    return ok({ ...config });
  }

  balanceOf(account: string, token: string): bigint {
    return this.balances.get(account)?.get(token) ?? 0n;
  }

  deposit(account: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.usableToken(token, amount).map(() => {
      this.setBalance(account, token, this.balanceOf(account, token) + amount);
      return amount;
    });
  }

  withdraw(account: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.usableToken(token, amount).andThen(() => {
      const balance = this.balanceOf(account, token);
      if (balance < amount) {
        return err<bigint, LedgerError>({
          type: "INSUFFICIENT_BALANCE",
          message: `${account} holds ${balance.toString()} ${token}, cannot debit ${amount.toString()}`,
        });
      }
      this.setBalance(account, token, balance - amount);
      return ok(amount);
    });
  }

  seize(from: string, to: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.withdraw(from, token, amount).map(moved => {
      this.setBalance(to, token, this.balanceOf(to, token) + moved);
      return moved;
    });
  }

  settlePnL(account: string, token: string, signedAmount: bigint): Result<bigint, LedgerError> {
    if (signedAmount >= 0n) {
      return this.deposit(account, token, signedAmount);
    }
    return this.withdraw(account, token, -signedAmount).map(debited => -debited);
  }

  accountCollateralValue(account: string): Result<bigint, LedgerError> {
    const holdings = this.balances.get(account);
    if (!holdings) return ok(0n);

    let total = 0n;
    for (const [token, balance] of holdings) {
      const config = this.tokens.get(token);
      if (!config || !config.enabled || balance === 0n) continue;
      const gross = (balance * config.priceX18) / config.baseUnit;
      total += (gross * (BPS - BigInt(config.haircutBps))) / BPS;
    }
    return ok(total);
  }

  private usableToken(token: string, amount: bigint): Result<TokenConfig, LedgerError> {
    if (amount < 0n) {
      return err({ type: "INVALID_AMOUNT", message: `amount must be non-negative, got ${amount.toString()}` });
    }
    const config = this.tokens.get(token);
    if (!config) {
      return err({ type: "UNKNOWN_TOKEN", message: `token ${token} is not registered` });
    }
    if (!config.enabled) {
      return err({ type: "TOKEN_DISABLED", message: `token ${token} is disabled` });
    }
    return ok(config);
  }

  private setBalance(account: string, token: string, amount: bigint): void {
    let holdings = this.balances.get(account);
    if (!holdings) {
      holdings = new Map();
      this.balances.set(account, holdings);
    }
    holdings.set(token, amount);
  }
}

/**
 * One whole unit of a token with `decimals` decimals, priced at $1 unless given
 */
export function stableToken(token: string, decimals: number, priceX18: bigint = WAD): TokenConfig {
  return { token, baseUnit: 10n ** BigInt(decimals), enabled: true, priceX18, haircutBps: 0 };
}

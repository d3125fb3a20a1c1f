/**
 * Collateral ledger view that defers every effect until commit
 *
 * Balances read through the view include pending effects. On commit the
 * effects are replayed against the real ledger in order.
 */

import { err, ok, type Result } from "neverthrow";

import type { CollateralLedgerPort, LedgerError, TokenConfig } from "@perp-clearing/adapters";

type LedgerEffect =
  | { kind: "deposit"; account: string; token: string; amount: bigint }
  | { kind: "withdraw"; account: string; token: string; amount: bigint }
  | { kind: "seize"; from: string; to: string; token: string; amount: bigint }
  | { kind: "settlePnL"; account: string; token: string; amount: bigint };

function inverse(effect: LedgerEffect): LedgerEffect {
  switch (effect.kind) {
    case "deposit":
      return { kind: "withdraw", account: effect.account, token: effect.token, amount: effect.amount };
    case "withdraw":
      return { kind: "deposit", account: effect.account, token: effect.token, amount: effect.amount };
    case "seize":
      return { kind: "seize", from: effect.to, to: effect.from, token: effect.token, amount: effect.amount };
    case "settlePnL":
      return { kind: "settlePnL", account: effect.account, token: effect.token, amount: -effect.amount };
  }
}

const key = (account: string, token: string) => `${account}\u0000${token}`;

export class BufferedLedger {
  private readonly deltas = new Map<string, bigint>();
  private readonly effects: LedgerEffect[] = [];
  private readonly applied: LedgerEffect[] = [];

  constructor(private readonly ledger: CollateralLedgerPort) {}

  balanceOf(account: string, token: string): bigint {
    return this.ledger.balanceOf(account, token) + (this.deltas.get(key(account, token)) ?? 0n);
  }

  tokenConfig(token: string): Result<TokenConfig, LedgerError> {
    return this.ledger.tokenConfig(token);
  }

  accountCollateralValue(account: string): Result<bigint, LedgerError> {
    return this.ledger.accountCollateralValue(account);
  }

  deposit(account: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.usable(token, amount).map(() => {
      this.shift(account, token, amount);
      this.effects.push({ kind: "deposit", account, token, amount });
      return amount;
    });
  }

  withdraw(account: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.debitable(account, token, amount).map(() => {
      this.shift(account, token, -amount);
      this.effects.push({ kind: "withdraw", account, token, amount });
      return amount;
    });
  }

  seize(from: string, to: string, token: string, amount: bigint): Result<bigint, LedgerError> {
    return this.debitable(from, token, amount).map(() => {
      this.shift(from, token, -amount);
      this.shift(to, token, amount);
      this.effects.push({ kind: "seize", from, to, token, amount });
      return amount;
    });
  }

  settlePnL(account: string, token: string, signedAmount: bigint): Result<bigint, LedgerError> {
    const check = signedAmount >= 0n ? this.usable(token, signedAmount) : this.debitable(account, token, -signedAmount);
    return check.map(() => {
      this.shift(account, token, signedAmount);
      this.effects.push({ kind: "settlePnL", account, token, amount: signedAmount });
      return signedAmount;
    });
  }

  get pending(): number {
    return this.effects.length;
  }

  /**
   * Replay buffered effects. A refusal undoes the effects already replayed,
   * so the real ledger sees all of them or none.
   */
  commit(): Result<number, LedgerError> {
    this.applied.length = 0;
    for (const effect of this.effects) {
      const result = this.apply(effect);
      if (result.isErr()) {
        const undone = this.rollback();
        return err(undone.isErr() ? undone.error : result.error);
      }
      this.applied.push(effect);
    }
    const count = this.applied.length;
    this.effects.length = 0;
    this.deltas.clear();
    return ok(count);
  }

  /**
   * Reverse the effects replayed by the last commit, newest first
   */
  rollback(): Result<number, LedgerError> {
    let undone = 0;
    for (let effect = this.applied.pop(); effect !== undefined; effect = this.applied.pop()) {
      const result = this.apply(inverse(effect));
      if (result.isErr()) return err(result.error);
      undone++;
    }
    return ok(undone);
  }

  private apply(effect: LedgerEffect): Result<bigint, LedgerError> {
    switch (effect.kind) {
      case "deposit":
        return this.ledger.deposit(effect.account, effect.token, effect.amount);
      case "withdraw":
        return this.ledger.withdraw(effect.account, effect.token, effect.amount);
      case "seize":
        return this.ledger.seize(effect.from, effect.to, effect.token, effect.amount);
      case "settlePnL":
        return this.ledger.settlePnL(effect.account, effect.token, effect.amount);
    }
  }

  private usable(token: string, amount: bigint): Result<TokenConfig, LedgerError> {
    if (amount < 0n) {
      return err({ type: "INVALID_AMOUNT", message: `amount must be non-negative, got ${amount.toString()}` });
    }
    return this.ledger.tokenConfig(token).andThen(config =>
      config.enabled ? ok(config) : err<TokenConfig, LedgerError>({ type: "TOKEN_DISABLED", message: `token ${token} is disabled` }),
    );
  }

  private debitable(account: string, token: string, amount: bigint): Result<TokenConfig, LedgerError> {
    return this.usable(token, amount).andThen(config => {
      const balance = this.balanceOf(account, token);
      if (balance < amount) {
        return err<TokenConfig, LedgerError>({
          type: "INSUFFICIENT_BALANCE",
          message: `${account} holds ${balance.toString()} ${token}, cannot debit ${amount.toString()}`,
        });
      }
      return ok(config);
    });
  }

  private shift(account: string, token: string, amount: bigint): void {
    const k = key(account, token);
    this.deltas.set(k, (this.deltas.get(k) ?? 0n) + amount);
  }
}

/**
 * Role checks for admin operations
 */

import { err, ok, type Result } from "neverthrow";

import type { AccountId } from "@perp-clearing/core";

import { clearingError, type ClearingError } from "./errors";

export type Role = "RISK_ADMIN" | "MARKET_ADMIN" | "PAUSER";

export type RoleGrants = Partial<Record<Role, readonly AccountId[]>>;

export class AccessControl {
  private readonly members = new Map<Role, Set<AccountId>>();

  constructor(grants: RoleGrants = {}) {
    for (const [role, accounts] of Object.entries(grants)) {
      if (!isRole(role) || !accounts) continue;
      for (const account of accounts) this.grant(role, account);
    }
  }

  grant(role: Role, account: AccountId): void {
    let set = this.members.get(role);
    if (!set) {
      set = new Set();
      this.members.set(role, set);
    }
    set.add(account);
  }

  revoke(role: Role, account: AccountId): void {
    this.members.get(role)?.delete(account);
  }

  hasRole(role: Role, account: AccountId): boolean {
    return this.members.get(role)?.has(account) ?? false;
  }

  require(role: Role, account: AccountId): Result<void, ClearingError> {
    if (!this.hasRole(role, account)) {
      return err(clearingError("PERMISSION_DENIED", `${account} lacks role ${role}`));
    }
    return ok(undefined);
  }
}

function isRole(value: string): value is Role {
  return value === "RISK_ADMIN" || value === "MARKET_ADMIN" || value === "PAUSER";
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/custody/in-memory-vault`
 * Purpose: In-process custody ledger implementing FundCustody, with external accounts and recipient hooks.
 * Scope: Tracks the vault's held balance and outside account balances in memory. Does not persist or talk to a chain.
 * Invariants:
 * - disburse debits the held balance and credits the recipient before the recipient hook runs.
 * - A hook that throws undoes both sides and rejects the transfer.
 * - Balances never go negative.
 * Side-effects: none (in-memory only)
 * Notes: Recipient hooks model receivers that run their own logic on payment, including calls back into the distributor.
 * Links: Implements FundCustody port
 * @public
 */

import type { FundCustody } from "@/ports";

/** Logic a recipient runs when funds arrive */
export type ReceiveHook = (amount: bigint) => void | Promise<void>;

export class VaultTransferError extends Error {
  public readonly code = "VAULT_TRANSFER_FAILED" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultTransferError";
  }
}

export function isVaultTransferError(
  error: unknown
): error is VaultTransferError {
  return error instanceof Error && error.name === "VaultTransferError";
}

export class InMemoryVault implements FundCustody {
  private held = 0n;
  private readonly accounts = new Map<string, bigint>();
  private readonly receivers = new Map<string, ReceiveHook>();

  async balance(): Promise<bigint> {
    return this.held;
  }

  /** Balance of an outside account */
  accountBalance(account: string): bigint {
    return this.accounts.get(account) ?? 0n;
  }

  /**
   * Give an outside account funds, e.g. a depositor or yield source.
   */
  fundAccount(account: string, amount: bigint): void {
    assertPositive(amount);
    this.accounts.set(account, this.accountBalance(account) + amount);
  }

  /**
   * Funds arriving straight into the vault without going through the
   * distributor (carry-over funding).
   */
  receiveExternal(amount: bigint): void {
    assertPositive(amount);
    this.held += amount;
  }

  onReceive(account: string, hook: ReceiveHook): void {
    this.receivers.set(account, hook);
  }

  clearReceiver(account: string): void {
    this.receivers.delete(account);
  }

  async collect(from: string, amount: bigint): Promise<void> {
    assertPositive(amount);
    const available = this.accountBalance(from);
    if (available < amount) {
      throw new VaultTransferError(
        `${from} holds ${available}, cannot send ${amount}`
      );
    }
    this.accounts.set(from, available - amount);
    this.held += amount;
  }

  async disburse(to: string, amount: bigint): Promise<void> {
    assertPositive(amount);
    if (this.held < amount) {
      throw new VaultTransferError(
        `vault holds ${this.held}, cannot send ${amount}`
      );
    }
    this.held -= amount;
    this.accounts.set(to, this.accountBalance(to) + amount);

    const hook = this.receivers.get(to);
    if (!hook) return;
    try {
      await hook(amount);
    } catch (cause) {
      this.accounts.set(to, this.accountBalance(to) - amount);
      this.held += amount;
      throw new VaultTransferError(`${to} rejected ${amount}`, { cause });
    }
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new VaultTransferError(`transfer amount must be positive, got ${amount}`);
  }
}

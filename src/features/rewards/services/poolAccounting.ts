// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/poolAccounting`
 * Purpose: Strategies deciding a round's reward pool when its scores are loaded.
 * Scope: Direct (sum of deposits made while the round was open) and carry-over (held balance minus outstanding rewards). Does not mutate the ledger.
 * Invariants: preparePool() performs all I/O; the resolver it returns is synchronous so score loading commits in one step.
 * Side-effects: IO (carry-over reads the custody balance)
 * Links: Selected by createPoolAccounting from REWARDS_POOL_MODE
 * @public
 */

import { inferCarryOverPool, type PoolMode } from "@rewards/settlement-core";

import type { FundCustody } from "@/ports";

import type { RoundLedger } from "./roundLedger";

/**
 * `unsettled` is the total of claim payouts whose transfer had not settled
 * when or after the custody balance was read.
 */
export type PoolResolver = (
  ledger: RoundLedger,
  roundId: number,
  unsettled: bigint
) => bigint;

export interface PoolAccounting {
  readonly mode: PoolMode;
  /** Whether deposit() credits the current round's pool */
  readonly creditsDeposits: boolean;
  preparePool(): Promise<PoolResolver>;
}

export class DirectPoolAccounting implements PoolAccounting {
  readonly mode = "direct" as const;
  readonly creditsDeposits = true;

  async preparePool(): Promise<PoolResolver> {
    return (ledger, roundId) => ledger.accruedPool(roundId);
  }
}

/**
 * New inflows are attributed to the round being scored without any deposit
 * bookkeeping: whatever custody holds beyond earlier rounds' unpaid rewards.
 * Payouts still in flight count as unpaid, since the balance read may not
 * reflect their debit yet.
 */
export class CarryOverPoolAccounting implements PoolAccounting {
  readonly mode = "carry-over" as const;
  readonly creditsDeposits = false;

  constructor(private readonly custody: FundCustody) {}

  async preparePool(): Promise<PoolResolver> {
    const heldBalance = await this.custody.balance();
    return (ledger, roundId, unsettled) =>
      inferCarryOverPool(
        heldBalance,
        ledger.outstandingBefore(roundId) + unsettled
      );
  }
}

export function createPoolAccounting(
  mode: PoolMode,
  custody: FundCustody
): PoolAccounting {
  return mode === "carry-over"
    ? new CarryOverPoolAccounting(custody)
    : new DirectPoolAccounting();
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/rewards/claimSettlement`
 * Purpose: Unit tests for claim settlement around the outbound transfer: re-entrancy, rollback, pagination and metrics.
 * Scope: Uses InMemoryVault receiver hooks to act as the paid participant. Does NOT test pool accounting.
 * Invariants: State commits before the transfer; a failed transfer reverts every change of the claim; a nested claim gets nothing.
 * Side-effects: global (reads the prom-client registry)
 * Links: src/features/rewards/services/rewardDistributor.ts
 * @public
 */

import {
  InputValidationError,
  NothingToClaimError,
  TransferFailureError,
  isNothingToClaimError,
} from "@rewards/settlement-core";
import {
  ADMIN,
  createDistributorHarness,
  type DistributorHarness,
  playRound,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { isVaultTransferError } from "@/adapters/server";
import { rewardsClaimsTotal } from "@/shared/observability";

async function claimCount(outcome: string): Promise<number> {
  const metric = await rewardsClaimsTotal.get();
  return (
    metric.values.find((sample) => sample.labels.outcome === outcome)?.value ??
    0
  );
}

/** Rounds paying alice 7, 10 and 6 */
async function playThreeRounds(h: DistributorHarness): Promise<void> {
  await playRound(
    h,
    [
      ["alice", 700n],
      ["bob", 300n],
    ],
    10n
  );
  h.distributor.startNewRound(ADMIN);
  await playRound(
    h,
    [
      ["alice", 1n],
      ["bob", 1n],
    ],
    20n
  );
  h.distributor.startNewRound(ADMIN);
  await playRound(
    h,
    [
      ["alice", 2n],
      ["bob", 1n],
    ],
    9n
  );
}

describe("claim settlement", () => {
  describe("re-entrancy", () => {
    it("commits the claim before the transfer runs the receiver", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      const seen: Array<{ claimed: boolean; claimable: bigint }> = [];
      h.vault.onReceive("alice", () => {
        seen.push({
          claimed: h.distributor.hasClaimed(1, "alice"),
          claimable: h.distributor.getTotalClaimableAmount("alice"),
        });
      });

      await h.distributor.claim("alice");

      expect(seen).toEqual([{ claimed: true, claimable: 0n }]);
    });

    it("fails a nested claim from the receiver with nothing to claim", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      const nested: unknown[] = [];
      h.vault.onReceive("alice", async () => {
        try {
          await h.distributor.claim("alice");
        } catch (error) {
          nested.push(error);
        }
      });

      const receipt = await h.distributor.claim("alice");

      expect(receipt.total).toBe(10n);
      expect(nested).toHaveLength(1);
      expect(isNothingToClaimError(nested[0])).toBe(true);
      expect(h.vault.accountBalance("alice")).toBe(10n);
      expect(await h.vault.balance()).toBe(0n);
    });

    it("lets another participant claim from inside a transfer", async () => {
      const h = createDistributorHarness();
      await playRound(
        h,
        [
          ["alice", 700n],
          ["bob", 300n],
        ],
        10n
      );
      h.vault.onReceive("alice", async () => {
        await h.distributor.claim("bob");
      });

      await h.distributor.claim("alice");

      expect(h.vault.accountBalance("bob")).toBe(3n);
      expect(h.distributor.getOutstandingRewards()).toBe(0n);
    });
  });

  describe("transfer failure", () => {
    it("reverts every change when the receiver rejects", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      h.vault.onReceive("alice", () => {
        throw new Error("receiver refuses funds");
      });

      const failure: unknown = await h.distributor.claim("alice").then(
        () => undefined,
        (error: unknown) => error
      );

      expect(failure).toBeInstanceOf(TransferFailureError);
      if (!(failure instanceof TransferFailureError)) return;
      expect(failure.recipient).toBe("alice");
      expect(failure.amount).toBe(10n);
      expect(isVaultTransferError(failure.cause)).toBe(true);
      expect(h.distributor.hasClaimed(1, "alice")).toBe(false);
      expect(h.distributor.getRoundStats(1).claimedAmount).toBe(0n);
      expect(await h.vault.balance()).toBe(10n);
      expect(h.vault.accountBalance("alice")).toBe(0n);
    });

    it("allows the claim again once the receiver accepts", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      h.vault.onReceive("alice", () => {
        throw new Error("receiver refuses funds");
      });
      await expect(h.distributor.claim("alice")).rejects.toBeInstanceOf(
        TransferFailureError
      );
      h.vault.clearReceiver("alice");

      const receipt = await h.distributor.claim("alice");

      expect(receipt.total).toBe(10n);
    });

    it("fails when custody was drained by an emergency withdrawal", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      await h.distributor.emergencyWithdraw(ADMIN, 10n, "treasury");

      await expect(h.distributor.claim("alice")).rejects.toBeInstanceOf(
        TransferFailureError
      );
      expect(h.distributor.getTotalClaimableAmount("alice")).toBe(10n);
    });
  });

  describe("pagination", () => {
    it("settles at most maxRounds paying rounds per call", async () => {
      const h = createDistributorHarness();
      await playThreeRounds(h);

      const first = await h.distributor.claim("alice", { maxRounds: 2 });
      const second = await h.distributor.claim("alice", { maxRounds: 2 });

      expect(first.total).toBe(17n);
      expect(first.truncated).toBe(true);
      expect(second.payouts).toEqual([{ roundId: 3, amount: 6n }]);
      expect(second.truncated).toBe(false);
    });

    it("does not report truncation when only unscored rounds remain", async () => {
      const h = createDistributorHarness();
      await playThreeRounds(h);
      h.distributor.startNewRound(ADMIN);
      await playRound(h, [["bob", 1n]], 5n, ["alice"]);

      const receipt = await h.distributor.claim("alice", { maxRounds: 3 });

      expect(receipt.total).toBe(23n);
      expect(receipt.truncated).toBe(false);
      await expect(h.distributor.claim("alice")).rejects.toBeInstanceOf(
        NothingToClaimError
      );
    });

    it("applies the configured scan limit by default", async () => {
      const h = createDistributorHarness({ claimScanLimit: 1 });
      await playThreeRounds(h);

      const receipt = await h.distributor.claim("alice");

      expect(receipt.payouts).toEqual([{ roundId: 1, amount: 7n }]);
      expect(receipt.truncated).toBe(true);
    });

    it("lets an explicit maxRounds override the configured limit", async () => {
      const h = createDistributorHarness({ claimScanLimit: 1 });
      await playThreeRounds(h);

      const receipt = await h.distributor.claim("alice", { maxRounds: 5 });

      expect(receipt.total).toBe(23n);
    });

    it.each([0, -1, 1.5])("rejects maxRounds %s", async (maxRounds) => {
      const h = createDistributorHarness();
      await playThreeRounds(h);

      await expect(
        h.distributor.claim("alice", { maxRounds })
      ).rejects.toBeInstanceOf(InputValidationError);
    });
  });

  describe("metrics", () => {
    it("counts claims by outcome", async () => {
      const h = createDistributorHarness();
      await playRound(h, [["alice", 1n]], 10n);
      const paidBefore = await claimCount("paid");
      const emptyBefore = await claimCount("nothing_to_claim");

      await h.distributor.claim("alice");
      await expect(h.distributor.claim("alice")).rejects.toBeInstanceOf(
        NothingToClaimError
      );

      expect(await claimCount("paid")).toBe(paidBefore + 1);
      expect(await claimCount("nothing_to_claim")).toBe(emptyBefore + 1);
    });
  });
});

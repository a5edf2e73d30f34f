// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/rewards/roundLedger`
 * Purpose: Unit tests for the round arena, score loading and claim planning.
 * Scope: Exercises RoundLedger directly. Does NOT test phases, authorization or custody.
 * Invariants: totalScore tracks the last score per participant; failed batches leave no trace; revert restores claim state.
 * Side-effects: none
 * Links: src/features/rewards/services/roundLedger.ts
 * @public
 */

import {
  DuplicateRegistrationError,
  NotRegisteredError,
} from "@rewards/settlement-core";
import { beforeEach, describe, expect, it } from "vitest";

import { RoundLedger } from "@/features/rewards/services/roundLedger";

describe("RoundLedger", () => {
  let ledger: RoundLedger;

  beforeEach(() => {
    ledger = new RoundLedger();
    ledger.open(1);
  });

  describe("open", () => {
    it("appends records up to the requested id", () => {
      ledger.open(3);
      expect(ledger.latestRoundId).toBe(3);
      expect(ledger.stats(2)).toEqual({
        roundId: 2,
        participantCount: 0,
        totalScore: 0n,
        rewardPool: 0n,
        claimedAmount: 0n,
        sealed: false,
      });
    });

    it("never shrinks the arena", () => {
      ledger.open(3);
      ledger.open(2);
      expect(ledger.latestRoundId).toBe(3);
    });
  });

  describe("register", () => {
    it("keeps registration order", () => {
      ledger.register(1, "carol");
      ledger.register(1, "alice");
      expect(ledger.participants(1)).toEqual(["carol", "alice"]);
    });

    it("rejects a second registration in the same round", () => {
      ledger.register(1, "alice");
      expect(() => ledger.register(1, "alice")).toThrow(
        DuplicateRegistrationError
      );
      expect(ledger.participants(1)).toEqual(["alice"]);
    });

    it("returns a copy of the registrant list", () => {
      ledger.register(1, "alice");
      const listed = [...ledger.participants(1)];
      listed.push("mallory");
      expect(ledger.participants(1)).toEqual(["alice"]);
    });
  });

  describe("loadScores", () => {
    beforeEach(() => {
      ledger.register(1, "alice");
      ledger.register(1, "bob");
    });

    it("keeps the last score of a participant listed twice", () => {
      ledger.loadScores(
        1,
        [
          { participant: "alice", score: 100n },
          { participant: "bob", score: 50n },
          { participant: "alice", score: 300n },
        ],
        700n
      );

      expect(ledger.scoreOf(1, "alice")).toBe(300n);
      expect(ledger.stats(1).totalScore).toBe(350n);
      expect(ledger.claimableIn(1, "alice")).toBe(600n);
      expect(ledger.claimableIn(1, "bob")).toBe(100n);
    });

    it("writes nothing when a participant is not registered", () => {
      expect(() =>
        ledger.loadScores(
          1,
          [
            { participant: "alice", score: 10n },
            { participant: "mallory", score: 10n },
          ],
          100n
        )
      ).toThrow(NotRegisteredError);

      expect(ledger.scoreOf(1, "alice")).toBe(0n);
      expect(ledger.stats(1)).toMatchObject({
        totalScore: 0n,
        rewardPool: 0n,
        sealed: false,
      });
    });

    it("seals the pool", () => {
      ledger.addToPool(1, 40n);
      ledger.loadScores(1, [{ participant: "alice", score: 1n }], 40n);

      expect(ledger.stats(1).sealed).toBe(true);
      expect(() => ledger.addToPool(1, 5n)).toThrow("Round 1 pool is sealed");
    });
  });

  describe("views on unknown rounds", () => {
    it("return empty results", () => {
      expect(ledger.participants(99)).toEqual([]);
      expect(ledger.isRegistered(0, "alice")).toBe(false);
      expect(ledger.scoreOf(-1, "alice")).toBe(0n);
      expect(ledger.claimableIn(42, "alice")).toBe(0n);
      expect(ledger.stats(7).participantCount).toBe(0);
    });
  });

  describe("claim planning", () => {
    // Round 1: pool 10, alice 700 / bob 300 → 7
    // Round 2: pool 20, alice 1 / bob 1 → 10
    // Round 3: pool 9, alice 2 / bob 1 → 6
    beforeEach(() => {
      const rounds: Array<[number, bigint, bigint, bigint]> = [
        [1, 10n, 700n, 300n],
        [2, 20n, 1n, 1n],
        [3, 9n, 2n, 1n],
      ];
      for (const [roundId, pool, alice, bob] of rounds) {
        ledger.open(roundId);
        ledger.register(roundId, "alice");
        ledger.register(roundId, "bob");
        ledger.loadScores(
          roundId,
          [
            { participant: "alice", score: alice },
            { participant: "bob", score: bob },
          ],
          pool
        );
      }
    });

    it("collects every pending round up to the bound", () => {
      const plan = ledger.planClaim("alice", 3);
      expect(plan.payouts).toEqual([
        { roundId: 1, amount: 7n },
        { roundId: 2, amount: 10n },
        { roundId: 3, amount: 6n },
      ]);
      expect(plan.total).toBe(23n);
      expect(plan.truncated).toBe(false);
    });

    it("stops at the through round", () => {
      const plan = ledger.planClaim("alice", 2);
      expect(plan.total).toBe(17n);
      expect(plan.truncated).toBe(false);
      expect(plan.nextCursor).toBe(2);
    });

    it("flags a plan cut short by maxRounds", () => {
      const plan = ledger.planClaim("alice", 3, 2);
      expect(plan.payouts.map((p) => p.roundId)).toEqual([1, 2]);
      expect(plan.truncated).toBe(true);
    });

    it("passes over rounds that pay nothing without flagging truncation", () => {
      ledger.open(4);
      ledger.register(4, "alice");
      ledger.register(4, "bob");
      ledger.loadScores(4, [{ participant: "bob", score: 1n }], 5n);

      const plan = ledger.planClaim("alice", 4, 3);

      expect(plan.total).toBe(23n);
      expect(plan.truncated).toBe(false);
      expect(plan.nextCursor).toBe(4);
    });

    it("commit marks rounds claimed and advances the cursor", () => {
      ledger.commitClaim(ledger.planClaim("alice", 3, 2));

      expect(ledger.hasClaimed(1, "alice")).toBe(true);
      expect(ledger.hasClaimed(2, "alice")).toBe(true);
      expect(ledger.stats(2).claimedAmount).toBe(10n);
      expect(ledger.planClaim("alice", 3).payouts).toEqual([
        { roundId: 3, amount: 6n },
      ]);
    });

    it("revert restores flags, claimed amounts and cursor", () => {
      const committed = ledger.commitClaim(ledger.planClaim("alice", 3));
      expect(ledger.outstanding()).toBe(16n);

      ledger.revertClaim(committed);

      expect(ledger.hasClaimed(1, "alice")).toBe(false);
      expect(ledger.stats(3).claimedAmount).toBe(0n);
      expect(ledger.outstanding()).toBe(39n);
      expect(ledger.planClaim("alice", 3).total).toBe(23n);
    });

    it("outstandingBefore counts only earlier rounds", () => {
      expect(ledger.outstandingBefore(1)).toBe(0n);
      expect(ledger.outstandingBefore(3)).toBe(30n);
    });

    it("plans nothing for an unknown participant", () => {
      const plan = ledger.planClaim("nobody", 3);
      expect(plan.total).toBe(0n);
      expect(plan.payouts).toEqual([]);
    });
  });
});

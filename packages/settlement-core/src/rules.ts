// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@rewards/settlement-core/rules`
 * Purpose: Share computation, score batch validation and carry-over pool inference with BIGINT arithmetic.
 * Scope: Pure functions. Does not perform I/O or mutate external state.
 * Invariants:
 * - All arithmetic uses BigInt; no floating point (ALL_MATH_BIGINT).
 * - Shares use floor division, so Σ shares of a round never exceeds its pool (CONSERVATION).
 * - Carry-over inference requires held balance strictly above outstanding rewards.
 * Side-effects: none
 * Links: Used by RoundLedger and CarryOverPoolAccounting
 * @public
 */

import { InputValidationError, InsufficientBalanceError } from "./errors";
import type { RoundBalance, ScoreEntry } from "./model";

/**
 * Proportional share of a round pool: floor(rewardPool * score / totalScore).
 * Returns 0n for a zero score or an unscored round.
 */
export function computeShare(
  rewardPool: bigint,
  score: bigint,
  totalScore: bigint
): bigint {
  if (score <= 0n || totalScore <= 0n || rewardPool <= 0n) {
    return 0n;
  }
  return (rewardPool * score) / totalScore;
}

/**
 * Pair parallel participant/score arrays into entries, rejecting empty
 * batches, length mismatches, empty ids and non-positive scores.
 */
export function toScoreEntries(
  participants: readonly string[],
  scores: readonly bigint[]
): ScoreEntry[] {
  if (participants.length === 0) {
    throw new InputValidationError("score batch is empty");
  }
  if (participants.length !== scores.length) {
    throw new InputValidationError(
      `participants (${participants.length}) and scores (${scores.length}) length mismatch`
    );
  }

  return participants.map((participant, index) => {
    const score = scores[index];
    if (participant.length === 0) {
      throw new InputValidationError(`empty participant id at index ${index}`);
    }
    if (score === undefined || score <= 0n) {
      throw new InputValidationError(
        `score for ${participant} must be positive`
      );
    }
    return { participant, score };
  });
}

/**
 * Rewards allocated to rounds but not yet paid out.
 */
export function computeOutstanding(rounds: Iterable<RoundBalance>): bigint {
  let outstanding = 0n;
  for (const round of rounds) {
    outstanding += round.rewardPool - round.claimedAmount;
  }
  return outstanding;
}

/**
 * Carry-over pool: everything held beyond what earlier rounds still owe.
 * A held balance equal to the outstanding amount is rejected too, so a
 * round can never be closed with a zero pool in this mode.
 */
export function inferCarryOverPool(
  heldBalance: bigint,
  outstanding: bigint
): bigint {
  if (heldBalance <= outstanding) {
    throw new InsufficientBalanceError(outstanding + 1n, heldBalance);
  }
  return heldBalance - outstanding;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/roundLedger`
 * Purpose: Indexed arena of round records plus a per-participant settlement index.
 * Scope: In-process round state: registrants, scores, pools, claim flags. Does not check phases, authorization or move funds.
 * Invariants:
 * - Round records are appended lazily and never removed; round id N lives at index N-1.
 * - totalScore === Σ non-zero scores of the round.
 * - rewardPool never changes after loadScores seals the round.
 * - A participant's cursor only passes rounds whose pool is sealed.
 * Side-effects: none (in-memory only)
 * Links: Owned by RewardDistributor
 * @internal
 */

import {
  computeOutstanding,
  computeShare,
  DuplicateRegistrationError,
  NotRegisteredError,
  type RoundPayout,
  type RoundStats,
  type ScoreEntry,
} from "@rewards/settlement-core";

interface RoundRecord {
  readonly id: number;
  readonly registrants: string[];
  readonly registered: Set<string>;
  readonly scores: Map<string, bigint>;
  readonly claimed: Set<string>;
  totalScore: bigint;
  rewardPool: bigint;
  claimedAmount: bigint;
  sealed: boolean;
}

interface ParticipantHistory {
  /** Round ids the participant registered in, ascending */
  readonly rounds: number[];
  /** Index into `rounds` of the first round that may still pay out */
  cursor: number;
}

/** Settlement computed for a claim, not yet applied */
export interface ClaimPlan {
  readonly participant: string;
  readonly payouts: readonly RoundPayout[];
  readonly total: bigint;
  readonly truncated: boolean;
  /** Cursor position once the plan is applied */
  readonly nextCursor: number;
}

/** Applied plan plus what is needed to undo it */
export interface CommittedClaim {
  readonly plan: ClaimPlan;
  readonly previousCursor: number;
}

export class RoundLedger {
  private readonly rounds: RoundRecord[] = [];
  private readonly histories = new Map<string, ParticipantHistory>();

  /** Highest round id with a record */
  get latestRoundId(): number {
    return this.rounds.length;
  }

  /**
   * Ensure records exist up to and including `roundId`.
   */
  open(roundId: number): void {
    while (this.rounds.length < roundId) {
      this.rounds.push({
        id: this.rounds.length + 1,
        registrants: [],
        registered: new Set(),
        scores: new Map(),
        claimed: new Set(),
        totalScore: 0n,
        rewardPool: 0n,
        claimedAmount: 0n,
        sealed: false,
      });
    }
  }

  register(roundId: number, participant: string): void {
    const round = this.require(roundId);
    if (round.registered.has(participant)) {
      throw new DuplicateRegistrationError(roundId, participant);
    }
    round.registrants.push(participant);
    round.registered.add(participant);

    const history = this.histories.get(participant);
    if (history) {
      history.rounds.push(roundId);
    } else {
      this.histories.set(participant, { rounds: [roundId], cursor: 0 });
    }
  }

  /** Direct funding: add to a round's pool before it is sealed */
  addToPool(roundId: number, amount: bigint): void {
    const round = this.require(roundId);
    if (round.sealed) {
      throw new Error(`Round ${roundId} pool is sealed`);
    }
    round.rewardPool += amount;
  }

  /** Pool accumulated so far for an unsealed round */
  accruedPool(roundId: number): bigint {
    return this.find(roundId)?.rewardPool ?? 0n;
  }

  /**
   * Apply a validated score batch and fix the round's pool.
   * Every participant is checked before anything is written.
   */
  loadScores(
    roundId: number,
    entries: readonly ScoreEntry[],
    rewardPool: bigint
  ): void {
    const round = this.require(roundId);
    if (round.sealed) {
      throw new Error(`Round ${roundId} is already sealed`);
    }
    for (const { participant } of entries) {
      if (!round.registered.has(participant)) {
        throw new NotRegisteredError(roundId, participant);
      }
    }

    for (const { participant, score } of entries) {
      const previous = round.scores.get(participant) ?? 0n;
      round.totalScore = round.totalScore - previous + score;
      round.scores.set(participant, score);
    }
    round.rewardPool = rewardPool;
    round.sealed = true;
  }

  /**
   * Allocated-but-unpaid rewards of every round before `roundId`.
   */
  outstandingBefore(roundId: number): bigint {
    return computeOutstanding(this.rounds.slice(0, Math.max(roundId - 1, 0)));
  }

  /** Allocated-but-unpaid rewards across all sealed rounds */
  outstanding(): bigint {
    return computeOutstanding(this.rounds.filter((round) => round.sealed));
  }

  isRegistered(roundId: number, participant: string): boolean {
    return this.find(roundId)?.registered.has(participant) ?? false;
  }

  scoreOf(roundId: number, participant: string): bigint {
    return this.find(roundId)?.scores.get(participant) ?? 0n;
  }

  hasClaimed(roundId: number, participant: string): boolean {
    return this.find(roundId)?.claimed.has(participant) ?? false;
  }

  participants(roundId: number): readonly string[] {
    return [...(this.find(roundId)?.registrants ?? [])];
  }

  stats(roundId: number): RoundStats {
    const round = this.find(roundId);
    return {
      roundId,
      participantCount: round?.registrants.length ?? 0,
      totalScore: round?.totalScore ?? 0n,
      rewardPool: round?.rewardPool ?? 0n,
      claimedAmount: round?.claimedAmount ?? 0n,
      sealed: round?.sealed ?? false,
    };
  }

  /**
   * What `participant` could still withdraw from one round. 0n unless the
   * round is sealed, they were scored in it and have not claimed it.
   */
  claimableIn(roundId: number, participant: string): bigint {
    const round = this.find(roundId);
    if (!round?.sealed || round.claimed.has(participant)) {
      return 0n;
    }
    const score = round.scores.get(participant) ?? 0n;
    return computeShare(round.rewardPool, score, round.totalScore);
  }

  /**
   * Plan a claim over the participant's registered rounds from their cursor
   * through `throughRoundId`. With `maxRounds`, stops before the first paying
   * round beyond that many; rounds paying nothing are passed over either way.
   * `truncated` is set only when a paying round was left for a later call.
   */
  planClaim(
    participant: string,
    throughRoundId: number,
    maxRounds?: number
  ): ClaimPlan {
    const history = this.histories.get(participant);
    const payouts: RoundPayout[] = [];
    let total = 0n;
    if (!history) {
      return { participant, payouts, total, truncated: false, nextCursor: 0 };
    }

    let index = history.cursor;
    let truncated = false;
    while (index < history.rounds.length) {
      const roundId = history.rounds[index];
      if (roundId === undefined || roundId > throughRoundId) break;

      const amount = this.claimableIn(roundId, participant);
      if (amount > 0n) {
        if (maxRounds !== undefined && payouts.length >= maxRounds) {
          truncated = true;
          break;
        }
        payouts.push({ roundId, amount });
        total += amount;
      }
      index += 1;
    }

    return { participant, payouts, total, truncated, nextCursor: index };
  }

  /**
   * Mark every planned round claimed, book the amounts and move the cursor.
   */
  commitClaim(plan: ClaimPlan): CommittedClaim {
    const history = this.histories.get(plan.participant);
    const previousCursor = history?.cursor ?? 0;
    for (const { roundId, amount } of plan.payouts) {
      const round = this.require(roundId);
      round.claimed.add(plan.participant);
      round.claimedAmount += amount;
    }
    if (history) {
      history.cursor = plan.nextCursor;
    }
    return { plan, previousCursor };
  }

  /** Undo commitClaim after a failed transfer */
  revertClaim({ plan, previousCursor }: CommittedClaim): void {
    for (const { roundId, amount } of plan.payouts) {
      const round = this.require(roundId);
      round.claimed.delete(plan.participant);
      round.claimedAmount -= amount;
    }
    const history = this.histories.get(plan.participant);
    if (history) {
      history.cursor = previousCursor;
    }
  }

  private find(roundId: number): RoundRecord | undefined {
    return Number.isInteger(roundId) && roundId >= 1
      ? this.rounds[roundId - 1]
      : undefined;
  }

  private require(roundId: number): RoundRecord {
    const round = this.find(roundId);
    if (!round) {
      throw new Error(`Round ${roundId} has not been opened`);
    }
    return round;
  }
}

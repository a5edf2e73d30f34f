// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/services/rewardDistributor`
 * Purpose: Multi-round, score-weighted reward distributor. Orchestrates registration, score loading, claim settlement and fund movements via ports.
 * Scope: Phase machine, authorization gating, checks-effects-interactions claim settlement, views. Does not compute scores or manage yield.
 * Invariants:
 * - Every operation is all-or-nothing; state commits synchronously, custody calls are the only awaits.
 * - Claim state (flags, claimedAmount, cursor) is committed before the single outbound transfer and reverted if it fails.
 * - A participant's nested claim while their transfer is in flight fails with NothingToClaim.
 * - Phase and round are re-checked after every await that precedes a commit.
 * - Carry-over inference counts payouts whose transfer is unsettled as still owed.
 * Side-effects: IO (custody transfers, logging, metrics)
 * Links: RoundLedger, PoolAccounting; ports FundCustody, AdminAuthority, RewardEventSink, Clock
 * @public
 */

import {
  type ClaimReceipt,
  GENESIS_ROUND_ID,
  InputValidationError,
  InsufficientBalanceError,
  NothingToClaimError,
  PhaseViolationError,
  type PoolMode,
  type RoundPhase,
  type RoundStats,
  TransferFailureError,
  UnauthorizedAccessError,
  assertPhase,
  isPoolSealed,
  isValidPhaseTransition,
  toScoreEntries,
} from "@rewards/settlement-core";

import type {
  AdminAuthority,
  Clock,
  FundCustody,
  RewardEvent,
  RewardEventSink,
} from "@/ports";
import {
  type ClaimOutcome,
  type Logger,
  rewardsClaimRoundsSettled,
  rewardsClaimsTotal,
  rewardsPaidUnitsTotal,
  toMetricValue,
} from "@/shared/observability";

import type { PoolAccounting } from "./poolAccounting";
import { RoundLedger } from "./roundLedger";

export interface RewardDistributorDeps {
  readonly custody: FundCustody;
  readonly authority: AdminAuthority;
  readonly pool: PoolAccounting;
  readonly events: RewardEventSink;
  readonly clock: Clock;
  readonly log: Logger;
  /** Default cap on rounds settled per claim; unbounded when omitted */
  readonly claimScanLimit?: number | undefined;
}

export interface ClaimOptions {
  /** Settle at most this many paying rounds; later calls pick up the rest */
  readonly maxRounds?: number | undefined;
}

type UnstampedEvent<E extends RewardEvent = RewardEvent> = E extends RewardEvent
  ? Omit<E, "at">
  : never;

function assertPrincipal(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new InputValidationError(`${field} must be a non-empty id`);
  }
}

function assertPositiveAmount(amount: bigint, field: string): void {
  if (amount <= 0n) {
    throw new InputValidationError(`${field} must be positive`);
  }
}

export class RewardDistributor {
  private readonly ledger = new RoundLedger();
  private readonly claimsInFlight = new Set<string>();
  /** Committed payouts whose transfer has not settled */
  private unsettledPayouts = 0n;
  /** Running total of every committed payout, settled or not */
  private committedPayouts = 0n;
  private round = GENESIS_ROUND_ID;
  private phase: RoundPhase = "registration";

  constructor(private readonly deps: RewardDistributorDeps) {
    this.ledger.open(GENESIS_ROUND_ID);
  }

  get currentRound(): number {
    return this.round;
  }

  get currentPhase(): RoundPhase {
    return this.phase;
  }

  get poolMode(): PoolMode {
    return this.deps.pool.mode;
  }

  // ==========================================================================
  // Round lifecycle
  // ==========================================================================

  register(participant: string): void {
    assertPrincipal(participant, "participant");
    assertPhase("register", "registration", this.phase);
    this.ledger.register(this.round, participant);
    this.publish({
      type: "participant_registered",
      roundId: this.round,
      participant,
    });
  }

  startActivePhase(caller: string): void {
    this.assertAdmin(caller, "startActivePhase");
    assertPhase("startActivePhase", "registration", this.phase);
    this.changePhase("active");
  }

  startNewRound(caller: string): void {
    this.assertAdmin(caller, "startNewRound");
    assertPhase("startNewRound", "distribution", this.phase);
    this.round += 1;
    this.ledger.open(this.round);
    this.publish({ type: "round_started", roundId: this.round });
    this.changePhase("registration");
  }

  /**
   * Load the round's scores, fix its pool and open claiming.
   * The whole batch is validated before anything is written; a participant
   * listed twice keeps the last score.
   */
  async setScores(
    caller: string,
    participants: readonly string[],
    scores: readonly bigint[]
  ): Promise<RoundStats> {
    this.assertAdmin(caller, "setScores");
    assertPhase("setScores", "active", this.phase);
    const entries = toScoreEntries(participants, scores);

    const roundId = this.round;
    const unsettledBefore = this.unsettledPayouts;
    const committedBefore = this.committedPayouts;
    const resolvePool = await this.deps.pool.preparePool();
    if (this.round !== roundId) {
      // Round was sealed and superseded while the pool was prepared
      throw new PhaseViolationError("setScores", "active", "distribution");
    }
    assertPhase("setScores", "active", this.phase);

    const unsettled =
      unsettledBefore + (this.committedPayouts - committedBefore);
    this.ledger.loadScores(
      roundId,
      entries,
      resolvePool(this.ledger, roundId, unsettled)
    );
    const stats = this.ledger.stats(roundId);
    this.publish({
      type: "scores_loaded",
      roundId,
      participantCount: stats.participantCount,
      totalScore: stats.totalScore,
      rewardPool: stats.rewardPool,
    });
    this.changePhase("distribution");
    return stats;
  }

  // ==========================================================================
  // Funds
  // ==========================================================================

  /**
   * Move funds from `from` into custody. In direct mode they are added to the
   * current round's pool, which is only possible until its scores are loaded.
   */
  async deposit(from: string, amount: bigint): Promise<void> {
    assertPrincipal(from, "depositor");
    assertPositiveAmount(amount, "deposit amount");
    const credits = this.deps.pool.creditsDeposits;
    if (credits) {
      this.assertPoolOpen();
    }

    try {
      await this.deps.custody.collect(from, amount);
    } catch (cause) {
      throw new TransferFailureError(from, amount, { cause });
    }

    if (credits) {
      if (isPoolSealed(this.phase)) {
        // Round closed while the funds were in flight
        await this.refund(from, amount);
        throw new PhaseViolationError(
          "deposit",
          ["registration", "active"],
          this.phase
        );
      }
      this.ledger.addToPool(this.round, amount);
    }

    this.publish({
      type: "funds_deposited",
      roundId: this.round,
      from,
      amount,
    });
  }

  /**
   * Administrator fund recovery. Bypasses round accounting entirely.
   */
  async emergencyWithdraw(
    caller: string,
    amount: bigint,
    recipient: string
  ): Promise<void> {
    this.assertAdmin(caller, "emergencyWithdraw");
    assertPrincipal(recipient, "recipient");
    assertPositiveAmount(amount, "withdrawal amount");

    const held = await this.deps.custody.balance();
    if (amount > held) {
      throw new InsufficientBalanceError(amount, held);
    }
    try {
      await this.deps.custody.disburse(recipient, amount);
    } catch (cause) {
      throw new TransferFailureError(recipient, amount, { cause });
    }

    this.deps.log.warn(
      { recipient, amount: amount.toString(), roundId: this.round },
      "emergency withdrawal executed"
    );
    this.publish({
      type: "emergency_withdrawal",
      roundId: this.round,
      recipient,
      amount,
    });
  }

  // ==========================================================================
  // Claim settlement
  // ==========================================================================

  /**
   * Pay out everything `participant` is owed across all sealed rounds in a
   * single transfer.
   */
  async claim(
    participant: string,
    options: ClaimOptions = {}
  ): Promise<ClaimReceipt> {
    assertPrincipal(participant, "participant");
    const maxRounds = options.maxRounds ?? this.deps.claimScanLimit;
    if (
      maxRounds !== undefined &&
      (!Number.isInteger(maxRounds) || maxRounds < 1)
    ) {
      throw new InputValidationError("maxRounds must be a positive integer");
    }

    if (this.claimsInFlight.has(participant)) {
      this.recordClaim("nothing_to_claim");
      throw new NothingToClaimError(participant);
    }

    const plan = this.ledger.planClaim(
      participant,
      this.lastSealedRound(),
      maxRounds
    );
    if (plan.total === 0n) {
      this.recordClaim("nothing_to_claim");
      throw new NothingToClaimError(participant);
    }

    // Effects before the interaction
    const committed = this.ledger.commitClaim(plan);
    this.claimsInFlight.add(participant);
    this.unsettledPayouts += plan.total;
    this.committedPayouts += plan.total;
    try {
      await this.deps.custody.disburse(participant, plan.total);
    } catch (cause) {
      this.ledger.revertClaim(committed);
      this.recordClaim("transfer_failed");
      this.deps.log.warn(
        { err: cause, participant, amount: plan.total.toString() },
        "claim transfer failed; settlement reverted"
      );
      throw new TransferFailureError(participant, plan.total, { cause });
    } finally {
      this.claimsInFlight.delete(participant);
      this.unsettledPayouts -= plan.total;
    }

    this.recordClaim("paid");
    rewardsPaidUnitsTotal.inc(toMetricValue(plan.total));
    rewardsClaimRoundsSettled.observe(plan.payouts.length);
    for (const { roundId, amount } of plan.payouts) {
      this.publish({ type: "reward_claimed", roundId, participant, amount });
    }

    return {
      participant,
      payouts: plan.payouts,
      total: plan.total,
      truncated: plan.truncated,
    };
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  isRegistered(roundId: number, participant: string): boolean {
    return this.ledger.isRegistered(roundId, participant);
  }

  getScore(roundId: number, participant: string): bigint {
    return this.ledger.scoreOf(roundId, participant);
  }

  hasClaimed(roundId: number, participant: string): boolean {
    return this.ledger.hasClaimed(roundId, participant);
  }

  /** Unclaimed entitlement in the current round */
  getClaimableAmount(participant: string): bigint {
    return this.ledger.claimableIn(this.round, participant);
  }

  getClaimableAmountForRound(roundId: number, participant: string): bigint {
    return this.ledger.claimableIn(roundId, participant);
  }

  /** What claim() would pay with no round limit */
  getTotalClaimableAmount(participant: string): bigint {
    return this.ledger.planClaim(participant, this.lastSealedRound()).total;
  }

  getUnclaimedRounds(participant: string): number[] {
    return this.ledger
      .planClaim(participant, this.lastSealedRound())
      .payouts.map((payout) => payout.roundId);
  }

  getRoundParticipants(roundId: number): readonly string[] {
    return this.ledger.participants(roundId);
  }

  getRoundParticipantCount(roundId: number): number {
    return this.ledger.stats(roundId).participantCount;
  }

  getRoundStats(roundId: number): RoundStats {
    return this.ledger.stats(roundId);
  }

  /** Rewards allocated to sealed rounds and not yet claimed */
  getOutstandingRewards(): bigint {
    return this.ledger.outstanding();
  }

  heldBalance(): Promise<bigint> {
    return this.deps.custody.balance();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private lastSealedRound(): number {
    return isPoolSealed(this.phase) ? this.round : this.round - 1;
  }

  private assertAdmin(caller: string, operation: string): void {
    if (!this.deps.authority.isAdmin(caller)) {
      throw new UnauthorizedAccessError(caller, operation);
    }
  }

  private assertPoolOpen(): void {
    if (isPoolSealed(this.phase)) {
      throw new PhaseViolationError(
        "deposit",
        ["registration", "active"],
        this.phase
      );
    }
  }

  private changePhase(to: RoundPhase): void {
    const from = this.phase;
    if (!isValidPhaseTransition(from, to)) {
      throw new Error(`Illegal phase transition ${from} -> ${to}`);
    }
    this.phase = to;
    this.publish({ type: "phase_changed", roundId: this.round, from, to });
  }

  private async refund(to: string, amount: bigint): Promise<void> {
    try {
      await this.deps.custody.disburse(to, amount);
    } catch (cause) {
      throw new TransferFailureError(to, amount, { cause });
    }
  }

  private recordClaim(outcome: ClaimOutcome): void {
    rewardsClaimsTotal.inc({ outcome });
  }

  private publish(event: UnstampedEvent): void {
    const stamped: RewardEvent = { ...event, at: this.deps.clock.now() };
    try {
      this.deps.events.emit(stamped);
    } catch (error) {
      this.deps.log.error(
        { err: error, eventType: event.type, roundId: event.roundId },
        "reward event sink failed"
      );
    }
  }
}

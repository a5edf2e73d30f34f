// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/reward-events`
 * Purpose: Observational event channel for indexers and external observers of the distributor.
 * Scope: Event payload types and sink interface. Does not affect distributor state.
 * Invariants: Events are emitted only after the state change they describe has committed. Internal state never depends on a sink.
 * Side-effects: none (interface definition only)
 * Links: Implemented by LogEventSink; RecordingEventSink in tests
 * @public
 */

import type { RoundPhase } from "@rewards/settlement-core";

interface RewardEventBase {
  /** ISO 8601 timestamp from the Clock port */
  readonly at: string;
  readonly roundId: number;
}

export interface ParticipantRegisteredEvent extends RewardEventBase {
  readonly type: "participant_registered";
  readonly participant: string;
}

export interface ScoresLoadedEvent extends RewardEventBase {
  readonly type: "scores_loaded";
  readonly participantCount: number;
  readonly totalScore: bigint;
  readonly rewardPool: bigint;
}

export interface RewardClaimedEvent extends RewardEventBase {
  readonly type: "reward_claimed";
  readonly participant: string;
  readonly amount: bigint;
}

export interface PhaseChangedEvent extends RewardEventBase {
  readonly type: "phase_changed";
  readonly from: RoundPhase;
  readonly to: RoundPhase;
}

export interface RoundStartedEvent extends RewardEventBase {
  readonly type: "round_started";
}

export interface FundsDepositedEvent extends RewardEventBase {
  readonly type: "funds_deposited";
  readonly from: string;
  readonly amount: bigint;
}

export interface EmergencyWithdrawalEvent extends RewardEventBase {
  readonly type: "emergency_withdrawal";
  readonly recipient: string;
  readonly amount: bigint;
}

export type RewardEvent =
  | ParticipantRegisteredEvent
  | ScoresLoadedEvent
  | RewardClaimedEvent
  | PhaseChangedEvent
  | RoundStartedEvent
  | FundsDepositedEvent
  | EmergencyWithdrawalEvent;

export type RewardEventType = RewardEvent["type"];

export interface RewardEventSink {
  emit(event: RewardEvent): void;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hexagonal architecture port definitions for the distributor's collaborators.
 * Scope: Type exports only. Does not contain implementations.
 * Invariants: Named exports only; ports never import adapters or features.
 * Side-effects: none
 * Links: Implemented by src/adapters, consumed by src/features
 * @public
 */

export type { AdminAuthority } from "./admin-authority.port";
export type { Clock } from "./clock.port";
export type { FundCustody } from "./fund-custody.port";
export type {
  EmergencyWithdrawalEvent,
  FundsDepositedEvent,
  ParticipantRegisteredEvent,
  PhaseChangedEvent,
  RewardClaimedEvent,
  RewardEvent,
  RewardEventSink,
  RewardEventType,
  RoundStartedEvent,
  ScoresLoadedEvent,
} from "./reward-events.port";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define payload schemas (see ports/reward-events).
 * Invariants: All event names registered here; logEvent() enforces base fields (roundId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by LogEventSink.
 * @public
 */

export const EVENT_NAMES = {
  REWARDS_PARTICIPANT_REGISTERED: "rewards.participant_registered",
  REWARDS_SCORES_LOADED: "rewards.scores_loaded",
  REWARDS_REWARD_CLAIMED: "rewards.reward_claimed",
  REWARDS_PHASE_CHANGED: "rewards.phase_changed",
  REWARDS_ROUND_STARTED: "rewards.round_started",
  REWARDS_FUNDS_DEPOSITED: "rewards.funds_deposited",
  REWARDS_EMERGENCY_WITHDRAWAL: "rewards.emergency_withdrawal",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 */
export interface EventBase {
  roundId: number;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events registry, logging, metrics.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * Links: Delegates to events and server submodules.
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { ClaimOutcome, Logger } from "./server";
export {
  logEvent,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
  rewardsClaimRoundsSettled,
  rewardsClaimsTotal,
  rewardsPaidUnitsTotal,
  toMetricValue,
} from "./server";

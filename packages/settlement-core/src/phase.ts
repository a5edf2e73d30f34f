// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@rewards/settlement-core/phase`
 * Purpose: Business rules for the round phase state machine.
 * Scope: Pure validation functions with no side effects. Does not track the current phase.
 * Invariants: Transitions follow registration → active → distribution → registration (next round). No terminal state.
 * Side-effects: none
 * Links: Enforced by RewardDistributor
 * @public
 */

import { PhaseViolationError } from "./errors";
import type { RoundPhase } from "./model";

const NEXT_PHASE: Readonly<Record<RoundPhase, RoundPhase>> = {
  registration: "active",
  active: "distribution",
  distribution: "registration",
};

/**
 * Validates if a phase transition is allowed.
 * distribution → registration is the start of a new round.
 */
export function isValidPhaseTransition(
  from: RoundPhase,
  to: RoundPhase
): boolean {
  return NEXT_PHASE[from] === to;
}

/**
 * Throws PhaseViolationError unless `actual` is the phase `operation` needs.
 */
export function assertPhase(
  operation: string,
  expected: RoundPhase,
  actual: RoundPhase
): void {
  if (actual !== expected) {
    throw new PhaseViolationError(operation, expected, actual);
  }
}

/** True when the phase's round has its reward pool fixed */
export function isPoolSealed(phase: RoundPhase): boolean {
  return phase === "distribution";
}

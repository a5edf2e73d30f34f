// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@rewards/settlement-core`
 * Purpose: Pure domain logic for round reward settlement, shared by the distributor and its adapters.
 * Scope: Re-exports model types, phase rules, share arithmetic and errors. Does not contain I/O or infrastructure code.
 * Invariants: No imports from src/. Pure domain logic only.
 * Side-effects: none
 * Links: model.ts, phase.ts, rules.ts, errors.ts
 * @public
 */

// Errors
export {
  DuplicateRegistrationError,
  InputValidationError,
  InsufficientBalanceError,
  isDuplicateRegistrationError,
  isInputValidationError,
  isInsufficientBalanceError,
  isNotRegisteredError,
  isNothingToClaimError,
  isPhaseViolationError,
  isSettlementError,
  isTransferFailureError,
  isUnauthorizedAccessError,
  NotRegisteredError,
  NothingToClaimError,
  PhaseViolationError,
  TransferFailureError,
  UnauthorizedAccessError,
} from "./errors";
export type { SettlementError, SettlementErrorCode } from "./errors";
// Model types and enums
export type {
  ClaimReceipt,
  PoolMode,
  RoundBalance,
  RoundPayout,
  RoundPhase,
  RoundStats,
  ScoreEntry,
} from "./model";
export { GENESIS_ROUND_ID, POOL_MODES } from "./model";

// Phase machine
export {
  assertPhase,
  isPoolSealed,
  isValidPhaseTransition,
} from "./phase";

// Rules
export {
  computeOutstanding,
  computeShare,
  inferCarryOverPool,
  toScoreEntries,
} from "./rules";

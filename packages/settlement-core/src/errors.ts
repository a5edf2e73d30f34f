// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@rewards/settlement-core/errors`
 * Purpose: Domain error classes for round settlement operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards. Every failure aborts the whole operation.
 * Side-effects: none
 * Links: Thrown by RewardDistributor, RoundLedger and adapters
 * @public
 */

import type { RoundPhase } from "./model";

export class PhaseViolationError extends Error {
  public readonly code = "PHASE_VIOLATION" as const;
  public readonly allowed: readonly RoundPhase[];
  constructor(
    public readonly operation: string,
    allowed: RoundPhase | readonly RoundPhase[],
    public readonly actual: RoundPhase
  ) {
    const phases: readonly RoundPhase[] =
      typeof allowed === "string" ? [allowed] : allowed;
    super(
      `${operation} requires phase ${phases.join(" or ")}, current phase is ${actual}`
    );
    this.name = "PhaseViolationError";
    this.allowed = phases;
  }
}

export class DuplicateRegistrationError extends Error {
  public readonly code = "DUPLICATE_REGISTRATION" as const;
  constructor(
    public readonly roundId: number,
    public readonly participant: string
  ) {
    super(`Participant ${participant} is already registered in round ${roundId}`);
    this.name = "DuplicateRegistrationError";
  }
}

export class InputValidationError extends Error {
  public readonly code = "INPUT_VALIDATION" as const;
  constructor(public readonly reason: string) {
    super(`Invalid input: ${reason}`);
    this.name = "InputValidationError";
  }
}

export class UnauthorizedAccessError extends Error {
  public readonly code = "UNAUTHORIZED_ACCESS" as const;
  constructor(
    public readonly caller: string,
    public readonly operation: string
  ) {
    super(`${caller} is not authorized to call ${operation}`);
    this.name = "UnauthorizedAccessError";
  }
}

export class NotRegisteredError extends Error {
  public readonly code = "NOT_REGISTERED" as const;
  constructor(
    public readonly roundId: number,
    public readonly participant: string
  ) {
    super(`Participant ${participant} is not registered in round ${roundId}`);
    this.name = "NotRegisteredError";
  }
}

export class NothingToClaimError extends Error {
  public readonly code = "NOTHING_TO_CLAIM" as const;
  constructor(public readonly participant: string) {
    super(`Nothing to claim for ${participant}`);
    this.name = "NothingToClaimError";
  }
}

export class InsufficientBalanceError extends Error {
  public readonly code = "INSUFFICIENT_BALANCE" as const;
  constructor(
    public readonly required: bigint,
    public readonly available: bigint
  ) {
    super(`Insufficient balance: required ${required}, available ${available}`);
    this.name = "InsufficientBalanceError";
  }
}

/**
 * Outbound transfer did not complete. State changes made by the same
 * operation have been reverted by the time this is thrown.
 */
export class TransferFailureError extends Error {
  public readonly code = "TRANSFER_FAILURE" as const;
  constructor(
    public readonly recipient: string,
    public readonly amount: bigint,
    options?: { cause?: unknown }
  ) {
    super(`Transfer of ${amount} to ${recipient} failed`, options);
    this.name = "TransferFailureError";
  }
}

export type SettlementError =
  | PhaseViolationError
  | DuplicateRegistrationError
  | InputValidationError
  | UnauthorizedAccessError
  | NotRegisteredError
  | NothingToClaimError
  | InsufficientBalanceError
  | TransferFailureError;

export type SettlementErrorCode = SettlementError["code"];

// Type guards

export function isPhaseViolationError(
  error: unknown
): error is PhaseViolationError {
  return error instanceof Error && error.name === "PhaseViolationError";
}

export function isDuplicateRegistrationError(
  error: unknown
): error is DuplicateRegistrationError {
  return error instanceof Error && error.name === "DuplicateRegistrationError";
}

export function isInputValidationError(
  error: unknown
): error is InputValidationError {
  return error instanceof Error && error.name === "InputValidationError";
}

export function isUnauthorizedAccessError(
  error: unknown
): error is UnauthorizedAccessError {
  return error instanceof Error && error.name === "UnauthorizedAccessError";
}

export function isNotRegisteredError(
  error: unknown
): error is NotRegisteredError {
  return error instanceof Error && error.name === "NotRegisteredError";
}

export function isNothingToClaimError(
  error: unknown
): error is NothingToClaimError {
  return error instanceof Error && error.name === "NothingToClaimError";
}

export function isInsufficientBalanceError(
  error: unknown
): error is InsufficientBalanceError {
  return error instanceof Error && error.name === "InsufficientBalanceError";
}

export function isTransferFailureError(
  error: unknown
): error is TransferFailureError {
  return error instanceof Error && error.name === "TransferFailureError";
}

export function isSettlementError(error: unknown): error is SettlementError {
  return (
    isPhaseViolationError(error) ||
    isDuplicateRegistrationError(error) ||
    isInputValidationError(error) ||
    isUnauthorizedAccessError(error) ||
    isNotRegisteredError(error) ||
    isNothingToClaimError(error) ||
    isInsufficientBalanceError(error) ||
    isTransferFailureError(error)
  );
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/authority/single-owner`
 * Purpose: Ownership-style access control: one privileged principal administers the distributor.
 * Scope: Implements AdminAuthority with transferable ownership. Does not support roles.
 * Invariants: Exactly one owner at any time; only the owner can hand ownership over.
 * Side-effects: none (in-memory only)
 * Links: Implements AdminAuthority port
 * @public
 */

import {
  InputValidationError,
  UnauthorizedAccessError,
} from "@rewards/settlement-core";

import type { AdminAuthority } from "@/ports";

export class SingleOwnerAuthority implements AdminAuthority {
  private currentOwner: string;

  constructor(owner: string) {
    this.currentOwner = requireOwnerId(owner);
  }

  get owner(): string {
    return this.currentOwner;
  }

  isAdmin(principal: string): boolean {
    return principal === this.currentOwner;
  }

  transferOwnership(caller: string, newOwner: string): void {
    if (!this.isAdmin(caller)) {
      throw new UnauthorizedAccessError(caller, "transferOwnership");
    }
    this.currentOwner = requireOwnerId(newOwner);
  }
}

function requireOwnerId(owner: string): string {
  const trimmed = owner.trim();
  if (trimmed.length === 0) {
    throw new InputValidationError("owner must be a non-empty id");
  }
  return trimmed;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/admin-authority`
 * Purpose: Authorization capability gating administrative distributor operations.
 * Scope: Answers whether a principal may administer the distributor. Does not perform the operations.
 * Invariants: Synchronous and side-effect free, so gating never interleaves with other operations.
 * Side-effects: none (interface only)
 * Links: Implemented by SingleOwnerAuthority
 * @public
 */

export interface AdminAuthority {
  isAdmin(principal: string): boolean;
}

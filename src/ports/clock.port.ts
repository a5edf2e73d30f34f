// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for stamping reward events.
 * Scope: Provides the current time in ISO format. Settlement arithmetic never reads it.
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock; FakeClock in tests
 * @public
 */

export interface Clock {
  now(): string;
}

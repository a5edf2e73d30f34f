// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys; participant ids and amounts stay visible for audit.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  // Custody credentials
  "privateKey",
  "mnemonic",
  "seed",
  "custody.signer",
];

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe event logger that enforces the event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: roundId MUST be a positive integer (throws in tests, logs error elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from ../events; called by LogEventSink.
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

/**
 * @param logger - Pino logger instance
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include roundId)
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string
): void {
  if (!Number.isInteger(fields.roundId) || fields.roundId < 1) {
    const isStrict =
      // biome-ignore lint/style/noProcessEnv: Runtime test detection for strict validation
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without a valid roundId`
      );
    }
    logger.error(
      { event: eventName, invalidField: "roundId" },
      "inv_invalid_roundId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}

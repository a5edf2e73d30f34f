// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/log-event-sink`
 * Purpose: RewardEventSink that publishes distributor events as structured pino log lines.
 * Scope: Maps event types to the registered event names and serializes bigint fields. Does not buffer or retry.
 * Invariants: One log line per event; bigint values logged as decimal strings.
 * Side-effects: IO (logging)
 * Links: Implements RewardEventSink port; uses logEvent and EVENT_NAMES
 * @public
 */

import type { RewardEvent, RewardEventSink, RewardEventType } from "@/ports";
import {
  EVENT_NAMES,
  type EventName,
  type Logger,
  logEvent,
} from "@/shared/observability";

const EVENT_NAME_BY_TYPE: Readonly<Record<RewardEventType, EventName>> = {
  participant_registered: EVENT_NAMES.REWARDS_PARTICIPANT_REGISTERED,
  scores_loaded: EVENT_NAMES.REWARDS_SCORES_LOADED,
  reward_claimed: EVENT_NAMES.REWARDS_REWARD_CLAIMED,
  phase_changed: EVENT_NAMES.REWARDS_PHASE_CHANGED,
  round_started: EVENT_NAMES.REWARDS_ROUND_STARTED,
  funds_deposited: EVENT_NAMES.REWARDS_FUNDS_DEPOSITED,
  emergency_withdrawal: EVENT_NAMES.REWARDS_EMERGENCY_WITHDRAWAL,
};

export class LogEventSink implements RewardEventSink {
  constructor(private readonly log: Logger) {}

  emit(event: RewardEvent): void {
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(event)) {
      if (key === "type") continue;
      fields[key] = typeof value === "bigint" ? value.toString() : value;
    }
    logEvent(this.log, EVENT_NAME_BY_TYPE[event.type], {
      ...fields,
      roundId: event.roundId,
    });
  }
}

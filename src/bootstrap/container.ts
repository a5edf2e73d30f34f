// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the distributor composition root with env-based pool mode selection.
 * Scope: Wire adapters to ports and build the RewardDistributor. Does not run any round operations.
 * Invariants: All ports wired; single container instance per process; pool accounting follows REWARDS_POOL_MODE.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Links: Used by entry points; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  InMemoryVault,
  LogEventSink,
  SingleOwnerAuthority,
  SystemClock,
} from "@/adapters/server";
import {
  createPoolAccounting,
  RewardDistributor,
} from "@/features/rewards/public";
import type { Clock, RewardEventSink } from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  clock: Clock;
  custody: InMemoryVault;
  authority: SingleOwnerAuthority;
  events: RewardEventSink;
  distributor: RewardDistributor;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ component: "distributor" });

  // Startup log - confirm config (no secrets)
  log.info(
    {
      poolMode: env.REWARDS_POOL_MODE,
      claimScanLimit: env.REWARDS_CLAIM_SCAN_LIMIT ?? null,
      logLevel: env.PINO_LOG_LEVEL,
    },
    "container initialized"
  );

  const clock = new SystemClock();
  const custody = new InMemoryVault();
  const authority = new SingleOwnerAuthority(env.REWARDS_ADMIN_ID);
  const events = new LogEventSink(log.child({ channel: "events" }));

  const distributor = new RewardDistributor({
    custody,
    authority,
    pool: createPoolAccounting(env.REWARDS_POOL_MODE, custody),
    events,
    clock,
    log,
    claimScanLimit: env.REWARDS_CLAIM_SCAN_LIMIT,
  });

  return { log, clock, custody, authority, events, distributor };
}

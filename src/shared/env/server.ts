// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the distributor runtime; provides lazy, cached access. Does not wire adapters.
 * Invariants: All required env vars validated on first access; fails fast on invalid env with the offending keys.
 * Side-effects: process.env
 * Notes: REWARDS_POOL_MODE selects pool accounting; REWARDS_ADMIN_ID is the initial owner principal.
 * Links: Consumed by bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

import { POOL_MODES } from "@rewards/settlement-core";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("rewards"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Settlement
  REWARDS_POOL_MODE: z.enum(POOL_MODES).default("direct"),
  REWARDS_ADMIN_ID: z.string().trim().min(1),
  // Unset = a claim settles every pending round in one call
  REWARDS_CLAIM_SCAN_LIMIT: z.coerce.number().int().positive().optional(),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // invalid_type is how zod reports an absent required key
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the cached env so the next serverEnv() re-reads process.env.
 * For tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };

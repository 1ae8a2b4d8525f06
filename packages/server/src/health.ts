/**
 * Health endpoint
 *
 * Unauthenticated JSON view of the sync engine and the published snapshot.
 */

import type { FastifyInstance } from "fastify";
import type { CacheStore, EngineStatus, SyncEngine } from "@taskdav/core";

export type HealthState = "healthy" | "degraded" | "starting";

export interface HealthReport {
  status: HealthState;
  service: string;
  version: string;
  timestamp: string;
  lastSync: string | null;
  generation: number;
  sync: EngineStatus;
  calendars: {
    total: number;
    stale: number;
  };
}

export interface HealthRouteOptions {
  engine: SyncEngine;
  store: CacheStore;
  version: string;
}

export function healthReport(options: HealthRouteOptions, now = new Date()): HealthReport {
  const snapshot = options.store.current();
  const sync = options.engine.status();

  let stale = 0;
  for (const calendar of snapshot.calendars.values()) {
    if (calendar.stale) stale++;
  }

  let status: HealthState;
  if (snapshot.generation === 0) {
    status = "starting";
  } else if (sync.lastCycle?.outcome === "published" && stale === 0) {
    status = "healthy";
  } else {
    status = "degraded";
  }

  return {
    status,
    service: "taskdav",
    version: options.version,
    timestamp: now.toISOString(),
    lastSync: snapshot.syncedAt,
    generation: snapshot.generation,
    sync,
    calendars: { total: snapshot.calendars.size, stale },
  };
}

/**
 * Register health routes
 */
export async function registerHealthRoutes(
  fastify: FastifyInstance,
  options: HealthRouteOptions,
): Promise<void> {
  /**
   * GET /health
   *
   * Returns sync and cache health status
   */
  fastify.get<{ Reply: HealthReport }>("/health", async () => healthReport(options));
}

/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 while the process serves)
 * GET /ready  — Readiness check: contract initialized and event chain intact
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TokenService } from "../services/token-service.js";

export function createHealthRoutes(service: TokenService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  routes.get("/ready", (c) => {
    const initialized = service.isReady();
    const integrity = service.verifyEventStore();
    const ready = initialized && integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        contract: initialized ? "ok" : "down",
        eventStore: integrity.valid
          ? { status: "ok", lastVerifiedPosition: integrity.lastVerifiedPosition }
          : { status: "down", errors: integrity.errors.length },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from main.ts
 * so tests can build the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { TokenService } from "./services/token-service.js";
import type { TokenServiceConfig } from "./services/token-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createFtRoutes } from "./routes/ft.js";
import { createStorageRoutes } from "./routes/storage.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: TokenServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: TokenService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws TokenError if the contract cannot be initialized from the config
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new TokenService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/ft", createFtRoutes());
  app.route("/api/v1/storage", createStorageRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}

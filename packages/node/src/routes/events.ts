/**
 * Event query routes.
 *
 * GET /api/v1/events            — Committed events in global order (cursor pagination)
 * GET /api/v1/events/:streamId  — Committed events of one stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const events = c
      .get("service")
      .readAllEvents({ afterPosition: query.afterPosition });

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.globalPosition,
        "globalPosition",
      ),
    );
  });

  routes.get("/:streamId", (c) => {
    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const events = c
      .get("service")
      .readStreamEvents(c.req.param("streamId"), { afterVersion: query.afterVersion });

    return c.json(
      paginate(events, { cursor: query.cursor, limit: query.limit }, (e) => e.version, "version"),
    );
  });

  return routes;
}

/**
 * Request logging middleware.
 *
 * Emits one structured entry per request. The sink is injected so that
 * main.ts can hand it to pino and tests can collect entries in memory.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ACCOUNT_ID_HEADER } from "../types/dto.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** X-Account-Id of the request, when present */
  readonly accountId?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      accountId: c.req.header(ACCOUNT_ID_HEADER),
    });
  };
}

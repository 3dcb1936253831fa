/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createFtRoutes } from "./ft.js";
export { createStorageRoutes } from "./storage.js";
export { createEventRoutes } from "./events.js";
export { receiptResponse } from "./receipt.js";

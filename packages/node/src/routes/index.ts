/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes, createMetricsRoute } from "./health.js";
export { createTrustLineRoutes } from "./trust-lines.js";
export { createPaymentRoutes } from "./payments.js";
export { createAdminRoutes } from "./admin.js";

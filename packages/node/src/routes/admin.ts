/**
 * Administrative routes. Admin-only.
 *
 * POST /api/v1/admin/freeze  — Freeze a trust line (terminal)
 * GET  /api/v1/admin/audit   — Query the audit log of committed commands
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema, FreezeSchema, toTrustLineDto } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { lineOf } from "./results.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // The engine enforces the admin check on freeze itself (NOT_ADMIN);
  // the audit log is a host concern, so it is guarded here.
  routes.post("/freeze", async (c) => {
    const body = await parseBody(c, FreezeSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "freeze",
      account: body.account,
      counterparty: body.counterparty,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) });
  });

  routes.get("/audit", (c) => {
    const service = c.get("service");
    if (!service.isAdmin(c.get("caller"))) {
      throw new ApiError(403, "FORBIDDEN", "Only the network admin may read the audit log");
    }

    const query = parseQuery(c, AuditQuerySchema);
    const entries = service.auditLog.query(query);
    return c.json({ data: entries });
  });

  return routes;
}

/**
 * Payment routes.
 *
 * POST /api/v1/payments         — Pay a direct counterparty
 * POST /api/v1/payments/ripple  — Pay through a chain of intermediaries
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  RipplePaymentSchema,
  SendPaymentSchema,
  toRippleDto,
  toTrustLineDto,
} from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { lineOf, rippleOf } from "./results.js";

export function createPaymentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseBody(c, SendPaymentSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "send",
      recipient: body.recipient,
      amount: body.amount,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) });
  });

  // hops are the intermediaries in order; hops[0] is the caller's direct
  // counterparty and the last hop pays the recipient.
  routes.post("/ripple", async (c) => {
    const body = await parseBody(c, RipplePaymentSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "ripple",
      recipient: body.recipient,
      hops: body.hops,
      amount: body.amount,
    });
    return c.json({ data: toRippleDto(rippleOf(result)) });
  });

  return routes;
}

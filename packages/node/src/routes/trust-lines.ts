/**
 * Trust line routes. Every path is relative to the calling participant.
 *
 * POST   /api/v1/trust-lines                          — Open a line with a counterparty
 * GET    /api/v1/trust-lines                          — List the caller's lines (cursor pagination)
 * GET    /api/v1/trust-lines/:counterparty            — Get one line
 * GET    /api/v1/trust-lines/:counterparty/balance    — Balance from the caller's side
 * GET    /api/v1/trust-lines/:counterparty/credit     — Remaining capacity both ways
 * POST   /api/v1/trust-lines/:counterparty/quality    — Set quality ratios
 * POST   /api/v1/trust-lines/:counterparty/rippling   — Toggle rippling
 * POST   /api/v1/trust-lines/:counterparty/limits     — Change limits (both parties must sign)
 * POST   /api/v1/trust-lines/:counterparty/settle     — Record an off-ledger settlement
 */

import { Hono } from "hono";
import { counterpartyOf } from "@trustnet/trust-lines";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateTrustLineSchema,
  ListTrustLinesQuerySchema,
  ParticipantIdSchema,
  SetRipplingSchema,
  SettleSchema,
  UpdateLimitsSchema,
  UpdateQualitySchema,
  toBalanceDto,
  toCreditDto,
  toSettlementDto,
  toTrustLineDto,
} from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { balanceOf, creditOf, lineOf, settleOf } from "./results.js";

export function createTrustLineRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const counterpartyParam = (value: string): string => {
    const parsed = ParticipantIdSchema.safeParse(value);
    if (!parsed.success) {
      throw new ApiError(400, "VALIDATION_ERROR", `Invalid counterparty: "${value}"`);
    }
    return parsed.data;
  };

  // POST /api/v1/trust-lines — Create
  routes.post("/", async (c) => {
    const body = await parseBody(c, CreateTrustLineSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "create",
      ...body,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) }, 201);
  });

  // GET /api/v1/trust-lines — List
  routes.get("/", (c) => {
    const query = parseQuery(c, ListTrustLinesQuerySchema);
    const caller = c.get("caller");
    const lines = c.get("service").listLines(caller);

    // Lines come back in canonical pair order, which for a fixed caller
    // is also counterparty order.
    const page = paginate(
      lines,
      query,
      (line) => counterpartyOf(line.pair, caller),
      "counterparty",
    );
    return c.json({
      data: page.data.map(toTrustLineDto),
      pagination: page.pagination,
    });
  });

  // GET /api/v1/trust-lines/:counterparty — Get
  routes.get("/:counterparty", (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const line = c.get("service").getLine(c.get("caller"), counterparty);
    return c.json({ data: toTrustLineDto(line) });
  });

  // GET /api/v1/trust-lines/:counterparty/balance
  routes.get("/:counterparty/balance", (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const result = c.get("service").execute(c.get("caller"), {
      type: "balance",
      counterparty,
    });
    return c.json({ data: toBalanceDto(balanceOf(result)) });
  });

  // GET /api/v1/trust-lines/:counterparty/credit
  routes.get("/:counterparty/credit", (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const result = c.get("service").execute(c.get("caller"), {
      type: "credit",
      counterparty,
    });
    return c.json({ data: toCreditDto(creditOf(result)) });
  });

  // POST /api/v1/trust-lines/:counterparty/quality
  routes.post("/:counterparty/quality", async (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const body = await parseBody(c, UpdateQualitySchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "quality",
      counterparty,
      ...body,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) });
  });

  // POST /api/v1/trust-lines/:counterparty/rippling
  routes.post("/:counterparty/rippling", async (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const body = await parseBody(c, SetRipplingSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "ripple_set",
      counterparty,
      allowRippling: body.allowRippling,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) });
  });

  // POST /api/v1/trust-lines/:counterparty/limits
  routes.post("/:counterparty/limits", async (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const body = await parseBody(c, UpdateLimitsSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "limits",
      counterparty,
      limitLo: body.limitLo,
      limitHi: body.limitHi,
      coSigners: c.get("auth").coSigners,
    });
    return c.json({ data: toTrustLineDto(lineOf(result)) });
  });

  // POST /api/v1/trust-lines/:counterparty/settle
  routes.post("/:counterparty/settle", async (c) => {
    const counterparty = counterpartyParam(c.req.param("counterparty"));
    const body = await parseBody(c, SettleSchema);
    const result = c.get("service").execute(c.get("caller"), {
      type: "settle",
      counterparty,
      amount: body.amount,
      reference: body.reference,
    });
    return c.json({ data: toSettlementDto(settleOf(result)) });
  });

  return routes;
}

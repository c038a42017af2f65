/**
 * Treasury routes.
 *
 * GET  /api/v1/treasury          - Account, asset and balance
 * POST /api/v1/treasury/payouts  - Board payout to any account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PayoutSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";

export function createTreasuryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { academy } = c.get("service");
    const { asset, decimals } = academy.paymentAsset();
    return c.json({
      data: {
        account: academy.treasuryAccount,
        asset,
        decimals,
        balance: academy.treasuryBalance().toString(),
      },
    });
  });

  routes.post("/payouts", validateBody(PayoutSchema), (c) => {
    const { to, amount } = c.req.valid("json");
    c.get("service").academy.boardPayout(callerOf(c), to, amount);
    return c.json({ data: { to, amount: amount.toString() } });
  });

  return routes;
}
